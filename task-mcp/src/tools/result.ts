import { isTaskManagerError } from "@tasktrack/cli";
import type { ToolResult } from "../types.js";

/** Runs a tool body, reporting task manager errors as a failed result. */
export async function attempt<T>(fn: () => Promise<ToolResult<T>>): Promise<ToolResult<T>> {
  try {
    return await fn();
  } catch (err) {
    if (!isTaskManagerError(err)) throw err;
    return { ok: false, error: err.message };
  }
}
