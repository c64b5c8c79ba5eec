import { randomUUID } from "node:crypto";
import { readFile, writeFile, rename, mkdir, rm } from "node:fs/promises";
import { dirname } from "node:path";
import { TaskManagerError } from "./errors.js";

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Reads a UTF-8 file; `null` when it does not exist. */
export async function readTextFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) return null;
    throw new TaskManagerError("STORAGE", `Could not read ${filePath}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

/**
 * Writes beside the target and renames over it. Each write gets its own
 * temporary file, removed again when the write fails.
 */
export async function writeFileAtomic(filePath: string, data: string): Promise<void> {
  const tmp = `${filePath}.tmp.${process.pid}.${randomUUID()}`;
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(tmp, data, "utf-8");
    await rename(tmp, filePath);
  } catch (err) {
    await rm(tmp, { force: true });
    throw new TaskManagerError("STORAGE", `Could not write ${filePath}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}
