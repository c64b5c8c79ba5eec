import { dirname, join } from "node:path";
import { z } from "zod";
import { TaskManagerError } from "./errors.js";
import { describeIssues } from "./schema.js";
import { DEFAULT_USER } from "./users.js";

export type ColorMode = "auto" | "always" | "never";

export interface Config {
  tasksFile: string;
  usersFile: string;
  reportDir: string;
  /** Default assignee, and whose tasks `--mine` shows */
  user: string;
  color: ColorMode;
}

const envSchema = z.object({
  TASKS_FILE: z.string().min(1).default("tasks.txt"),
  TASKS_USERS_FILE: z.string().min(1).optional(),
  TASKS_REPORT_DIR: z.string().min(1).optional(),
  TASKS_USER: z.string().regex(/^[^\s,]+$/, "must be a user name").default(DEFAULT_USER),
  TASKS_COLOR: z.enum(["auto", "always", "never"]).default("auto"),
});

// empty variables count as unset
function definedEntries(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") out[key] = value;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(definedEntries(env));
  if (!parsed.success) {
    throw new TaskManagerError(
      "INVALID_CONFIG",
      `Invalid configuration: ${describeIssues(parsed.error)}`
    );
  }
  const e = parsed.data;
  const baseDir = dirname(e.TASKS_FILE);
  return {
    tasksFile: e.TASKS_FILE,
    usersFile: e.TASKS_USERS_FILE ?? join(baseDir, "users.txt"),
    reportDir: e.TASKS_REPORT_DIR ?? baseDir,
    user: e.TASKS_USER,
    color: e.TASKS_COLOR,
  };
}

export function useColor(mode: ColorMode, isTTY: boolean): boolean {
  if (mode === "always") return true;
  if (mode === "never") return false;
  return isTTY;
}
