export * from "./types.js";
export * from "./errors.js";
export { Store } from "./store.js";
export type { StoreOptions } from "./store.js";
export { UserRegistry, DEFAULT_USER } from "./users.js";
export { codecForPath, jsonCodec, textCodec } from "./codec.js";
export type { DecodeResult, TaskCodec } from "./codec.js";
export { formatDate, isOverdue, isValidDate } from "./dates.js";
export { taskOverview, userOverview } from "./stats.js";
export type { TaskOverview, UserOverview, UserSummary } from "./stats.js";
export { readReports, writeReports, renderTaskOverview, renderUserOverview } from "./reports.js";
export type { ReportPaths, ReportTexts } from "./reports.js";
export { formatTask, formatTaskDetail, formatTaskList, formatStats } from "./formatter.js";
export { loadConfig } from "./config.js";
export type { Config, ColorMode } from "./config.js";
export { prioritySchema, statusSchema, dateSchema } from "./schema.js";
export { run } from "./cli.js";
export { runShell } from "./shell.js";
