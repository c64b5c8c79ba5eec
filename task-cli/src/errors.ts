export type TaskErrorCode =
  | "NOT_FOUND"
  | "INVALID_INPUT"
  | "TASK_COMPLETED"
  | "UNKNOWN_USER"
  | "DUPLICATE_USER"
  | "CORRUPT_FILE"
  | "STORAGE"
  | "INVALID_CONFIG";

export class TaskManagerError extends Error {
  constructor(
    public readonly code: TaskErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TaskManagerError";
  }
}

export function isTaskManagerError(err: unknown): err is TaskManagerError {
  return err instanceof TaskManagerError;
}
