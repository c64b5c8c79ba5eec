import type { Config, Store, TaskFilter, TaskPriority, UserRegistry } from "@tasktrack/cli";

export interface ToolResult<T = unknown> {
  ok: boolean;
  message?: string;
  error?: string;
  data?: T;
}

/** What every tool works against; loaded once when the server starts. */
export interface ToolContext {
  store: Store;
  users: UserRegistry;
  config: Config;
}

// --- Tool inputs ---

export interface TaskAddInput {
  title: string;
  description?: string;
  /** Defaults to the configured user */
  assignee?: string;
  priority?: TaskPriority;
  dueDate?: string | null;
}

export interface TaskEditInput {
  taskId: string;
  title?: string;
  description?: string;
  assignee?: string;
  priority?: TaskPriority;
  /** `null` clears the due date */
  dueDate?: string | null;
}

export interface TaskIdInput {
  taskId: string;
}

export type ListTasksInput = TaskFilter;

export interface UserRegisterInput {
  name: string;
}
