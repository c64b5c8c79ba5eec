export type TaskStatus = "pending" | "done";
export type TaskPriority = "high" | "medium" | "low";

export interface Task {
  id: string;
  title: string;
  description: string;
  assignee: string;
  status: TaskStatus;
  priority: TaskPriority;
  /** YYYY-MM-DD, local date the task was created */
  assignedDate: string;
  /** YYYY-MM-DD */
  dueDate: string | null;
}

/** Everything the task file holds. */
export interface TaskDocument {
  nextId: number;
  tasks: Task[];
}

export interface TaskCreateInput {
  title: string;
  description?: string;
  assignee: string;
  priority?: TaskPriority;
  dueDate?: string | null;
}

export interface TaskUpdateInput {
  title?: string;
  description?: string;
  assignee?: string;
  priority?: TaskPriority;
  dueDate?: string | null;
  status?: TaskStatus;
}

export interface TaskFilter {
  status?: TaskStatus;
  priority?: TaskPriority;
  assignee?: string;
  overdue?: boolean;
}

export interface TaskStats {
  total: number;
  pending: number;
  done: number;
  overdue: number;
}

export const TASK_ID_PREFIX = "T-";

export const DEFAULT_DOCUMENT: TaskDocument = {
  nextId: 1,
  tasks: [],
};
