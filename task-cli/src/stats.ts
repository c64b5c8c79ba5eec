import { isOverdue } from "./dates.js";
import type { Task } from "./types.js";

export interface TaskOverview {
  total: number;
  completed: number;
  uncompleted: number;
  overdueUncompleted: number;
  incompletePercent: number;
  overduePercent: number;
}

export interface UserSummary {
  username: string;
  tasks: number;
  completed: number;
  /** pending and past due */
  overdue: number;
  percentOfTotal: number;
  percentCompleted: number;
  percentIncomplete: number;
  percentOverdue: number;
}

export interface UserOverview {
  totalUsers: number;
  totalTasks: number;
  users: UserSummary[];
}

/** `part / whole` as a percentage with two decimals; 0 when `whole` is 0. */
export function percent(part: number, whole: number): number {
  if (whole === 0) return 0;
  return Math.round((part / whole) * 10000) / 100;
}

export function taskOverview(tasks: Task[], today: string): TaskOverview {
  const total = tasks.length;
  const completed = tasks.filter((t) => t.status === "done").length;
  const uncompleted = total - completed;
  const overdueUncompleted = tasks.filter((t) => isOverdue(t, today)).length;

  return {
    total,
    completed,
    uncompleted,
    overdueUncompleted,
    incompletePercent: percent(uncompleted, total),
    overduePercent: percent(overdueUncompleted, total),
  };
}

// Tasks whose assignee is not registered only count towards totalTasks.
export function userOverview(tasks: Task[], users: string[], today: string): UserOverview {
  const summaries = users.map((username): UserSummary => {
    const own = tasks.filter((t) => t.assignee === username);
    const completed = own.filter((t) => t.status === "done").length;
    const overdue = own.filter((t) => isOverdue(t, today)).length;
    return {
      username,
      tasks: own.length,
      completed,
      overdue,
      percentOfTotal: percent(own.length, tasks.length),
      percentCompleted: percent(completed, own.length),
      percentIncomplete: percent(own.length - completed, own.length),
      percentOverdue: percent(overdue, own.length),
    };
  });

  return {
    totalUsers: users.length,
    totalTasks: tasks.length,
    users: summaries,
  };
}
