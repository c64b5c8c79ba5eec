import { join } from "node:path";
import { readTextFile, writeFileAtomic } from "./files.js";
import { taskOverview, userOverview } from "./stats.js";
import type { TaskOverview, UserOverview } from "./stats.js";
import type { Task } from "./types.js";

export const TASK_OVERVIEW_FILE = "task_overview.txt";
export const USER_OVERVIEW_FILE = "user_overview.txt";

export interface ReportPaths {
  taskOverview: string;
  userOverview: string;
}

export interface ReportTexts {
  taskOverview: string;
  userOverview: string;
}

export function reportPaths(dir: string): ReportPaths {
  return {
    taskOverview: join(dir, TASK_OVERVIEW_FILE),
    userOverview: join(dir, USER_OVERVIEW_FILE),
  };
}

export function renderTaskOverview(o: TaskOverview): string {
  return [
    "Task Overview",
    `Total tasks: ${o.total}`,
    `Completed tasks: ${o.completed}`,
    `Uncompleted tasks: ${o.uncompleted}`,
    `Overdue uncompleted tasks: ${o.overdueUncompleted}`,
    `Incomplete percentage: ${o.incompletePercent}%`,
    `Overdue percentage: ${o.overduePercent}%`,
    "",
  ].join("\n");
}

export function renderUserOverview(o: UserOverview): string {
  const lines = ["User Overview", `Total users: ${o.totalUsers}`, `Total tasks: ${o.totalTasks}`];
  for (const u of o.users) {
    lines.push(
      "",
      `User: ${u.username}`,
      `Tasks assigned: ${u.tasks}`,
      `Percentage of total tasks: ${u.percentOfTotal}%`,
      `Percentage completed: ${u.percentCompleted}%`,
      `Percentage incomplete: ${u.percentIncomplete}%`,
      `Percentage overdue: ${u.percentOverdue}%`
    );
  }
  lines.push("");
  return lines.join("\n");
}

export async function writeReports(
  dir: string,
  tasks: Task[],
  users: string[],
  today: string
): Promise<ReportPaths> {
  const paths = reportPaths(dir);
  await writeFileAtomic(paths.taskOverview, renderTaskOverview(taskOverview(tasks, today)));
  await writeFileAtomic(paths.userOverview, renderUserOverview(userOverview(tasks, users, today)));
  return paths;
}

/** Both report texts, or `null` when either file is missing. */
export async function readReports(dir: string): Promise<ReportTexts | null> {
  const paths = reportPaths(dir);
  const taskText = await readTextFile(paths.taskOverview);
  const userText = await readTextFile(paths.userOverview);
  if (taskText === null || userText === null) return null;
  return { taskOverview: taskText, userOverview: userText };
}
