import { isOverdue } from "./dates.js";
import type { Task, TaskPriority, TaskStats, TaskStatus } from "./types.js";

const STATUS_ICONS: Record<TaskStatus, string> = {
  pending: "[ ]",
  done: "[x]",
};

const PRIORITY_COLORS: Record<TaskPriority, string> = {
  high: "\x1b[31m",
  medium: "\x1b[33m",
  low: "\x1b[36m",
};

const RESET = "\x1b[0m";
const BOLD_RED = "\x1b[1;31m";

const LABEL_WIDTH = 18;

export interface FormatOptions {
  color?: boolean;
  /** YYYY-MM-DD; overdue tasks are only flagged when given */
  today?: string;
}

export function formatTask(task: Task, options: FormatOptions = {}): string {
  const { color = false, today } = options;
  const icon = STATUS_ICONS[task.status];
  const id = color ? `${PRIORITY_COLORS[task.priority]}${task.id}${RESET}` : task.id;
  const due = task.dueDate ? ` due ${task.dueDate}` : "";
  let flag = "";
  if (today && isOverdue(task, today)) {
    flag = color ? ` ${BOLD_RED}OVERDUE${RESET}` : " OVERDUE";
  }
  return `${icon} ${id} (${task.priority}) ${task.title} @${task.assignee}${due}${flag}`;
}

export function formatTaskList(tasks: Task[], options: FormatOptions = {}): string {
  if (tasks.length === 0) return "No tasks found.";
  return tasks.map((t) => formatTask(t, options)).join("\n");
}

/** Bordered box with one labelled row per field. */
export function formatTaskDetail(task: Task): string {
  const rows: Array<[string, string]> = [
    ["Task", task.title],
    ["ID", task.id],
    ["Assigned to", task.assignee],
    ["Description", task.description],
    ["Priority", task.priority],
    ["Assigned on", task.assignedDate],
    ["Due by", task.dueDate ?? "-"],
    ["Completed", task.status === "done" ? "Yes" : "No"],
  ];
  const lines = rows.map(
    ([label, value]) => `${label.padEnd(LABEL_WIDTH)}${value.replace(/\r?\n/g, " ")}`
  );
  const width = Math.max(...lines.map((l) => l.length));
  const border = `+${"-".repeat(width + 2)}+`;
  return [border, ...lines.map((l) => `| ${l.padEnd(width)} |`), border].join("\n");
}

export function formatStats(stats: TaskStats): string {
  const bar = (count: number, total: number): string => {
    if (total === 0) return "[----------]";
    const filled = Math.round((count / total) * 10);
    return `[${"#".repeat(filled)}${"-".repeat(10 - filled)}]`;
  };

  return [
    `Total: ${stats.total}`,
    `  Pending: ${stats.pending} ${bar(stats.pending, stats.total)}`,
    `  Done:    ${stats.done} ${bar(stats.done, stats.total)}`,
    `  Overdue: ${stats.overdue}`,
  ].join("\n");
}
