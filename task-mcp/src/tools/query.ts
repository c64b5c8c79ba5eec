import type { Task, TaskStats } from "@tasktrack/cli";
import type { ListTasksInput, TaskIdInput, ToolContext, ToolResult } from "../types.js";
import { attempt } from "./result.js";

// --- list_tasks ---

export async function listTasks(
  ctx: ToolContext,
  input: ListTasksInput
): Promise<ToolResult<Task[]>> {
  const tasks = ctx.store.list(input);
  return { ok: true, message: `${tasks.length} task(s)`, data: tasks };
}

// --- get_task ---

export async function getTask(ctx: ToolContext, input: TaskIdInput): Promise<ToolResult<Task>> {
  return attempt(async () => ({ ok: true, data: ctx.store.get(input.taskId) }));
}

// --- task_stats ---

export async function taskStats(ctx: ToolContext): Promise<ToolResult<TaskStats>> {
  const stats = ctx.store.stats();
  return {
    ok: true,
    message: `${stats.total} tasks: ${stats.pending} pending, ${stats.done} done, ${stats.overdue} overdue`,
    data: stats,
  };
}
