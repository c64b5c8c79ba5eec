import type { Task } from "@tasktrack/cli";
import type { TaskAddInput, TaskEditInput, TaskIdInput, ToolContext, ToolResult } from "../types.js";
import { attempt } from "./result.js";

export async function taskAdd(ctx: ToolContext, input: TaskAddInput): Promise<ToolResult<Task>> {
  return attempt(async () => {
    const assignee = input.assignee ?? ctx.config.user;
    ctx.users.assertKnown(assignee);
    const task = await ctx.store.add({ ...input, assignee });
    return {
      ok: true,
      message: `Created ${task.id} "${task.title}" for ${task.assignee}`,
      data: task,
    };
  });
}

export async function taskUpdate(ctx: ToolContext, input: TaskEditInput): Promise<ToolResult<Task>> {
  return attempt(async () => {
    const { taskId, ...changes } = input;
    if (changes.assignee !== undefined) ctx.users.assertKnown(changes.assignee);
    const task = await ctx.store.update(taskId, changes);
    return { ok: true, message: `Updated ${task.id}`, data: task };
  });
}

export async function taskComplete(ctx: ToolContext, input: TaskIdInput): Promise<ToolResult<Task>> {
  return attempt(async () => {
    const task = await ctx.store.complete(input.taskId);
    return { ok: true, message: `Completed ${task.id} "${task.title}"`, data: task };
  });
}

export async function taskReopen(ctx: ToolContext, input: TaskIdInput): Promise<ToolResult<Task>> {
  return attempt(async () => {
    const task = await ctx.store.reopen(input.taskId);
    return { ok: true, message: `Reopened ${task.id} "${task.title}"`, data: task };
  });
}

export async function taskDelete(ctx: ToolContext, input: TaskIdInput): Promise<ToolResult<Task>> {
  return attempt(async () => {
    const task = await ctx.store.remove(input.taskId);
    return { ok: true, message: `Removed ${task.id} "${task.title}"`, data: task };
  });
}
