import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { rm } from "node:fs/promises";
import { loadConfig, Store, UserRegistry } from "@tasktrack/cli";
import { getTask, listTasks, taskStats } from "../tools/query.js";
import { taskAdd, taskComplete } from "../tools/task.js";
import { userRegister } from "../tools/users.js";
import type { ToolContext } from "../types.js";

const TEST_DIR = "/tmp/task-mcp-test-query";
const NOW = new Date(2026, 9, 19);
let ctx: ToolContext;

beforeEach(async () => {
  await rm(TEST_DIR, { recursive: true, force: true });
  const config = loadConfig({ TASKS_FILE: `${TEST_DIR}/tasks.txt` });
  ctx = {
    store: await Store.load(config.tasksFile, { now: () => NOW }),
    users: await UserRegistry.load(config.usersFile),
    config,
  };

  await userRegister(ctx, { name: "bob" });
  await taskAdd(ctx, { title: "Plan", priority: "high" });
  await taskAdd(ctx, { title: "Build", assignee: "bob", dueDate: "2026-10-01" });
  await taskAdd(ctx, { title: "Ship", dueDate: "2026-10-19" });
  await taskComplete(ctx, { taskId: "T-1" });
});

afterEach(async () => {
  await rm(TEST_DIR, { recursive: true, force: true });
});

const ids = (tasks: Array<{ id: string }> | undefined): string[] =>
  (tasks ?? []).map((t) => t.id);

describe("list_tasks", () => {
  it("lists every task in creation order", async () => {
    const result = await listTasks(ctx, {});
    expect(result.message).toBe("3 task(s)");
    expect(ids(result.data)).toEqual(["T-1", "T-2", "T-3"]);
  });

  it("filters by status, priority and assignee", async () => {
    expect(ids((await listTasks(ctx, { status: "pending" })).data)).toEqual(["T-2", "T-3"]);
    expect(ids((await listTasks(ctx, { priority: "high" })).data)).toEqual(["T-1"]);
    expect(ids((await listTasks(ctx, { assignee: "bob" })).data)).toEqual(["T-2"]);
  });

  it("counts a task due today as not overdue", async () => {
    expect(ids((await listTasks(ctx, { overdue: true })).data)).toEqual(["T-2"]);
  });
});

describe("get_task", () => {
  it("returns the task", async () => {
    const result = await getTask(ctx, { taskId: "T-2" });
    expect(result.ok).toBe(true);
    expect(result.data).toMatchObject({ title: "Build", assignee: "bob" });
  });
});

describe("task_stats", () => {
  it("counts tasks by status", async () => {
    expect(await taskStats(ctx)).toEqual({
      ok: true,
      message: "3 tasks: 2 pending, 1 done, 1 overdue",
      data: { total: 3, pending: 2, done: 1, overdue: 1 },
    });
  });
});
