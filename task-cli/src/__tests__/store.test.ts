import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile, readdir, rm, writeFile } from "node:fs/promises";
import { Store } from "../store.js";

const TEST_DIR = "/tmp/task-cli-test-store";
const TEST_FILE = `${TEST_DIR}/tasks.txt`;

// 2026-10-19, local time
const now = () => new Date(2026, 9, 19, 12, 0, 0);

let store: Store;

beforeEach(async () => {
  store = await Store.load(TEST_FILE, { now });
});

afterEach(async () => {
  await rm(TEST_DIR, { recursive: true, force: true });
});

describe("Store", () => {
  it("starts empty and creates the file", async () => {
    expect(store.list()).toEqual([]);
    expect(store.stats()).toEqual({ total: 0, pending: 0, done: 0, overdue: 0 });
    expect(await readFile(TEST_FILE, "utf-8")).toBe("# tasks v1 next-id=1\n");
  });

  it("adds a task with defaults", async () => {
    const task = await store.add({ title: "Buy milk", assignee: "admin" });
    expect(task).toEqual({
      id: "T-1",
      title: "Buy milk",
      description: "",
      assignee: "admin",
      status: "pending",
      priority: "medium",
      assignedDate: "2026-10-19",
      dueDate: null,
    });
  });

  it("writes one escaped line per task", async () => {
    await store.add({
      title: "Write report, draft",
      description: "Q3",
      assignee: "alice",
      priority: "high",
      dueDate: "2026-10-20",
    });
    expect(await readFile(TEST_FILE, "utf-8")).toBe(
      "# tasks v1 next-id=2\nT-1, alice, Write report\\, draft, Q3, high, 2026-10-19, 2026-10-20, No\n"
    );
  });

  it("trims the title and rejects an empty one", async () => {
    const task = await store.add({ title: "  Tidy desk  ", assignee: "admin" });
    expect(task.title).toBe("Tidy desk");
    await expect(store.add({ title: "   ", assignee: "admin" })).rejects.toThrow(
      "title: must not be empty"
    );
  });

  it("rejects a due date that is not a calendar date", async () => {
    await expect(
      store.add({ title: "Leap", assignee: "admin", dueDate: "2026-02-30" })
    ).rejects.toMatchObject({
      code: "INVALID_INPUT",
      message: "dueDate: must be a date in YYYY-MM-DD format",
    });
  });

  it("never reuses an id after removal", async () => {
    await store.add({ title: "Task 1", assignee: "admin" });
    const t2 = await store.add({ title: "Task 2", assignee: "admin" });
    await store.remove(t2.id);
    const t3 = await store.add({ title: "Task 3", assignee: "admin" });
    expect(t3.id).toBe("T-3");
  });

  it("updates fields and keeps the id", async () => {
    const task = await store.add({ title: "Draft", assignee: "admin" });
    const updated = await store.update(task.id, {
      title: "Final",
      assignee: "alice",
      priority: "low",
      dueDate: "2026-11-01",
    });
    expect(updated).toEqual({ ...task, title: "Final", assignee: "alice", priority: "low", dueDate: "2026-11-01" });
    expect(store.get(task.id)).toEqual(updated);
  });

  it("clears a due date with null", async () => {
    const task = await store.add({ title: "Dated", assignee: "admin", dueDate: "2026-11-01" });
    const updated = await store.update(task.id, { dueDate: null });
    expect(updated.dueDate).toBeNull();
  });

  it("refuses an update without fields", async () => {
    const task = await store.add({ title: "Same", assignee: "admin" });
    await expect(store.update(task.id, {})).rejects.toThrow("Nothing to update");
  });

  it("throws on update of non-existent task", async () => {
    await expect(store.update("T-999", { title: "x" })).rejects.toMatchObject({
      code: "NOT_FOUND",
      message: "Task T-999 not found",
    });
  });

  it("does not edit a completed task unless it is reopened", async () => {
    const task = await store.add({ title: "Ship it", assignee: "admin" });
    await store.complete(task.id);

    await expect(store.update(task.id, { title: "Ship it again" })).rejects.toMatchObject({
      code: "TASK_COMPLETED",
    });

    const reopened = await store.update(task.id, { status: "pending", title: "Ship it again" });
    expect(reopened.status).toBe("pending");
    expect(reopened.title).toBe("Ship it again");
  });

  it("completes and reopens a task", async () => {
    const task = await store.add({ title: "Toggle", assignee: "admin" });
    expect((await store.complete(task.id)).status).toBe("done");
    expect((await store.reopen(task.id)).status).toBe("pending");
  });

  it("removes a task", async () => {
    const task = await store.add({ title: "Delete me", assignee: "admin" });
    await store.add({ title: "Keep me", assignee: "admin" });
    const removed = await store.remove(task.id);
    expect(removed.title).toBe("Delete me");
    expect(store.list().map((t) => t.id)).toEqual(["T-2"]);
  });

  it("throws on remove of non-existent task", async () => {
    await expect(store.remove("T-999")).rejects.toThrow("not found");
  });

  it("filters by status, priority, assignee and overdue", async () => {
    await store.add({ title: "Late", assignee: "alice", priority: "high", dueDate: "2026-10-18" });
    await store.add({ title: "Due today", assignee: "bob", dueDate: "2026-10-19" });
    const done = await store.add({ title: "Late but done", assignee: "alice", dueDate: "2026-10-01" });
    await store.complete(done.id);

    expect(store.list({ status: "done" }).map((t) => t.id)).toEqual(["T-3"]);
    expect(store.list({ priority: "high" }).map((t) => t.id)).toEqual(["T-1"]);
    expect(store.list({ assignee: "alice" }).map((t) => t.id)).toEqual(["T-1", "T-3"]);
    expect(store.list({ overdue: true }).map((t) => t.id)).toEqual(["T-1"]);
  });

  it("computes stats correctly", async () => {
    const t1 = await store.add({ title: "A", assignee: "admin", dueDate: "2026-01-01" });
    const t2 = await store.add({ title: "B", assignee: "admin" });
    await store.add({ title: "C", assignee: "admin", dueDate: "2026-10-01" });
    await store.complete(t2.id);

    expect(t1.id).toBe("T-1");
    expect(store.stats()).toEqual({ total: 3, pending: 2, done: 1, overdue: 2 });
  });

  it("runs overlapping writes one after another", async () => {
    const [a, b] = await Promise.all([
      store.add({ title: "A", assignee: "admin" }),
      store.add({ title: "B", assignee: "admin" }),
    ]);
    expect([a.id, b.id]).toEqual(["T-1", "T-2"]);

    const reloaded = await Store.load(TEST_FILE, { now });
    expect(reloaded.list().map((t) => `${t.id}:${t.title}`)).toEqual(["T-1:A", "T-2:B"]);
    expect(store.list().map((t) => `${t.id}:${t.title}`)).toEqual(["T-1:A", "T-2:B"]);
    expect(await readdir(TEST_DIR)).toEqual(["tasks.txt"]);
  });

  it("keeps committing after a rejected change", async () => {
    const results = await Promise.allSettled([
      store.update("T-9", { title: "Missing" }),
      store.add({ title: "After", assignee: "admin" }),
    ]);
    expect(results.map((r) => r.status)).toEqual(["rejected", "fulfilled"]);
    expect(store.get("T-1").title).toBe("After");
  });

  it("persists and restores data", async () => {
    await store.add({ title: "Persistent, with comma", assignee: "alice", priority: "high" });
    const t2 = await store.add({ title: "Second", description: "two\nlines", assignee: "bob" });
    await store.complete(t2.id);

    const store2 = await Store.load(TEST_FILE, { now });
    expect(store2.list()).toEqual(store.list());
    const t3 = await store2.add({ title: "Third", assignee: "admin" });
    expect(t3.id).toBe("T-3");
  });

  it("hands out copies", async () => {
    const task = await store.add({ title: "Original", assignee: "admin" });
    task.title = "Changed";
    store.list()[0].title = "Changed too";
    expect(store.get(task.id).title).toBe("Original");
  });

  it("finds a task by ID", async () => {
    const task = await store.add({ title: "Find me", assignee: "admin" });
    expect(store.find(task.id)).toBeDefined();
    expect(store.find("T-999")).toBeUndefined();
  });

  it("skips unreadable lines and reports them", async () => {
    await writeFile(
      TEST_FILE,
      "# tasks v1 next-id=3\nT-1, admin, Good, , low, 2026-10-01, , No\nnot a task\n",
      "utf-8"
    );
    const loaded = await Store.load(TEST_FILE, { now });
    expect(loaded.list().map((t) => t.title)).toEqual(["Good"]);
    expect(loaded.warnings).toEqual(["line 3: expected 8 (or 6) fields, found 1"]);
  });
});

describe("Store with a JSON file", () => {
  const JSON_FILE = `${TEST_DIR}/tasks.json`;

  it("stores a JSON document when the path ends in .json", async () => {
    const jsonStore = await Store.load(JSON_FILE, { now });
    await jsonStore.add({ title: "As JSON", assignee: "admin" });

    const persisted = JSON.parse(await readFile(JSON_FILE, "utf-8"));
    expect(persisted.version).toBe(1);
    expect(persisted.nextId).toBe(2);
    expect(persisted.tasks[0].title).toBe("As JSON");
  });

  it("backs up a corrupt file and starts empty", async () => {
    await writeFile(JSON_FILE, "{ not json", "utf-8");
    const jsonStore = await Store.load(JSON_FILE, { now });

    expect(jsonStore.list()).toEqual([]);
    expect(jsonStore.warnings).toEqual(["task file is not valid JSON"]);
    const files = await readdir(TEST_DIR);
    expect(files.some((f) => f.startsWith("tasks.json.corrupt."))).toBe(true);
  });
});
