import { copyFile } from "node:fs/promises";
import { codecForPath } from "./codec.js";
import type { TaskCodec } from "./codec.js";
import { formatDate, isOverdue } from "./dates.js";
import { TaskManagerError } from "./errors.js";
import { errorMessage, readTextFile, writeFileAtomic } from "./files.js";
import { parseInput, taskCreateSchema, taskUpdateSchema } from "./schema.js";
import type {
  Task,
  TaskCreateInput,
  TaskDocument,
  TaskFilter,
  TaskStats,
  TaskUpdateInput,
} from "./types.js";
import { DEFAULT_DOCUMENT, TASK_ID_PREFIX } from "./types.js";

export interface StoreOptions {
  /** Defaults to the codec matching the file extension */
  codec?: TaskCodec;
  now?: () => Date;
}

export class Store {
  private data: TaskDocument;
  private readonly filePath: string;
  private readonly codec: TaskCodec;
  private readonly now: () => Date;
  private queue: Promise<unknown> = Promise.resolve();
  /** Problems found while loading; the affected entries were skipped. */
  readonly warnings: readonly string[];

  private constructor(
    filePath: string,
    codec: TaskCodec,
    now: () => Date,
    data: TaskDocument,
    warnings: string[]
  ) {
    this.filePath = filePath;
    this.codec = codec;
    this.now = now;
    this.data = data;
    this.warnings = warnings;
  }

  static async load(filePath: string, options: StoreOptions = {}): Promise<Store> {
    const codec = options.codec ?? codecForPath(filePath);
    const now = options.now ?? (() => new Date());

    const raw = await readTextFile(filePath);
    if (raw === null) {
      console.error(`[task-cli] ${filePath} not found, creating an empty task file`);
      const store = new Store(filePath, codec, now, structuredClone(DEFAULT_DOCUMENT), []);
      await store.write(store.data);
      return store;
    }

    try {
      const { document, warnings } = codec.decode(raw);
      for (const warning of warnings) {
        console.error(`[task-cli] ${filePath}: ${warning}`);
      }
      return new Store(filePath, codec, now, document, warnings);
    } catch (err) {
      if (!(err instanceof TaskManagerError) || err.code !== "CORRUPT_FILE") throw err;
      const backupPath = `${filePath}.corrupt.${Date.now()}`;
      try {
        await copyFile(filePath, backupPath);
      } catch (copyErr) {
        throw new TaskManagerError(
          "STORAGE",
          `${err.message}; could not back it up: ${errorMessage(copyErr)}`,
          { cause: copyErr }
        );
      }
      console.error(`[task-cli] ${err.message}. Backup: ${backupPath}. Starting empty.`);
      return new Store(filePath, codec, now, structuredClone(DEFAULT_DOCUMENT), [err.message]);
    }
  }

  get path(): string {
    return this.filePath;
  }

  today(): string {
    return formatDate(this.now());
  }

  async add(input: TaskCreateInput): Promise<Task> {
    return this.commit((doc) => {
      const parsed = parseInput(taskCreateSchema, input);
      const task: Task = {
        id: `${TASK_ID_PREFIX}${doc.nextId}`,
        title: parsed.title,
        description: parsed.description,
        assignee: parsed.assignee,
        status: "pending",
        priority: parsed.priority,
        assignedDate: this.today(),
        dueDate: parsed.dueDate,
      };
      doc.tasks.push(task);
      doc.nextId++;
      return { ...task };
    });
  }

  async update(id: string, changes: TaskUpdateInput): Promise<Task> {
    return this.commit((doc) => {
      const task = doc.tasks.find((t) => t.id === id);
      if (!task) throw new TaskManagerError("NOT_FOUND", `Task ${id} not found`);
      const parsed = parseInput(taskUpdateSchema, changes);

      const edited = Object.entries(parsed).filter(([, value]) => value !== undefined);
      if (edited.length === 0) {
        throw new TaskManagerError("INVALID_INPUT", "Nothing to update");
      }
      // a completed task only takes edits together with reopening it
      if (
        task.status === "done" &&
        parsed.status !== "pending" &&
        edited.some(([key]) => key !== "status")
      ) {
        throw new TaskManagerError("TASK_COMPLETED", `Task ${id} is completed and cannot be edited`);
      }

      if (parsed.title !== undefined) task.title = parsed.title;
      if (parsed.description !== undefined) task.description = parsed.description;
      if (parsed.assignee !== undefined) task.assignee = parsed.assignee;
      if (parsed.priority !== undefined) task.priority = parsed.priority;
      if (parsed.dueDate !== undefined) task.dueDate = parsed.dueDate;
      if (parsed.status !== undefined) task.status = parsed.status;
      return { ...task };
    });
  }

  async complete(id: string): Promise<Task> {
    return this.update(id, { status: "done" });
  }

  async reopen(id: string): Promise<Task> {
    return this.update(id, { status: "pending" });
  }

  async remove(id: string): Promise<Task> {
    return this.commit((doc) => {
      const removed = doc.tasks.find((t) => t.id === id);
      if (!removed) throw new TaskManagerError("NOT_FOUND", `Task ${id} not found`);
      doc.tasks = doc.tasks.filter((t) => t.id !== id);
      return { ...removed };
    });
  }

  find(id: string): Task | undefined {
    const task = this.data.tasks.find((t) => t.id === id);
    return task ? { ...task } : undefined;
  }

  get(id: string): Task {
    const task = this.find(id);
    if (!task) throw new TaskManagerError("NOT_FOUND", `Task ${id} not found`);
    return task;
  }

  list(filter: TaskFilter = {}): Task[] {
    const today = this.today();
    let result = this.data.tasks.map((t) => ({ ...t }));
    if (filter.status) {
      result = result.filter((t) => t.status === filter.status);
    }
    if (filter.priority) {
      result = result.filter((t) => t.priority === filter.priority);
    }
    if (filter.assignee) {
      result = result.filter((t) => t.assignee === filter.assignee);
    }
    if (filter.overdue) {
      result = result.filter((t) => isOverdue(t, today));
    }
    return result;
  }

  stats(): TaskStats {
    const tasks = this.data.tasks;
    const today = this.today();
    return {
      total: tasks.length,
      pending: tasks.filter((t) => t.status === "pending").length,
      done: tasks.filter((t) => t.status === "done").length,
      overdue: tasks.filter((t) => isOverdue(t, today)).length,
    };
  }

  /**
   * Applies `mutate` to a copy, persists it, then swaps it in. Commits run
   * one at a time, each starting from the state the previous one left.
   */
  private commit<T>(mutate: (doc: TaskDocument) => T): Promise<T> {
    const run = async (): Promise<T> => {
      const draft = structuredClone(this.data);
      const result = mutate(draft);
      await this.write(draft);
      this.data = draft;
      return result;
    };
    const next = this.queue.then(run, run);
    this.queue = next;
    return next;
  }

  private async write(doc: TaskDocument): Promise<void> {
    await writeFileAtomic(this.filePath, this.codec.encode(doc));
  }
}
