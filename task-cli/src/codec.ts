import { extname } from "node:path";
import { TaskManagerError } from "./errors.js";
import { describeIssues, taskDocumentSchema, taskSchema } from "./schema.js";
import type { Task, TaskDocument } from "./types.js";
import { TASK_ID_PREFIX } from "./types.js";

export interface DecodeResult {
  document: TaskDocument;
  /** Lines or entries that were skipped, as `line <n>: <reason>` */
  warnings: string[];
}

export interface TaskCodec {
  readonly name: "text" | "json";
  encode(doc: TaskDocument): string;
  decode(raw: string): DecodeResult;
}

export function idNumber(id: string): number {
  return Number(id.slice(TASK_ID_PREFIX.length));
}

function nextIdAfter(tasks: Task[], declared: number | null): number {
  const highest = tasks.reduce((max, t) => Math.max(max, idNumber(t.id)), 0);
  return Math.max(declared ?? 1, highest + 1);
}

// --- text ---

const HEADER_PATTERN = /^#\s*tasks v1 next-id=(\d+)\s*$/;
const FIELD_SEPARATOR = ", ";
// lines written by this codec lead with their id; older lines carry no escapes
const ID_LEAD_PATTERN = /^T-\d+,/;

export function escapeField(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/,/g, "\\,")
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r");
}

/** Splits on unescaped commas, dropping one space after each separator. */
export function splitFields(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === "\\" && i + 1 < line.length) {
      const next = line[++i];
      current += next === "n" ? "\n" : next === "r" ? "\r" : next;
      continue;
    }
    if (ch === ",") {
      fields.push(current);
      current = "";
      if (line[i + 1] === " ") i++;
      continue;
    }
    current += ch;
  }
  fields.push(current);
  return fields;
}

function encodeLine(task: Task): string {
  return [
    task.id,
    task.assignee,
    task.title,
    task.description,
    task.priority,
    task.assignedDate,
    task.dueDate ?? "",
    task.status === "done" ? "Yes" : "No",
  ]
    .map(escapeField)
    .join(FIELD_SEPARATOR);
}

type LineResult =
  | { ok: true; id: string | null; task: Omit<Task, "id"> }
  | { ok: false; reason: string };

const legacyTaskSchema = taskSchema.omit({ id: true });

function completedFlag(value: string): Task["status"] | null {
  if (value === "Yes") return "done";
  if (value === "No") return "pending";
  return null;
}

function parseLine(fields: string[]): LineResult {
  let id: string | null;
  let candidate: Record<string, unknown>;
  let flag: string;

  if (fields.length === 8) {
    const [rawId, assignee, title, description, priority, assignedDate, dueDate, completed] = fields;
    id = rawId;
    flag = completed;
    candidate = { id, assignee, title, description, priority, assignedDate, dueDate: dueDate || null };
  } else if (fields.length === 6) {
    // layout written by the earlier tool: no id, no priority
    const [assignee, title, description, assignedDate, dueDate, completed] = fields;
    id = null;
    flag = completed;
    candidate = { assignee, title, description, priority: "medium", assignedDate, dueDate: dueDate || null };
  } else {
    return { ok: false, reason: `expected 8 (or 6) fields, found ${fields.length}` };
  }

  const status = completedFlag(flag);
  if (!status) {
    return { ok: false, reason: `completed flag must be Yes or No, got "${flag}"` };
  }
  candidate.status = status;

  if (id === null) {
    const parsed = legacyTaskSchema.safeParse(candidate);
    if (!parsed.success) return { ok: false, reason: describeIssues(parsed.error) };
    return { ok: true, id: null, task: parsed.data };
  }
  const parsed = taskSchema.safeParse(candidate);
  if (!parsed.success) return { ok: false, reason: describeIssues(parsed.error) };
  const { id: _id, ...task } = parsed.data;
  return { ok: true, id, task };
}

export const textCodec: TaskCodec = {
  name: "text",

  encode(doc: TaskDocument): string {
    const lines = [`# tasks v1 next-id=${doc.nextId}`, ...doc.tasks.map(encodeLine)];
    return lines.join("\n") + "\n";
  },

  decode(raw: string): DecodeResult {
    const warnings: string[] = [];
    const entries: Array<{ id: string | null; task: Omit<Task, "id"> }> = [];
    const seen = new Set<string>();
    let declaredNextId: number | null = null;

    const lines = raw.replace(/^\uFEFF/, "").split(/\r?\n/);
    for (const [index, line] of lines.entries()) {
      const lineNo = index + 1;
      if (line.trim() === "") continue;
      if (line.startsWith("#")) {
        const header = HEADER_PATTERN.exec(line);
        if (header) declaredNextId = Number(header[1]);
        continue;
      }
      const fields = ID_LEAD_PATTERN.test(line) ? splitFields(line) : line.split(FIELD_SEPARATOR);
      const result = parseLine(fields);
      if (!result.ok) {
        warnings.push(`line ${lineNo}: ${result.reason}`);
        continue;
      }
      if (result.id !== null) {
        if (seen.has(result.id)) {
          warnings.push(`line ${lineNo}: duplicate id ${result.id}`);
          continue;
        }
        seen.add(result.id);
      }
      entries.push({ id: result.id, task: result.task });
    }

    const withIds = entries.flatMap((e) => (e.id === null ? [] : [{ id: e.id, ...e.task }]));
    let nextId = nextIdAfter(withIds, declaredNextId);
    const tasks: Task[] = entries.map((e) => {
      if (e.id !== null) return { id: e.id, ...e.task };
      return { id: `${TASK_ID_PREFIX}${nextId++}`, ...e.task };
    });

    return { document: { nextId, tasks }, warnings };
  },
};

// --- json ---

export const jsonCodec: TaskCodec = {
  name: "json",

  encode(doc: TaskDocument): string {
    return JSON.stringify({ version: 1, nextId: doc.nextId, tasks: doc.tasks }, null, 2) + "\n";
  },

  decode(raw: string): DecodeResult {
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new TaskManagerError("CORRUPT_FILE", "task file is not valid JSON", { cause: err });
    }
    const parsed = taskDocumentSchema.safeParse(data);
    if (!parsed.success) {
      throw new TaskManagerError("CORRUPT_FILE", `task file is invalid: ${describeIssues(parsed.error)}`);
    }

    const seen = new Set<string>();
    for (const task of parsed.data.tasks) {
      if (seen.has(task.id)) {
        throw new TaskManagerError("CORRUPT_FILE", `task file is invalid: duplicate id ${task.id}`);
      }
      seen.add(task.id);
    }

    const warnings: string[] = [];
    const nextId = nextIdAfter(parsed.data.tasks, parsed.data.nextId);
    if (nextId !== parsed.data.nextId) {
      warnings.push(`nextId ${parsed.data.nextId} is taken, using ${nextId}`);
    }
    return { document: { nextId, tasks: parsed.data.tasks }, warnings };
  },
};

export function codecForPath(filePath: string): TaskCodec {
  return extname(filePath).toLowerCase() === ".json" ? jsonCodec : textCodec;
}
