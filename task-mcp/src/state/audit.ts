import { appendFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";

export interface AuditEntry {
  ts: string;
  tool: string;
  input: Record<string, unknown>;
  ok: boolean;
  error?: string;
}

/** Appends one JSON line per tool call to `audit.jsonl` beside the tasks file. */
export class AuditLog {
  private filePath: string;

  constructor(tasksFile: string) {
    this.filePath = join(dirname(tasksFile), "audit.jsonl");
  }

  async log(entry: AuditEntry): Promise<void> {
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, JSON.stringify(entry) + "\n", "utf-8");
    } catch (err) {
      // a lost audit line never fails the tool call
      const reason = err instanceof Error ? err.message : String(err);
      console.error(`[task-mcp] could not write ${this.filePath}: ${reason}`);
    }
  }

  getFilePath(): string {
    return this.filePath;
  }
}
