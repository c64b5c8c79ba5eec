import { TaskManagerError } from "./errors.js";
import { readTextFile, writeFileAtomic } from "./files.js";

export const DEFAULT_USER = "admin";

const USER_NAME_PATTERN = /^[^\s,]+$/;

/**
 * Names tasks can be assigned to, one per line in a plain text file.
 *
 * Lines in the older `name, password` layout are read by name only;
 * no credentials are kept.
 */
export class UserRegistry {
  private users: string[];
  private readonly filePath: string;
  private queue: Promise<unknown> = Promise.resolve();

  private constructor(filePath: string, users: string[]) {
    this.filePath = filePath;
    this.users = users;
  }

  static async load(filePath: string): Promise<UserRegistry> {
    const raw = await readTextFile(filePath);
    if (raw === null) {
      console.error(`[task-cli] ${filePath} not found, creating it with user "${DEFAULT_USER}"`);
      const registry = new UserRegistry(filePath, [DEFAULT_USER]);
      await registry.save(registry.users);
      return registry;
    }

    const users: string[] = [];
    for (const line of raw.replace(/^\uFEFF/, "").split(/\r?\n/)) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith("#")) continue;
      const name = trimmed.split(",")[0].trim();
      if (!USER_NAME_PATTERN.test(name)) {
        console.error(`[task-cli] ${filePath}: skipping invalid line "${trimmed}"`);
        continue;
      }
      if (!users.includes(name)) users.push(name);
    }
    return new UserRegistry(filePath, users);
  }

  has(name: string): boolean {
    return this.users.includes(name);
  }

  list(): string[] {
    return [...this.users];
  }

  assertKnown(name: string): void {
    if (!this.has(name)) {
      throw new TaskManagerError("UNKNOWN_USER", `User "${name}" does not exist`);
    }
  }

  async register(name: string): Promise<string> {
    const run = async (): Promise<string> => {
      const trimmed = name.trim();
      if (!USER_NAME_PATTERN.test(trimmed)) {
        throw new TaskManagerError(
          "INVALID_INPUT",
          "User name must be non-empty, without spaces or commas"
        );
      }
      if (this.has(trimmed)) {
        throw new TaskManagerError("DUPLICATE_USER", `User "${trimmed}" already exists`);
      }
      const next = [...this.users, trimmed];
      await this.save(next);
      this.users = next;
      return trimmed;
    };
    // registrations run one at a time so the duplicate check sees earlier ones
    const result = this.queue.then(run, run);
    this.queue = result;
    return result;
  }

  private async save(users: string[]): Promise<void> {
    await writeFileAtomic(this.filePath, users.map((u) => `${u}\n`).join(""));
  }
}
