import type { z } from "zod";
import type { Config } from "./config.js";
import { useColor } from "./config.js";
import { TaskManagerError } from "./errors.js";
import { formatStats, formatTaskDetail, formatTaskList } from "./formatter.js";
import { readReports, writeReports } from "./reports.js";
import { prioritySchema, statusSchema } from "./schema.js";
import { Store } from "./store.js";
import type { TaskFilter, TaskUpdateInput } from "./types.js";
import { UserRegistry } from "./users.js";

const HELP = `
task-cli - Simple task management

Usage:
  task-cli add <title> [--assignee user] [--description text] [--due YYYY-MM-DD] [--priority high|medium|low]
  task-cli list [--status pending|done] [--assignee user] [--priority p] [--overdue] [--mine]
  task-cli show <id>        Show all fields of a task
  task-cli edit <id> [--title t] [--description d] [--assignee u] [--due YYYY-MM-DD|none] [--priority p]
  task-cli done <id>        Mark a task as done
  task-cli reopen <id>      Mark a task as pending again
  task-cli remove <id>      Remove a task
  task-cli stats            Show task statistics
  task-cli report [--show]  Write task_overview.txt and user_overview.txt (--show prints them)
  task-cli users            List users
  task-cli user-add <name>  Register a user
  task-cli shell            Interactive prompt
  task-cli help             Show this help

Environment:
  TASKS_FILE (tasks.txt), TASKS_USERS_FILE, TASKS_REPORT_DIR, TASKS_USER (admin), TASKS_COLOR (auto)
`.trim();

const BOOLEAN_FLAGS = new Set(["overdue", "mine", "show"]);

interface ParsedArgs {
  command: string;
  positional: string[];
  flags: Record<string, string>;
  switches: Set<string>;
}

function usageError(message: string): TaskManagerError {
  return new TaskManagerError("INVALID_INPUT", message);
}

function parseArgs(args: string[]): ParsedArgs {
  const command = args[0] ?? "help";
  const positional: string[] = [];
  const flags: Record<string, string> = {};
  const switches = new Set<string>();

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith("--")) {
      const key = arg.slice(2);
      if (BOOLEAN_FLAGS.has(key)) {
        switches.add(key);
        continue;
      }
      const value = args[++i];
      if (value === undefined) throw usageError(`--${key} needs a value`);
      flags[key] = value;
    } else {
      positional.push(arg);
    }
  }

  return { command, positional, flags, switches };
}

function enumFlag<U extends [string, ...string[]]>(
  schema: z.ZodEnum<U>,
  flag: string,
  value: string | undefined
): U[number] | undefined {
  if (value === undefined) return undefined;
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw usageError(`--${flag} must be one of ${schema.options.join(", ")}`);
  }
  return parsed.data;
}

function requireId(positional: string[]): string {
  const id = positional[0];
  if (!id) throw usageError("task ID is required");
  return id;
}

export interface RunOptions {
  /** Whether stdout is a terminal; decides colour in "auto" mode */
  isTTY?: boolean;
}

export async function run(args: string[], config: Config, options: RunOptions = {}): Promise<string> {
  const { command, positional, flags, switches } = parseArgs(args);
  const color = useColor(config.color, options.isTTY ?? false);

  switch (command) {
    case "add": {
      const title = positional.join(" ");
      if (!title.trim()) throw usageError("title is required");
      const store = await Store.load(config.tasksFile);
      const users = await UserRegistry.load(config.usersFile);
      const assignee = flags.assignee ?? config.user;
      users.assertKnown(assignee);
      const task = await store.add({
        title,
        description: flags.description,
        assignee,
        priority: enumFlag(prioritySchema, "priority", flags.priority),
        dueDate: flags.due,
      });
      return `Created: ${task.id} "${task.title}" for ${task.assignee}`;
    }

    case "list": {
      const store = await Store.load(config.tasksFile);
      const filter: TaskFilter = {
        status: enumFlag(statusSchema, "status", flags.status),
        priority: enumFlag(prioritySchema, "priority", flags.priority),
        assignee: switches.has("mine") ? config.user : flags.assignee,
        overdue: switches.has("overdue"),
      };
      return formatTaskList(store.list(filter), { color, today: store.today() });
    }

    case "show": {
      const store = await Store.load(config.tasksFile);
      return formatTaskDetail(store.get(requireId(positional)));
    }

    case "edit": {
      const id = requireId(positional);
      const store = await Store.load(config.tasksFile);
      const changes: TaskUpdateInput = {
        title: flags.title,
        description: flags.description,
        priority: enumFlag(prioritySchema, "priority", flags.priority),
      };
      if (flags.due !== undefined) {
        changes.dueDate = flags.due === "none" ? null : flags.due;
      }
      if (flags.assignee !== undefined) {
        const users = await UserRegistry.load(config.usersFile);
        users.assertKnown(flags.assignee);
        changes.assignee = flags.assignee;
      }
      const task = await store.update(id, changes);
      return `Updated: ${task.id} "${task.title}"`;
    }

    case "done": {
      const id = requireId(positional);
      const store = await Store.load(config.tasksFile);
      const task = await store.complete(id);
      return `Completed: ${task.id} "${task.title}"`;
    }

    case "reopen": {
      const id = requireId(positional);
      const store = await Store.load(config.tasksFile);
      const task = await store.reopen(id);
      return `Reopened: ${task.id} "${task.title}"`;
    }

    case "remove": {
      const id = requireId(positional);
      const store = await Store.load(config.tasksFile);
      const task = await store.remove(id);
      return `Removed: ${task.id} "${task.title}"`;
    }

    case "stats": {
      const store = await Store.load(config.tasksFile);
      return formatStats(store.stats());
    }

    case "report": {
      const store = await Store.load(config.tasksFile);
      const users = await UserRegistry.load(config.usersFile);
      const generate = () => writeReports(config.reportDir, store.list(), users.list(), store.today());

      if (!switches.has("show")) {
        const paths = await generate();
        return `Reports generated: ${paths.taskOverview}, ${paths.userOverview}`;
      }
      let texts = await readReports(config.reportDir);
      if (!texts) {
        console.error("[task-cli] reports not found, generating them first");
        await generate();
        texts = await readReports(config.reportDir);
      }
      if (!texts) throw new TaskManagerError("STORAGE", "Could not read the generated reports");
      return [
        "=== Task Overview ===",
        texts.taskOverview.trimEnd(),
        "",
        "=== User Overview ===",
        texts.userOverview.trimEnd(),
      ].join("\n");
    }

    case "users": {
      const users = await UserRegistry.load(config.usersFile);
      return users
        .list()
        .map((u) => (u === config.user ? `* ${u}` : `  ${u}`))
        .join("\n");
    }

    case "user-add": {
      const name = positional[0];
      if (!name) throw usageError("user name is required");
      const users = await UserRegistry.load(config.usersFile);
      const registered = await users.register(name);
      return `Registered: ${registered}`;
    }

    case "shell":
      throw usageError("shell can only be started from the command line");

    case "help":
      return HELP;

    default:
      throw usageError(`Unknown command: ${command}\n\n${HELP}`);
  }
}
