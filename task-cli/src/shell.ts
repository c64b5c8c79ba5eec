import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { run } from "./cli.js";
import type { Config } from "./config.js";
import { isTaskManagerError, TaskManagerError } from "./errors.js";

export const PROMPT = "task> ";

const EXIT_COMMANDS = new Set(["exit", "quit"]);

/** Splits a line into arguments; understands quotes and backslash escapes. */
export function splitCommandLine(line: string): string[] {
  const args: string[] = [];
  let current = "";
  let inToken = false;
  let quote: string | null = null;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quote) {
      if (ch === quote) {
        quote = null;
      } else if (ch === "\\" && quote === '"' && i + 1 < line.length) {
        current += line[++i];
      } else {
        current += ch;
      }
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      inToken = true;
    } else if (ch === "\\" && i + 1 < line.length) {
      current += line[++i];
      inToken = true;
    } else if (/\s/.test(ch)) {
      if (inToken) {
        args.push(current);
        current = "";
        inToken = false;
      }
    } else {
      current += ch;
      inToken = true;
    }
  }

  if (quote) throw new TaskManagerError("INVALID_INPUT", `Unterminated ${quote} quote`);
  if (inToken) args.push(current);
  return args;
}

export interface ShellOptions {
  input: Readable;
  output: Writable;
  config: Config;
  isTTY?: boolean;
}

export async function runShell({ input, output, config, isTTY = false }: ShellOptions): Promise<void> {
  const rl = createInterface({ input, terminal: false });
  output.write('task-cli shell. Type "help" for commands, "exit" to leave.\n');
  output.write(PROMPT);

  try {
    for await (const line of rl) {
      try {
        const args = splitCommandLine(line);
        if (args.length > 0) {
          if (EXIT_COMMANDS.has(args[0])) break;
          output.write(`${await run(args, config, { isTTY })}\n`);
        }
      } catch (err) {
        if (!isTaskManagerError(err)) throw err;
        output.write(`Error: ${err.message}\n`);
      }
      output.write(PROMPT);
    }
  } finally {
    rl.close();
  }
  output.write("Goodbye.\n");
}
