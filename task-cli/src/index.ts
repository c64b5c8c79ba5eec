#!/usr/bin/env node
import { run } from "./cli.js";
import { loadConfig } from "./config.js";
import { isTaskManagerError } from "./errors.js";
import { runShell } from "./shell.js";

const args = process.argv.slice(2);
const isTTY = process.stdout.isTTY === true;

try {
  const config = loadConfig();
  if (args[0] === "shell") {
    await runShell({ input: process.stdin, output: process.stdout, config, isTTY });
  } else {
    console.log(await run(args, config, { isTTY }));
  }
} catch (err) {
  if (!isTaskManagerError(err)) throw err;
  console.error(`Error: ${err.message}`);
  process.exitCode = 1;
}
