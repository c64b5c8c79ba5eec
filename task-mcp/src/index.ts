#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";

import { loadConfig, prioritySchema, statusSchema, Store, UserRegistry } from "@tasktrack/cli";
import { AuditLog } from "./state/audit.js";
import { taskAdd, taskComplete, taskDelete, taskReopen, taskUpdate } from "./tools/task.js";
import { getTask, listTasks, taskStats } from "./tools/query.js";
import { generateReports } from "./tools/report.js";
import { listUsers, userRegister } from "./tools/users.js";
import type { ToolContext } from "./types.js";

const config = loadConfig();
const ctx: ToolContext = {
  store: await Store.load(config.tasksFile),
  users: await UserRegistry.load(config.usersFile),
  config,
};
const audit = new AuditLog(config.tasksFile);

const server = new McpServer({
  name: "task-mcp",
  version: "0.1.0",
});

// --- Audit helper ---
async function withAudit<T extends { ok: boolean; error?: string }>(
  toolName: string,
  input: Record<string, unknown>,
  fn: () => Promise<T>
): Promise<T> {
  const result = await fn();
  await audit.log({
    ts: new Date().toISOString(),
    tool: toolName,
    input,
    ok: result.ok,
    error: result.error,
  });
  return result;
}

const taskIdShape = { taskId: z.string().describe("Task ID, e.g. T-1") };
const dueDateSchema = z.string().nullable().describe("YYYY-MM-DD, or null for none");

// --- task_add ---
server.tool(
  "task_add",
  "Create a task. The assignee defaults to the configured user and must be registered.",
  {
    title: z.string(),
    description: z.string().optional(),
    assignee: z.string().optional(),
    priority: prioritySchema.optional(),
    dueDate: dueDateSchema.optional(),
  },
  async (input) => {
    const result = await withAudit("task_add", input, () => taskAdd(ctx, input));
    return {
      content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
    };
  }
);

// --- task_update ---
server.tool(
  "task_update",
  "Edit the fields of a pending task",
  {
    ...taskIdShape,
    title: z.string().optional(),
    description: z.string().optional(),
    assignee: z.string().optional(),
    priority: prioritySchema.optional(),
    dueDate: dueDateSchema.optional(),
  },
  async (input) => {
    const result = await withAudit("task_update", input, () => taskUpdate(ctx, input));
    return {
      content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
    };
  }
);

// --- task_complete ---
server.tool("task_complete", "Mark a task as done", taskIdShape, async (input) => {
  const result = await withAudit("task_complete", input, () => taskComplete(ctx, input));
  return {
    content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
  };
});

// --- task_reopen ---
server.tool("task_reopen", "Mark a done task as pending again", taskIdShape, async (input) => {
  const result = await withAudit("task_reopen", input, () => taskReopen(ctx, input));
  return {
    content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
  };
});

// --- task_delete ---
server.tool("task_delete", "Remove a task", taskIdShape, async (input) => {
  const result = await withAudit("task_delete", input, () => taskDelete(ctx, input));
  return {
    content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
  };
});

// --- list_tasks ---
server.tool(
  "list_tasks",
  "List tasks, optionally filtered",
  {
    status: statusSchema.optional(),
    priority: prioritySchema.optional(),
    assignee: z.string().optional(),
    overdue: z.boolean().optional().describe("Only pending tasks past their due date"),
  },
  async (input) => {
    const result = await withAudit("list_tasks", input, () => listTasks(ctx, input));
    return {
      content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
    };
  }
);

// --- get_task ---
server.tool("get_task", "Get one task by ID", taskIdShape, async (input) => {
  const result = await withAudit("get_task", input, () => getTask(ctx, input));
  return {
    content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
  };
});

// --- task_stats ---
server.tool("task_stats", "Count tasks by status", {}, async () => {
  const result = await withAudit("task_stats", {}, () => taskStats(ctx));
  return {
    content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
  };
});

// --- generate_reports ---
server.tool(
  "generate_reports",
  "Write task_overview.txt and user_overview.txt",
  {},
  async () => {
    const result = await withAudit("generate_reports", {}, () => generateReports(ctx));
    return {
      content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
    };
  }
);

// --- user_register ---
server.tool(
  "user_register",
  "Register a user tasks can be assigned to",
  { name: z.string() },
  async (input) => {
    const result = await withAudit("user_register", input, () => userRegister(ctx, input));
    return {
      content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
    };
  }
);

// --- list_users ---
server.tool("list_users", "List registered users", {}, async () => {
  const result = await withAudit("list_users", {}, () => listUsers(ctx));
  return {
    content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
  };
});

const transport = new StdioServerTransport();
await server.connect(transport);
console.error(`[task-mcp] server started on ${config.tasksFile}`);
