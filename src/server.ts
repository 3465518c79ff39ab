import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { z } from "zod";

import { TaskStore } from "./state/store.js";
import { AuditLog } from "./state/audit.js";
import { taskAdd, taskRemove, taskUpdate } from "./tools/task.js";
import { listTasks } from "./tools/query.js";
import { loadConfig } from "./config.js";
import type { TasktrackConfig } from "./config.js";
import type { ToolResult } from "./types.js";

const priorityInput = z.union([z.number(), z.string()]);

function toContent(result: ToolResult<unknown>) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
  };
}

export function createServer(config: TasktrackConfig): McpServer {
  const audit = config.audit ? new AuditLog(config.tasksFile) : null;

  const server = new McpServer({
    name: "tasktrack",
    version: "0.1.0",
  });

  // Calls run one at a time; each reloads the file so edits made through the
  // CLI are visible.
  let queue: Promise<unknown> = Promise.resolve();

  async function runCycle<T>(
    tool: string,
    input: Record<string, unknown>,
    fn: (store: TaskStore) => Promise<ToolResult<T>>
  ): Promise<ToolResult<T>> {
    const opened = await TaskStore.init(config.tasksFile);
    if (!opened.ok) {
      await audit?.record({ tool, input, result: opened, tasksBefore: null, tasksAfter: null });
      return opened;
    }

    const store = opened.data;
    const tasksBefore = store.peek().length;
    const result = await fn(store);
    // a failed save leaves the file at its previous count
    const tasksAfter = result.ok ? store.peek().length : tasksBefore;
    await audit?.record({ tool, input, result, tasksBefore, tasksAfter });
    return result;
  }

  function withStore<T>(
    tool: string,
    input: Record<string, unknown>,
    fn: (store: TaskStore) => Promise<ToolResult<T>>
  ): Promise<ToolResult<T>> {
    const next = queue.then(() => runCycle(tool, input, fn));
    // the caller still sees a rejection through `next`
    queue = next.catch(() => undefined);
    return next;
  }

  // --- task_add ---
  server.tool(
    "task_add",
    "Append a task (duplicate titles are allowed)",
    {
      title: z.string(),
      description: z.string(),
      priority: priorityInput,
      status: z.string(),
      project: z.string(),
    },
    async ({ title, description, priority, status, project }) => {
      const result = await withStore("task_add", { title, description, priority, status, project }, (store) =>
        taskAdd(store, { title, description, priority, status, project })
      );
      return toContent(result);
    }
  );

  // --- task_remove ---
  server.tool(
    "task_remove",
    "Remove every task with the given title",
    { title: z.string() },
    async ({ title }) => {
      const result = await withStore("task_remove", { title }, (store) =>
        taskRemove(store, { title })
      );
      return toContent(result);
    }
  );

  // --- task_update ---
  server.tool(
    "task_update",
    "Update description, priority, status or project of the first task with the given title",
    {
      title: z.string(),
      description: z.string().optional(),
      priority: priorityInput.optional(),
      status: z.string().optional(),
      project: z.string().optional(),
    },
    async ({ title, description, priority, status, project }) => {
      const result = await withStore("task_update", { title, description, priority, status, project }, (store) =>
        taskUpdate(store, { title, description, priority, status, project })
      );
      return toContent(result);
    }
  );

  // --- list_tasks ---
  server.tool(
    "list_tasks",
    "List tasks, optionally filtered by project, status, priority and a search query",
    {
      project: z.string().optional(),
      status: z.string().optional(),
      priority: priorityInput.optional(),
      query: z.string().optional(),
    },
    async ({ project, status, priority, query }) => {
      const result = await withStore("list_tasks", { project, status, priority, query }, (store) =>
        listTasks(store, { project, status, priority, query })
      );
      return toContent(result);
    }
  );

  // --- search_tasks ---
  server.tool(
    "search_tasks",
    "Case-insensitive search over task titles and descriptions",
    { query: z.string() },
    async ({ query }) => {
      const result = await withStore("search_tasks", { query }, (store) =>
        listTasks(store, { query })
      );
      return toContent(result);
    }
  );

  return server;
}

/** Connects a server built from `env` to `transport`; returns the exit code. */
export async function serve(env: NodeJS.ProcessEnv, transport: Transport): Promise<number> {
  let config: TasktrackConfig;
  try {
    config = loadConfig(env);
  } catch (err) {
    console.error("[tasktrack]", err instanceof Error ? err.message : err);
    return 1;
  }

  await createServer(config).connect(transport);
  console.error(`[tasktrack] mcp server started (tasks file: ${config.tasksFile})`);
  return 0;
}
