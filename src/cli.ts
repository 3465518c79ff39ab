import { TaskStore } from "./state/store.js";
import { taskAdd, taskRemove, taskUpdate } from "./tools/task.js";
import { listTasks } from "./tools/query.js";
import { formatTaskList } from "./formatter.js";
import type { ListTasksInput, ToolFailure, ToolResult } from "./types.js";

export const HELP = `
tasktrack - Console task tracker

Usage:
  tasktrack add <title> <description> <priority> <status> <project>
  tasktrack remove <title>
  tasktrack list
  tasktrack list-by-project --project <name>
  tasktrack list-by-status --status <status>
  tasktrack list-by-priority --priority <0-255>
  tasktrack search <query>
  tasktrack update <title> [--description d] [--priority p] [--status s] [--project p]
  tasktrack help
`.trim();

const COMMANDS = new Set([
  "add",
  "remove",
  "list",
  "list-by-project",
  "list-by-status",
  "list-by-priority",
  "search",
  "update",
]);

export interface CliResult {
  output: string;
  exitCode: number;
}

interface ParsedArgs {
  command: string;
  positional: string[];
  flags: Record<string, string>;
  // flags given without a value, e.g. a trailing `--status`
  bareFlags: string[];
}

function parseArgs(args: string[]): ParsedArgs {
  const command = args[0] ?? "help";
  const positional: string[] = [];
  const flags: Record<string, string> = {};
  const bareFlags: string[] = [];

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith("--")) {
      const eq = arg.indexOf("=");
      if (eq !== -1) {
        flags[arg.slice(2, eq)] = arg.slice(eq + 1);
      } else if (i + 1 < args.length && !args[i + 1].startsWith("--")) {
        flags[arg.slice(2)] = args[++i];
      } else {
        bareFlags.push(arg);
      }
    } else {
      positional.push(arg);
    }
  }

  return { command, positional, flags, bareFlags };
}

function usageError(message: string): CliResult {
  return { output: `Error: ${message}\n\n${HELP}`, exitCode: 2 };
}

function failed(result: ToolFailure): CliResult {
  return { output: `Error: ${result.error}`, exitCode: 1 };
}

function done(result: ToolResult<unknown>, message: string): CliResult {
  if (!result.ok) return failed(result);
  const lines = [message];
  if (result.warning) lines.push(`Warning: ${result.warning}`);
  return { output: lines.join("\n"), exitCode: 0 };
}

async function listing(store: TaskStore, filter: ListTasksInput): Promise<CliResult> {
  const result = await listTasks(store, filter);
  if (!result.ok) return failed(result);
  return { output: formatTaskList(result.data), exitCode: 0 };
}

export async function run(args: string[], storePath: string): Promise<CliResult> {
  const { command, positional, flags, bareFlags } = parseArgs(args);

  if (command === "help" || command === "--help") {
    return { output: HELP, exitCode: 0 };
  }
  if (!COMMANDS.has(command)) {
    return { output: `Unknown command: ${command}\n\n${HELP}`, exitCode: 2 };
  }
  if (bareFlags.length > 0) {
    return usageError(`${bareFlags[0]} needs a value.`);
  }

  const opened = await TaskStore.init(storePath);
  if (!opened.ok) return failed(opened);
  const store = opened.data;

  switch (command) {
    case "add": {
      if (positional.length !== 5) {
        return usageError("add requires exactly <title> <description> <priority> <status> <project>.");
      }
      const [title, description, priority, status, project] = positional;
      const result = await taskAdd(store, { title, description, priority, status, project });
      return done(result, "Task added successfully!");
    }

    case "remove": {
      const title = positional[0];
      if (title === undefined) return usageError("task title is required.");
      const result = await taskRemove(store, { title });
      return done(result, "Task removed successfully!");
    }

    case "list":
      return listing(store, {});

    case "list-by-project": {
      if (flags.project === undefined) {
        return usageError("Please provide a project name with the --project option.");
      }
      return listing(store, { project: flags.project });
    }

    case "list-by-status": {
      if (flags.status === undefined) {
        return usageError("Please provide a status with the --status option.");
      }
      return listing(store, { status: flags.status });
    }

    case "list-by-priority": {
      if (flags.priority === undefined) {
        return usageError("Please provide a priority with the --priority option.");
      }
      return listing(store, { priority: flags.priority });
    }

    case "search": {
      const query = positional[0];
      if (query === undefined) return usageError("search query is required.");
      return listing(store, { query });
    }

    case "update": {
      const title = positional[0];
      if (title === undefined) return usageError("task title is required.");
      const result = await taskUpdate(store, {
        title,
        description: flags.description,
        priority: flags.priority,
        status: flags.status,
        project: flags.project,
      });
      return done(result, "Task updated successfully!");
    }

    default:
      return { output: `Unknown command: ${command}\n\n${HELP}`, exitCode: 2 };
  }
}
