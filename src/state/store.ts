import { readFile, writeFile, rename, mkdir, rm } from "node:fs/promises";
import { dirname } from "node:path";
import { randomUUID } from "node:crypto";
import type { Task, ToolResult } from "../types.js";
import { TASK_KEYS, success, failure } from "../types.js";
import { taskListSchema, describeIssue } from "../schema.js";

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function decodeTasks(raw: string): ToolResult<Task[]> {
  if (raw.trim() === "") return success([], "0 tasks loaded");

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    return failure("DecodeError", `Tasks file is not valid JSON: ${errorText(err)}`);
  }

  const parsed = taskListSchema.safeParse(json);
  if (!parsed.success) {
    return failure("DecodeError", `Tasks file has an unexpected shape (${describeIssue(parsed.error)})`);
  }
  return success(parsed.data, `${parsed.data.length} tasks loaded`);
}

export function serializeTasks(tasks: readonly Task[]): string {
  const ordered = tasks.map((task) => Object.fromEntries(TASK_KEYS.map((key) => [key, task[key]])));
  return JSON.stringify(ordered, null, 2);
}

export async function loadTasks(filePath: string): Promise<ToolResult<Task[]>> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") return success([], "0 tasks loaded");
    return failure("IOError", `Failed to read ${filePath}: ${errorText(err)}`);
  }
  return decodeTasks(raw);
}

export async function saveTasks(filePath: string, tasks: readonly Task[]): Promise<ToolResult> {
  // one temp file per save
  const tmpPath = `${filePath}.tmp.${process.pid}.${randomUUID()}`;
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(tmpPath, serializeTasks(tasks), "utf-8");
    await rename(tmpPath, filePath);
  } catch (err) {
    await rm(tmpPath, { force: true }).catch((cleanupErr: unknown) => {
      console.error(`[tasktrack] could not remove ${tmpPath}: ${errorText(cleanupErr)}`);
    });
    return failure("IOError", `Failed to write ${filePath}: ${errorText(err)}`);
  }
  return success(null, `${tasks.length} tasks saved`);
}

export class TaskStore {
  private tasks: Task[];
  private filePath: string;

  private constructor(filePath: string, tasks: Task[]) {
    this.filePath = filePath;
    this.tasks = tasks;
  }

  static async init(filePath: string): Promise<ToolResult<TaskStore>> {
    const loaded = await loadTasks(filePath);
    if (!loaded.ok) return loaded;
    return success(new TaskStore(filePath, loaded.data), loaded.message);
  }

  getTasks(): Task[] {
    return structuredClone(this.tasks);
  }

  peek(): readonly Task[] {
    return this.tasks;
  }

  /**
   * Applies `mutator` to the in-memory collection, then rewrites the file.
   * A failed save keeps the in-memory change.
   */
  async update(mutator: (tasks: Task[]) => Task[] | void): Promise<ToolResult<Task[]>> {
    const result = mutator(this.tasks);
    if (result !== undefined) {
      this.tasks = result;
    }
    const saved = await saveTasks(this.filePath, this.tasks);
    if (!saved.ok) return saved;
    return success(this.getTasks(), saved.message);
  }
}
