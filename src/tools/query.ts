import type { TaskStore } from "../state/store.js";
import type { ListTasksInput, Task, ToolResult } from "../types.js";
import { success, failure } from "../types.js";
import { parsePriority } from "../schema.js";

// --- filters ---

export function findByProject(tasks: readonly Task[], project: string): Task[] {
  return tasks.filter((t) => t.project === project);
}

export function findByStatus(tasks: readonly Task[], status: string): Task[] {
  return tasks.filter((t) => t.status === status);
}

export function findByPriority(tasks: readonly Task[], priority: number): Task[] {
  return tasks.filter((t) => t.priority === priority);
}

/** Case-insensitive substring match on title or description. */
export function search(tasks: readonly Task[], query: string): Task[] {
  const needle = query.toLowerCase();
  return tasks.filter(
    (t) =>
      t.title.toLowerCase().includes(needle) ||
      t.description.toLowerCase().includes(needle)
  );
}

// --- list_tasks ---

export async function listTasks(
  store: TaskStore,
  input: ListTasksInput = {}
): Promise<ToolResult<Task[]>> {
  let tasks: Task[] = store.getTasks();

  if (input.priority !== undefined) {
    const priority = parsePriority(input.priority);
    if (!priority.ok) {
      return failure("ValidationError", priority.reason);
    }
    tasks = findByPriority(tasks, priority.value);
  }
  if (input.project !== undefined) {
    tasks = findByProject(tasks, input.project);
  }
  if (input.status !== undefined) {
    tasks = findByStatus(tasks, input.status);
  }
  if (input.query !== undefined) {
    tasks = search(tasks, input.query);
  }

  return success(
    tasks,
    tasks.length > 0 ? `${tasks.length} task(s) found.` : "No tasks found."
  );
}
