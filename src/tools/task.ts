import type { TaskStore } from "../state/store.js";
import type {
  Task,
  TaskAddInput,
  TaskRemoveInput,
  TaskUpdateInput,
  ToolResult,
} from "../types.js";
import { success, failure } from "../types.js";
import { parsePriority } from "../schema.js";

export async function taskAdd(
  store: TaskStore,
  input: TaskAddInput
): Promise<ToolResult<Task>> {
  if (input.title === "") {
    return failure("ValidationError", "Title must not be empty.");
  }

  const priority = parsePriority(input.priority);
  if (!priority.ok) {
    return failure("ValidationError", priority.reason);
  }

  const task: Task = {
    title: input.title,
    description: input.description,
    priority: priority.value,
    status: input.status,
    project: input.project,
  };

  // Duplicates are allowed, but later lookups by title only see the first one.
  const duplicate = store.peek().some((t) => t.title === task.title);

  const saved = await store.update((tasks) => {
    tasks.push(task);
  });
  if (!saved.ok) return saved;

  const result = success({ ...task }, `Task "${task.title}" added.`);
  if (duplicate) {
    result.warning = `A task titled "${task.title}" already exists; updates will apply to the first one.`;
  }
  return result;
}

export async function taskRemove(
  store: TaskStore,
  input: TaskRemoveInput
): Promise<ToolResult<{ removed: number }>> {
  const before = store.peek().length;

  const saved = await store.update((tasks) =>
    tasks.filter((t) => t.title !== input.title)
  );
  if (!saved.ok) return saved;

  const removed = before - saved.data.length;
  return success(
    { removed },
    removed > 0
      ? `Removed ${removed} task(s) titled "${input.title}".`
      : `No task titled "${input.title}"; nothing removed.`
  );
}

export async function taskUpdate(
  store: TaskStore,
  input: TaskUpdateInput
): Promise<ToolResult<Task>> {
  const index = store.peek().findIndex((t) => t.title === input.title);

  if (index === -1) {
    return failure("NotFoundError", `Task "${input.title}" not found.`);
  }

  // Validate every supplied field before touching the task.
  let priority: number | undefined;
  if (input.priority !== undefined) {
    const parsed = parsePriority(input.priority);
    if (!parsed.ok) {
      return failure("ValidationError", parsed.reason);
    }
    priority = parsed.value;
  }

  const saved = await store.update((tasks) => {
    const t = tasks[index];
    if (input.description !== undefined) t.description = input.description;
    if (priority !== undefined) t.priority = priority;
    if (input.status !== undefined) t.status = input.status;
    if (input.project !== undefined) t.project = input.project;
  });
  if (!saved.ok) return saved;

  const changes: string[] = [];
  if (input.description !== undefined) changes.push("description");
  if (priority !== undefined) changes.push(`priority→${priority}`);
  if (input.status !== undefined) changes.push(`status→${input.status}`);
  if (input.project !== undefined) changes.push(`project→${input.project}`);

  return success(
    saved.data[index],
    `Task "${input.title}" updated. (${changes.join(", ") || "no changes"})`
  );
}
