// --- Core Model ---

export interface Task {
  title: string;
  description: string;
  priority: number;
  status: string;
  project: string;
}

/** Key order used when a task is written to disk. */
export const TASK_KEYS = ["title", "description", "priority", "status", "project"] as const;

// --- Inputs ---

export interface TaskAddInput {
  title: string;
  description: string;
  priority: number | string;
  status: string;
  project: string;
}

export interface TaskRemoveInput {
  title: string;
}

export interface TaskUpdateInput {
  title: string;
  description?: string;
  priority?: number | string;
  status?: string;
  project?: string;
}

export interface ListTasksInput {
  project?: string;
  status?: string;
  priority?: number | string;
  query?: string;
}

// --- Results ---

export type TaskErrorKind = "IOError" | "DecodeError" | "ValidationError" | "NotFoundError";

export interface ToolSuccess<T> {
  ok: true;
  message: string;
  data: T;
  warning?: string;
}

export interface ToolFailure {
  ok: false;
  error: string;
  errorKind: TaskErrorKind;
}

export type ToolResult<T = null> = ToolSuccess<T> | ToolFailure;

export function success<T>(data: T, message: string): ToolSuccess<T> {
  return { ok: true, message, data };
}

export function failure(errorKind: TaskErrorKind, error: string): ToolFailure {
  return { ok: false, error, errorKind };
}
