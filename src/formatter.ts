import type { Task } from "./types.js";

export function formatTask(task: Task, index: number): string {
  return [
    `Task ${index + 1}: ${task.title}`,
    `    description: ${task.description}`,
    `    priority:    ${task.priority}`,
    `    status:      ${task.status}`,
    `    project:     ${task.project}`,
  ].join("\n");
}

export function formatTaskList(tasks: readonly Task[]): string {
  if (tasks.length === 0) return "No tasks found.";
  return tasks.map((task, i) => formatTask(task, i)).join("\n");
}
