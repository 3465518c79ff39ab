import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { rm } from "node:fs/promises";
import { TaskStore, saveTasks } from "../state/store.js";
import { listTasks, findByProject, findByStatus, findByPriority, search } from "../tools/query.js";
import type { Task } from "../types.js";

const TEST_DIR = "/tmp/tasktrack-test-query";
const TEST_FILE = `${TEST_DIR}/tasks.json`;

const tasks: Task[] = [
  { title: "Task 1", description: "Write SCRIPT", priority: 3, status: "Todo", project: "Alpha" },
  { title: "Task 2", description: "Review notes", priority: 1, status: "In Progress", project: "Beta" },
  { title: "Scribble", description: "Sketch ideas", priority: 3, status: "todo", project: "alpha" },
  { title: "Task 4", description: "Ship release", priority: 3, status: "Todo", project: "Beta" },
];

describe("filters", () => {
  it("find_by_project matches exactly and keeps order", () => {
    expect(findByProject(tasks, "Beta").map((t) => t.title)).toEqual(["Task 2", "Task 4"]);
    expect(findByProject(tasks, "alpha").map((t) => t.title)).toEqual(["Scribble"]);
  });

  it("find_by_status is case-sensitive", () => {
    expect(findByStatus(tasks, "Todo").map((t) => t.title)).toEqual(["Task 1", "Task 4"]);
    expect(findByStatus(tasks, "Done")).toEqual([]);
  });

  it("find_by_priority returns only the tasks with that priority", () => {
    const found = findByPriority(tasks, 3);
    expect(found.map((t) => t.title)).toEqual(["Task 1", "Scribble", "Task 4"]);
    expect(found.every((t) => t.priority === 3)).toBe(true);
  });

  it("search matches title or description regardless of case", () => {
    expect(search(tasks, "scri").map((t) => t.title)).toEqual(["Task 1", "Scribble"]);
    expect(search(tasks, "NOTES").map((t) => t.title)).toEqual(["Task 2"]);
    expect(search(tasks, "nothing")).toEqual([]);
  });

  it("an empty query matches everything", () => {
    expect(search(tasks, "")).toHaveLength(4);
  });

  it("repeated queries give identical results", () => {
    expect(search(tasks, "task")).toEqual(search(tasks, "task"));
    expect(findByPriority(tasks, 3)).toEqual(findByPriority(tasks, 3));
  });
});

describe("list_tasks", () => {
  let store: TaskStore;

  beforeEach(async () => {
    await saveTasks(TEST_FILE, tasks);
    const opened = await TaskStore.init(TEST_FILE);
    if (!opened.ok) throw new Error(opened.error);
    store = opened.data;
  });

  afterEach(async () => {
    await rm(TEST_DIR, { recursive: true, force: true });
  });

  it("lists every task in stored order", async () => {
    const result = await listTasks(store);
    expect(result).toEqual({ ok: true, message: "4 task(s) found.", data: tasks });
  });

  it("combines filters", async () => {
    const result = await listTasks(store, { project: "Beta", priority: "3" });
    expect(result.ok && result.data.map((t) => t.title)).toEqual(["Task 4"]);
  });

  it("reports no matches", async () => {
    const result = await listTasks(store, { status: "Done" });
    expect(result).toEqual({ ok: true, message: "No tasks found.", data: [] });
  });

  it("rejects a priority that is not 0-255", async () => {
    const result = await listTasks(store, { priority: "-1" });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.errorKind).toBe("ValidationError");
  });

  it("returns copies that do not alias the store", async () => {
    const result = await listTasks(store);
    if (!result.ok) throw new Error(result.error);
    result.data[0].title = "changed";
    expect(store.peek()[0].title).toBe("Task 1");
  });
});
