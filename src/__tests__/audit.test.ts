import { describe, it, expect, afterEach } from "vitest";
import { readFile, rm } from "node:fs/promises";
import { AuditLog, toAuditRecord } from "../state/audit.js";
import { success, failure } from "../types.js";

const TEST_DIR = "/tmp/tasktrack-test-audit";
const TASKS_FILE = `${TEST_DIR}/tasks.json`;

afterEach(async () => {
  await rm(TEST_DIR, { recursive: true, force: true });
});

describe("toAuditRecord", () => {
  const now = new Date("2026-01-01T00:00:00.000Z");

  it("records the task count around a successful call", () => {
    const record = toAuditRecord(
      { tool: "task_add", input: { title: "A" }, result: success(null, "ok"), tasksBefore: 2, tasksAfter: 3 },
      now
    );
    expect(record).toEqual({
      ts: "2026-01-01T00:00:00.000Z",
      tool: "task_add",
      input: { title: "A" },
      ok: true,
      tasksBefore: 2,
      tasksAfter: 3,
    });
  });

  it("records the error kind of a failed call", () => {
    const record = toAuditRecord(
      {
        tool: "task_update",
        input: { title: "Ghost" },
        result: failure("NotFoundError", 'Task "Ghost" not found.'),
        tasksBefore: 1,
        tasksAfter: 1,
      },
      now
    );
    expect(record.ok).toBe(false);
    expect(record.errorKind).toBe("NotFoundError");
    expect(record.error).toBe('Task "Ghost" not found.');
  });
});

describe("AuditLog", () => {
  it("appends one JSON line per call", async () => {
    const audit = new AuditLog(TASKS_FILE);
    await audit.record({ tool: "task_add", input: {}, result: success(null, "ok"), tasksBefore: 0, tasksAfter: 1 });
    await audit.record({
      tool: "list_tasks",
      input: {},
      result: failure("DecodeError", "bad file"),
      tasksBefore: null,
      tasksAfter: null,
    });

    const lines = (await readFile(audit.getFilePath(), "utf-8")).trim().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toMatchObject({ tool: "task_add", tasksBefore: 0, tasksAfter: 1 });
    expect(JSON.parse(lines[1])).toMatchObject({ errorKind: "DecodeError", tasksBefore: null });
  });

  it("does not throw when the log cannot be written", async () => {
    const audit = new AuditLog("/dev/null/tasks.json");
    await expect(
      audit.record({ tool: "test", input: {}, result: success(null, "ok"), tasksBefore: 0, tasksAfter: 0 })
    ).resolves.toBeUndefined();
  });

  it("places the log beside the tasks file", () => {
    expect(new AuditLog("/some/dir/tasks.json").getFilePath()).toBe("/some/dir/audit.jsonl");
  });
});
