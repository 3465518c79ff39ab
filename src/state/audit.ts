import { appendFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { TaskErrorKind, ToolResult } from "../types.js";

/** One line of audit.jsonl: a tool call and the task count around it. */
export interface AuditRecord {
  ts: string;
  tool: string;
  input: Record<string, unknown>;
  ok: boolean;
  tasksBefore: number | null;
  tasksAfter: number | null;
  errorKind?: TaskErrorKind;
  error?: string;
}

export interface AuditCall {
  tool: string;
  input: Record<string, unknown>;
  result: ToolResult<unknown>;
  // null when the tasks file could not be loaded
  tasksBefore: number | null;
  tasksAfter: number | null;
}

export function toAuditRecord(call: AuditCall, now: Date = new Date()): AuditRecord {
  const record: AuditRecord = {
    ts: now.toISOString(),
    tool: call.tool,
    input: call.input,
    ok: call.result.ok,
    tasksBefore: call.tasksBefore,
    tasksAfter: call.tasksAfter,
  };
  if (!call.result.ok) {
    record.errorKind = call.result.errorKind;
    record.error = call.result.error;
  }
  return record;
}

export class AuditLog {
  private filePath: string;

  constructor(tasksFile: string) {
    this.filePath = join(dirname(tasksFile), "audit.jsonl");
  }

  async record(call: AuditCall): Promise<void> {
    const line = JSON.stringify(toAuditRecord(call)) + "\n";
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, line, "utf-8");
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.error(`[tasktrack] audit write to ${this.filePath} failed: ${reason}`);
    }
  }

  getFilePath(): string {
    return this.filePath;
  }
}
