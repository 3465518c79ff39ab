import { z } from "zod";
import { describeIssue } from "./schema.js";

export const DEFAULT_TASKS_FILE = "tasks.json";

const envSchema = z.object({
  TASKTRACK_FILE: z.string().min(1).default(DEFAULT_TASKS_FILE),
  TASKTRACK_AUDIT: z.enum(["on", "off"]).default("on"),
});

export interface TasktrackConfig {
  tasksFile: string;
  audit: boolean;
}

/** Reads settings from the environment. Throws on an invalid value. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TasktrackConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration (${describeIssue(parsed.error)})`);
  }
  return {
    tasksFile: parsed.data.TASKTRACK_FILE,
    audit: parsed.data.TASKTRACK_AUDIT === "on",
  };
}
