import { z } from "zod";

export const PRIORITY_MIN = 0;
export const PRIORITY_MAX = 255;

export const prioritySchema = z
  .number()
  .int()
  .min(PRIORITY_MIN)
  .max(PRIORITY_MAX);

// Text priorities come straight from argv: digits with an optional leading "+".
export const priorityInputSchema = z.union([
  prioritySchema,
  z
    .string()
    .regex(/^\+?[0-9]+$/, "not an unsigned integer")
    .transform((value) => Number(value))
    .pipe(prioritySchema),
]);

export const taskSchema = z.object({
  title: z.string().min(1),
  description: z.string(),
  priority: prioritySchema,
  status: z.string(),
  project: z.string(),
});

export const taskListSchema = z.array(taskSchema);

/** Renders the first zod issue as `path: message`. */
export function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "invalid value";
  const where = issue.path.length > 0 ? issue.path.join(".") : "value";
  return `${where}: ${issue.message}`;
}

export type ParsedPriority = { ok: true; value: number } | { ok: false; reason: string };

export function parsePriority(input: number | string): ParsedPriority {
  const parsed = priorityInputSchema.safeParse(input);
  if (!parsed.success) {
    return { ok: false, reason: `Invalid priority "${input}": expected an integer from ${PRIORITY_MIN} to ${PRIORITY_MAX}` };
  }
  return { ok: true, value: parsed.data };
}
