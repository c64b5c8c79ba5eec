import { z } from "zod";
import { isValidDate } from "./dates.js";
import { TaskManagerError } from "./errors.js";

export const prioritySchema = z.enum(["high", "medium", "low"]);
export const statusSchema = z.enum(["pending", "done"]);

export const dateSchema = z
  .string()
  .refine(isValidDate, { message: "must be a date in YYYY-MM-DD format" });

export const taskIdSchema = z.string().regex(/^T-[1-9]\d*$/, "must look like T-1");

const titleSchema = z.string().trim().min(1, "must not be empty");
const assigneeSchema = z.string().trim().min(1, "must not be empty");

export const taskSchema = z.object({
  id: taskIdSchema,
  title: titleSchema,
  description: z.string(),
  assignee: assigneeSchema,
  status: statusSchema,
  priority: prioritySchema,
  assignedDate: dateSchema,
  dueDate: dateSchema.nullable(),
});

export const taskDocumentSchema = z.object({
  version: z.literal(1),
  nextId: z.number().int().positive(),
  tasks: z.array(taskSchema),
});

export const taskCreateSchema = z.object({
  title: titleSchema,
  description: z.string().trim().default(""),
  assignee: assigneeSchema,
  priority: prioritySchema.default("medium"),
  dueDate: dateSchema.nullable().default(null),
});

export const taskUpdateSchema = z.object({
  title: titleSchema.optional(),
  description: z.string().trim().optional(),
  assignee: assigneeSchema.optional(),
  priority: prioritySchema.optional(),
  dueDate: dateSchema.nullable().optional(),
  status: statusSchema.optional(),
});

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    )
    .join("; ");
}

/** Parses `value`, turning validation failures into INVALID_INPUT errors. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new TaskManagerError("INVALID_INPUT", describeIssues(result.error));
  }
  return result.data;
}
