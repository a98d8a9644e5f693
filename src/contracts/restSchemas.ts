import { z } from "zod";

const isoDateString = () => z.string().datetime({ message: "Expected ISO-8601 timestamp" });
const dayString = () => z.string().regex(/^\d{4}-\d{2}-\d{2}$/u, { message: "Expected YYYY-MM-DD" });
const nonEmpty = () => z.string().trim().min(1);

export const snapshotQuerySchema = z
  .object({
    status: nonEmpty().optional(),
    assignee: nonEmpty().optional(),
    createdOn: dayString().optional(),
    editedOn: dayString().optional(),
    dueBefore: dayString().optional()
  })
  .strict();

export const taskFilterQuerySchema = z
  .object({
    status: nonEmpty().optional(),
    priority: nonEmpty().optional()
  })
  .strict();

export const todoQuerySchema = z
  .object({
    status: nonEmpty().optional()
  })
  .strict();

export const healthColorParamsSchema = z.object({
  color: z.string().trim().toLowerCase().pipe(z.enum(["red", "yellow", "green"]))
});

export const memberParamsSchema = z.object({
  name: nonEmpty()
});

const dependencyStatusSchema = z.enum(["available", "degraded", "unavailable", "disabled"]);

const dependencyHealthSchema = z
  .object({
    status: dependencyStatusSchema,
    latencyMs: z.number().nonnegative().optional(),
    checkedAt: isoDateString().optional(),
    message: z.string().optional()
  })
  .strict();

export const healthResponseSchema = z
  .object({
    status: z.enum(["ok", "degraded", "unavailable"]),
    dependencies: z.record(z.string(), dependencyHealthSchema),
    observedAt: isoDateString().optional()
  })
  .strict();

export const restSchemas = {
  snapshotQuery: snapshotQuerySchema,
  taskFilterQuery: taskFilterQuerySchema,
  todoQuery: todoQuerySchema,
  healthColorParams: healthColorParamsSchema,
  memberParams: memberParamsSchema,
  health: {
    response: healthResponseSchema
  }
} as const;
