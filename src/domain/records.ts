import { z } from "zod";
import type { ResourceType } from "./resourceTypes.js";

// Fields introduced after a payload was first persisted must carry a default so
// rows written by an earlier release still parse.
const stringList = z.array(z.string()).default([]);
const nullableString = z.string().nullable().default(null);

export const projectRecordSchema = z.object({
  pageId: z.string(),
  projectName: z.string(),
  healthStatus: nullableString,
  healthColor: nullableString,
  status: nullableString,
  priority: nullableString,
  priorityColor: nullableString,
  assignees: stringList,
  taskCount: z.number().int().nonnegative().default(0),
  url: z.string(),
  createdTime: z.string(),
  lastEditedTime: z.string()
});

export const taskRecordSchema = z.object({
  pageId: z.string(),
  taskName: z.string(),
  status: nullableString,
  priority: nullableString,
  effortLevel: nullableString,
  description: nullableString,
  dueDate: nullableString,
  taskType: stringList,
  assignees: stringList,
  createdTime: z.string(),
  lastEditedTime: z.string()
});

export const todoRecordSchema = z.object({
  id: z.string(),
  url: z.string(),
  name: z.string(),
  status: nullableString,
  deadline: nullableString,
  dateDone: nullableString,
  projectIds: stringList,
  assignees: stringList
});

/** An entry of the team directory. */
export const memberRecordSchema = z.object({
  pageId: z.string(),
  name: z.string(),
  position: nullableString,
  status: nullableString,
  tgId: nullableString,
  startDate: nullableString,
  createdTime: z.string().default(""),
  lastEditedTime: z.string().default("")
});

export type ProjectRecord = z.infer<typeof projectRecordSchema>;
export type TaskRecord = z.infer<typeof taskRecordSchema>;
export type TodoRecord = z.infer<typeof todoRecordSchema>;
export type MemberRecord = z.infer<typeof memberRecordSchema>;

export interface ResourceRecordMap {
  projects: ProjectRecord;
  tasks: TaskRecord;
  todos: TodoRecord;
  members: MemberRecord;
}

export type RecordSchemaMap = {
  [K in ResourceType]: z.ZodType<ResourceRecordMap[K], z.ZodTypeDef, unknown>;
};

export const RECORD_SCHEMAS: RecordSchemaMap = {
  projects: projectRecordSchema,
  tasks: taskRecordSchema,
  todos: todoRecordSchema,
  members: memberRecordSchema
};

export function parseRecords<T extends ResourceType>(resourceType: T, payload: unknown): ResourceRecordMap[T][] {
  const schema: z.ZodType<ResourceRecordMap[T], z.ZodTypeDef, unknown> = RECORD_SCHEMAS[resourceType];
  return z.array(schema).parse(payload);
}
