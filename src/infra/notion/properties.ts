import { z } from "zod";
import type { MemberRecord, ProjectRecord, TaskRecord, TodoRecord } from "../../domain/records.js";

export const notionPageSchema = z.object({
  id: z.string(),
  url: z.string().default(""),
  created_time: z.string().default(""),
  last_edited_time: z.string().default(""),
  properties: z.record(z.unknown()).default({})
});

export type NotionPage = z.infer<typeof notionPageSchema>;

export const queryResponseSchema = z.object({
  results: z.array(z.unknown()),
  has_more: z.boolean().default(false),
  next_cursor: z.string().nullable().default(null)
});

export type QueryResponse = z.infer<typeof queryResponseSchema>;

type Properties = NotionPage["properties"];

const richTextSchema = z.array(z.object({ plain_text: z.string().default("") }));
const namedOptionSchema = z.object({ name: z.string(), color: z.string().nullish() });
const personSchema = z.object({ id: z.string(), name: z.string().nullish() });

const titlePropertySchema = z.object({ title: richTextSchema });
const richTextPropertySchema = z.object({ rich_text: richTextSchema });
const selectPropertySchema = z.object({ select: namedOptionSchema.nullable() });
const statusPropertySchema = z.object({ status: namedOptionSchema.nullable() });
const multiSelectPropertySchema = z.object({ multi_select: z.array(namedOptionSchema) });
const datePropertySchema = z.object({ date: z.object({ start: z.string().nullable() }).nullable() });
const peoplePropertySchema = z.object({ people: z.array(personSchema) });
const relationPropertySchema = z.object({ relation: z.array(z.object({ id: z.string() })) });
const rollupPropertySchema = z.object({ rollup: z.object({ number: z.number().nullish() }).nullable() });

function read<T>(properties: Properties, name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
  if (!(name in properties)) {
    return null;
  }
  const parsed = schema.safeParse(properties[name]);
  return parsed.success ? parsed.data : null;
}

export function titleText(properties: Properties, name: string): string {
  const value = read(properties, name, titlePropertySchema);
  return value ? value.title.map((part) => part.plain_text).join("") : "";
}

export function richText(properties: Properties, name: string): string | null {
  const value = read(properties, name, richTextPropertySchema);
  return value ? value.rich_text.map((part) => part.plain_text).join("") : null;
}

export function selectOption(properties: Properties, name: string): { name: string; color: string | null } | null {
  const option = read(properties, name, selectPropertySchema)?.select;
  return option ? { name: option.name, color: option.color ?? null } : null;
}

export function statusName(properties: Properties, name: string): string | null {
  return read(properties, name, statusPropertySchema)?.status?.name ?? null;
}

export function multiSelectNames(properties: Properties, name: string): string[] {
  return read(properties, name, multiSelectPropertySchema)?.multi_select.map((option) => option.name) ?? [];
}

export function dateStart(properties: Properties, name: string): string | null {
  return read(properties, name, datePropertySchema)?.date?.start ?? null;
}

/** People are reported by display name, falling back to their id. */
export function peopleNames(properties: Properties, name: string): string[] {
  return read(properties, name, peoplePropertySchema)?.people.map((person) => person.name || person.id) ?? [];
}

export function relationIds(properties: Properties, name: string): string[] {
  return read(properties, name, relationPropertySchema)?.relation.map((relation) => relation.id) ?? [];
}

export function rollupNumber(properties: Properties, name: string): number | null {
  const rollup = read(properties, name, rollupPropertySchema)?.rollup;
  return rollup?.number ?? null;
}

export function parseProjectPage(page: NotionPage): ProjectRecord {
  const { properties } = page;
  const health = selectOption(properties, "Health");
  const priority = selectOption(properties, "Priority");
  const assignees = peopleNames(properties, "Assignee");
  const taskCount = rollupNumber(properties, "Task Count");

  return {
    pageId: page.id,
    projectName: titleText(properties, "Project name") || "Untitled",
    healthStatus: health?.name ?? null,
    healthColor: health?.color ?? null,
    status: statusName(properties, "Status"),
    priority: priority?.name ?? null,
    priorityColor: priority?.color ?? null,
    assignees: assignees.length > 0 ? assignees : ["Unassigned"],
    taskCount: taskCount !== null && taskCount >= 0 ? Math.floor(taskCount) : 0,
    url: page.url,
    createdTime: page.created_time,
    lastEditedTime: page.last_edited_time
  };
}

export function parseTaskPage(page: NotionPage): TaskRecord {
  const { properties } = page;
  return {
    pageId: page.id,
    taskName: titleText(properties, "Task name"),
    status: statusName(properties, "Status"),
    priority: selectOption(properties, "Priority")?.name ?? null,
    effortLevel: selectOption(properties, "Effort level")?.name ?? null,
    description: richText(properties, "Description"),
    dueDate: dateStart(properties, "Due date"),
    taskType: multiSelectNames(properties, "Task type"),
    assignees: peopleNames(properties, "Assignee"),
    createdTime: page.created_time,
    lastEditedTime: page.last_edited_time
  };
}

export function parseTodoPage(page: NotionPage): TodoRecord {
  const { properties } = page;
  const assignees = [...new Set([...peopleNames(properties, "Person"), ...peopleNames(properties, "Assign")])];
  return {
    id: page.id,
    url: page.url,
    name: titleText(properties, "Name"),
    status: statusName(properties, "Status"),
    deadline: dateStart(properties, "Deadline"),
    dateDone: dateStart(properties, "Date Done"),
    projectIds: relationIds(properties, "Project"),
    assignees
  };
}

export function parseMemberPage(page: NotionPage): MemberRecord {
  const { properties } = page;
  return {
    pageId: page.id,
    name: titleText(properties, "Name") || "Unknown",
    position: richText(properties, "Position"),
    status: statusName(properties, "Status"),
    tgId: richText(properties, "tg_id"),
    startDate: dateStart(properties, "Start Date"),
    createdTime: page.created_time,
    lastEditedTime: page.last_edited_time
  };
}
