import type { ResourceRecordMap } from "../domain/records.js";
import type { ResourceType } from "../domain/resourceTypes.js";
import { parseMemberPage, parseProjectPage, parseTaskPage, parseTodoPage, type NotionPage } from "../infra/notion/properties.js";

export const ACTIVE_TODO_STATUSES = ["To-do", "In-progress"] as const;

export interface ResourceSource<T extends ResourceType> {
  filter?: Record<string, unknown>;
  parse(page: NotionPage): ResourceRecordMap[T];
  /** When set, later pages never repeat a record already seen under the same key. */
  dedupeKey?(record: ResourceRecordMap[T]): string;
}

export type ResourceSourceMap = { [K in ResourceType]: ResourceSource<K> };

export const RESOURCE_SOURCES: ResourceSourceMap = {
  projects: {
    parse: parseProjectPage
  },
  tasks: {
    parse: parseTaskPage
  },
  todos: {
    filter: {
      or: ACTIVE_TODO_STATUSES.map((status) => ({ property: "Status", status: { equals: status } }))
    },
    parse: parseTodoPage,
    dedupeKey: (record) => record.id
  },
  members: {
    parse: parseMemberPage
  }
};
