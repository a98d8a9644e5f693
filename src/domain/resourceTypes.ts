import { z } from "zod";

export const RESOURCE_TYPES = ["projects", "tasks", "todos", "members"] as const;

export type ResourceType = (typeof RESOURCE_TYPES)[number];

export const resourceTypeSchema = z.enum(RESOURCE_TYPES);

export function isResourceType(value: unknown): value is ResourceType {
  return resourceTypeSchema.safeParse(value).success;
}
