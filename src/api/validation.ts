import type { z } from "zod";
import { CacheServiceError } from "../models/errorCodes.js";
import { isResourceType, type ResourceType } from "../domain/resourceTypes.js";

export function parseResourceType(value: unknown): ResourceType {
  if (typeof value === "string" && isResourceType(value)) {
    return value;
  }
  throw new CacheServiceError("UNKNOWN_RESOURCE_TYPE", { resourceType: value });
}

export function parseRequestPart<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const parsed = schema.safeParse(value ?? {});
  if (!parsed.success) {
    throw new CacheServiceError("INVALID_QUERY", { issues: parsed.error.flatten() });
  }
  return parsed.data;
}
