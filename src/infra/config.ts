import { z, ZodError } from "zod";
import type { ResourceType } from "../domain/resourceTypes.js";

type RawEnv = Record<string, string | undefined>;

const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const booleanFlag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === "true" || value === "1"));

const positiveInt = (name: string) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .positive(`${name} must be positive`);

const envSchema = z
  .object({
    DATABASE_URL: optionalString,
    REDIS_URL: optionalString,
    PORT: z.coerce
      .number({ invalid_type_error: "PORT must be a number" })
      .int("PORT must be an integer")
      .min(0, "PORT must be a valid integer between 0 and 65535")
      .max(65535, "PORT must be a valid integer between 0 and 65535")
      .default(3000),
    LOG_LEVEL: logLevelSchema.optional().default("info"),
    SNAPSHOT_STORE: z.enum(["postgres", "memory"]).default("postgres"),
    LEASE_STORE: z.enum(["memory", "redis"]).default("memory"),
    NOTION_API_KEY: optionalString,
    NOTION_API_URL: z.string().url("NOTION_API_URL must be a URL").default("https://api.notion.com/v1"),
    NOTION_VERSION: z.string().min(1).default("2022-06-28"),
    NOTION_PROJECTS_DATABASE_ID: optionalString,
    NOTION_TASKS_DATABASE_ID: optionalString,
    NOTION_TODOS_DATABASE_ID: optionalString,
    NOTION_MEMBERS_DATABASE_ID: optionalString,
    CACHE_REFRESH_INTERVAL_MINUTES: positiveInt("CACHE_REFRESH_INTERVAL_MINUTES").default(30),
    CACHE_STALE_AFTER_MINUTES: positiveInt("CACHE_STALE_AFTER_MINUTES").default(30),
    CACHE_STALE_AFTER_MINUTES_PROJECTS: positiveInt("CACHE_STALE_AFTER_MINUTES_PROJECTS").optional(),
    CACHE_STALE_AFTER_MINUTES_TASKS: positiveInt("CACHE_STALE_AFTER_MINUTES_TASKS").optional(),
    CACHE_STALE_AFTER_MINUTES_TODOS: positiveInt("CACHE_STALE_AFTER_MINUTES_TODOS").optional(),
    CACHE_STALE_AFTER_MINUTES_MEMBERS: positiveInt("CACHE_STALE_AFTER_MINUTES_MEMBERS").optional(),
    UPSTREAM_TIMEOUT_MS: positiveInt("UPSTREAM_TIMEOUT_MS").default(30_000),
    REFRESH_LEASE_TTL_MS: positiveInt("REFRESH_LEASE_TTL_MS").default(25 * 60 * 1000),
    SCHEDULER_ENABLED: booleanFlag(true),
    PERMANENT_FAILURE_ALERT_THRESHOLD: positiveInt("PERMANENT_FAILURE_ALERT_THRESHOLD").default(3)
  })
  .superRefine((env, ctx) => {
    if (env.SNAPSHOT_STORE === "postgres" && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DATABASE_URL"],
        message: "DATABASE_URL is required when SNAPSHOT_STORE=postgres"
      });
    }
    if (env.LEASE_STORE === "redis" && !env.REDIS_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["REDIS_URL"],
        message: "REDIS_URL is required when LEASE_STORE=redis"
      });
    }
  });

export interface UpstreamConfig {
  apiKey: string | undefined;
  apiUrl: string;
  apiVersion: string;
  timeoutMs: number;
  databaseIds: Record<ResourceType, string | undefined>;
}

export interface CacheConfig {
  refreshIntervalMs: number;
  staleAfterMs: Record<ResourceType, number>;
  leaseTtlMs: number;
  schedulerEnabled: boolean;
  permanentFailureAlertThreshold: number;
}

export type AppConfig = {
  databaseUrl: string | undefined;
  redisUrl: string | undefined;
  port: number;
  logLevel: z.infer<typeof logLevelSchema>;
  snapshotStore: "postgres" | "memory";
  leaseStore: "memory" | "redis";
  upstream: UpstreamConfig;
  cache: CacheConfig;
};

const MINUTE_MS = 60_000;

let cachedConfig: AppConfig | null = null;

export function loadConfig(env: RawEnv = process.env): AppConfig {
  try {
    const parsed = envSchema.parse(env);
    const defaultStaleMinutes = parsed.CACHE_STALE_AFTER_MINUTES;
    const staleAfterMs: Record<ResourceType, number> = {
      projects: (parsed.CACHE_STALE_AFTER_MINUTES_PROJECTS ?? defaultStaleMinutes) * MINUTE_MS,
      tasks: (parsed.CACHE_STALE_AFTER_MINUTES_TASKS ?? defaultStaleMinutes) * MINUTE_MS,
      todos: (parsed.CACHE_STALE_AFTER_MINUTES_TODOS ?? defaultStaleMinutes) * MINUTE_MS,
      members: (parsed.CACHE_STALE_AFTER_MINUTES_MEMBERS ?? defaultStaleMinutes) * MINUTE_MS
    };

    const config: AppConfig = {
      databaseUrl: parsed.DATABASE_URL,
      redisUrl: parsed.REDIS_URL,
      port: parsed.PORT,
      logLevel: parsed.LOG_LEVEL,
      snapshotStore: parsed.SNAPSHOT_STORE,
      leaseStore: parsed.LEASE_STORE,
      upstream: {
        apiKey: parsed.NOTION_API_KEY,
        apiUrl: parsed.NOTION_API_URL.replace(/\/+$/u, ""),
        apiVersion: parsed.NOTION_VERSION,
        timeoutMs: parsed.UPSTREAM_TIMEOUT_MS,
        databaseIds: {
          projects: parsed.NOTION_PROJECTS_DATABASE_ID,
          tasks: parsed.NOTION_TASKS_DATABASE_ID,
          todos: parsed.NOTION_TODOS_DATABASE_ID,
          members: parsed.NOTION_MEMBERS_DATABASE_ID
        }
      },
      cache: {
        refreshIntervalMs: parsed.CACHE_REFRESH_INTERVAL_MINUTES * MINUTE_MS,
        staleAfterMs,
        leaseTtlMs: parsed.REFRESH_LEASE_TTL_MS,
        schedulerEnabled: parsed.SCHEDULER_ENABLED,
        permanentFailureAlertThreshold: parsed.PERMANENT_FAILURE_ALERT_THRESHOLD
      }
    };

    cachedConfig = config;
    return config;
  } catch (error) {
    if (error instanceof ZodError) {
      const formatted = error.errors
        .map((issue) => {
          const [pathSegment] = issue.path;
          const identifier = typeof pathSegment === "string" ? pathSegment : "unknown";
          return `${identifier}: ${issue.message}`;
        })
        .join("; ");
      throw new Error(`Invalid configuration: ${formatted}`);
    }
    throw error;
  }
}

export function getConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  return loadConfig();
}

export function clearConfigCache(): void {
  cachedConfig = null;
}
