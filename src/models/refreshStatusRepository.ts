import { z } from "zod";
import { RESOURCE_TYPES, resourceTypeSchema, type ResourceType } from "../domain/resourceTypes.js";
import type { RefreshStatus } from "../domain/snapshot.js";
import { StorageOutageGuard } from "../services/storageOutageGuard.js";
import type { SqlClient } from "./sqlClient.js";

export interface RefreshStatusRepository {
  get(resourceType: ResourceType): Promise<RefreshStatus | null>;
  save(status: RefreshStatus): Promise<void>;
  list(): Promise<RefreshStatus[]>;
}

export class InMemoryRefreshStatusRepository implements RefreshStatusRepository {
  private readonly statuses = new Map<ResourceType, RefreshStatus>();

  async get(resourceType: ResourceType): Promise<RefreshStatus | null> {
    const status = this.statuses.get(resourceType);
    return status ? { ...status } : null;
  }

  async save(status: RefreshStatus): Promise<void> {
    this.statuses.set(status.resourceType, { ...status });
  }

  async list(): Promise<RefreshStatus[]> {
    return RESOURCE_TYPES.flatMap((type) => {
      const status = this.statuses.get(type);
      return status ? [{ ...status }] : [];
    });
  }
}

const statusRowSchema = z.object({
  resource_type: resourceTypeSchema,
  last_attempt_at: z.coerce.date(),
  last_outcome: z.enum(["success", "transient_failure", "permanent_failure"]),
  last_success_at: z.coerce.date().nullable(),
  last_error_code: z.string().nullable(),
  last_error_message: z.string().nullable(),
  consecutive_failures: z.coerce.number().int().nonnegative(),
  last_duration_ms: z.coerce.number().int().nonnegative()
});

type StatusRow = z.infer<typeof statusRowSchema>;

const STATUS_COLUMNS =
  "resource_type, last_attempt_at, last_outcome, last_success_at, last_error_code, last_error_message, consecutive_failures, last_duration_ms";

const UPSERT_STATUS_SQL = `
  INSERT INTO cache_refresh_status (${STATUS_COLUMNS}, updated_at)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, NOW())
  ON CONFLICT (resource_type) DO UPDATE SET
    last_attempt_at = EXCLUDED.last_attempt_at,
    last_outcome = EXCLUDED.last_outcome,
    last_success_at = EXCLUDED.last_success_at,
    last_error_code = EXCLUDED.last_error_code,
    last_error_message = EXCLUDED.last_error_message,
    consecutive_failures = EXCLUDED.consecutive_failures,
    last_duration_ms = EXCLUDED.last_duration_ms,
    updated_at = NOW()`;

function mapRow(row: StatusRow): RefreshStatus {
  return {
    resourceType: row.resource_type,
    lastAttemptAt: row.last_attempt_at,
    lastOutcome: row.last_outcome,
    lastSuccessAt: row.last_success_at,
    lastError:
      row.last_error_code !== null
        ? { code: row.last_error_code, message: row.last_error_message ?? "" }
        : null,
    consecutiveFailures: row.consecutive_failures,
    lastDurationMs: row.last_duration_ms
  };
}

export class PostgresRefreshStatusRepository implements RefreshStatusRepository {
  private readonly guard: StorageOutageGuard;

  constructor(private readonly client: SqlClient, guard?: StorageOutageGuard) {
    this.guard = guard ?? new StorageOutageGuard({ dependency: "postgres" });
  }

  async get(resourceType: ResourceType): Promise<RefreshStatus | null> {
    const result = await this.guard.run("refresh_status.get", () =>
      this.client.query(`SELECT ${STATUS_COLUMNS} FROM cache_refresh_status WHERE resource_type = $1`, [resourceType])
    );
    if (result.rows.length === 0) {
      return null;
    }
    return mapRow(statusRowSchema.parse(result.rows[0]));
  }

  async save(status: RefreshStatus): Promise<void> {
    await this.guard.run("refresh_status.save", () =>
      this.client.query(UPSERT_STATUS_SQL, [
        status.resourceType,
        status.lastAttemptAt,
        status.lastOutcome,
        status.lastSuccessAt,
        status.lastError?.code ?? null,
        status.lastError?.message ?? null,
        status.consecutiveFailures,
        Math.round(status.lastDurationMs)
      ])
    );
  }

  async list(): Promise<RefreshStatus[]> {
    const result = await this.guard.run("refresh_status.list", () =>
      this.client.query(`SELECT ${STATUS_COLUMNS} FROM cache_refresh_status ORDER BY resource_type`)
    );
    return result.rows.map((row) => mapRow(statusRowSchema.parse(row)));
  }
}
