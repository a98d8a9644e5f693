import { z } from "zod";
import { parseRecords, type ResourceRecordMap } from "../domain/records.js";
import type { ResourceType } from "../domain/resourceTypes.js";
import type { Snapshot, SnapshotFreshness } from "../domain/snapshot.js";
import { StorageOutageGuard } from "../services/storageOutageGuard.js";
import type { SqlClient } from "./sqlClient.js";

export interface CommitOptions {
  sourceChecksum?: string | null;
}

export interface SnapshotStore {
  get<T extends ResourceType>(resourceType: T): Promise<Snapshot<T> | null>;
  /**
   * Replaces the current snapshot in one step. Readers observe either the previous
   * snapshot or the new one. The returned version is previous + 1 (1 on first commit).
   */
  commit<T extends ResourceType>(
    resourceType: T,
    records: readonly ResourceRecordMap[T][],
    options?: CommitOptions
  ): Promise<Snapshot<T>>;
  freshnessOf(resourceType: ResourceType): Promise<SnapshotFreshness | null>;
}

export interface InMemorySnapshotStoreOptions {
  now?: () => Date;
}

type SnapshotSlots = { [K in ResourceType]: Snapshot<K> | null };

function freezeRecords<T extends object>(records: readonly T[]): readonly T[] {
  const copy = records.map((record) => {
    const clone = structuredClone(record);
    for (const value of Object.values(clone)) {
      if (Array.isArray(value)) {
        Object.freeze(value);
      }
    }
    return Object.freeze(clone);
  });
  return Object.freeze(copy);
}

export class InMemorySnapshotStore implements SnapshotStore {
  private readonly slots: SnapshotSlots = { projects: null, tasks: null, todos: null, members: null };
  private readonly now: () => Date;

  constructor(options: InMemorySnapshotStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async get<T extends ResourceType>(resourceType: T): Promise<Snapshot<T> | null> {
    return this.slots[resourceType];
  }

  async commit<T extends ResourceType>(
    resourceType: T,
    records: readonly ResourceRecordMap[T][],
    options: CommitOptions = {}
  ): Promise<Snapshot<T>> {
    // Everything is built before the slot is touched; the swap below is the commit.
    const previous: SnapshotSlots[T] = this.slots[resourceType];
    const frozen = freezeRecords(records);
    const snapshot: Snapshot<T> = Object.freeze({
      resourceType,
      records: frozen,
      fetchedAt: this.now(),
      version: (previous?.version ?? 0) + 1,
      sourceChecksum: options.sourceChecksum ?? null,
      recordCount: frozen.length
    });
    this.slots[resourceType] = snapshot;
    return snapshot;
  }

  async freshnessOf(resourceType: ResourceType): Promise<SnapshotFreshness | null> {
    const snapshot = await this.get(resourceType);
    return snapshot ? toFreshness(snapshot) : null;
  }
}

const snapshotRowSchema = z.object({
  resource_type: z.string(),
  payload: z.unknown(),
  record_count: z.coerce.number().int().nonnegative(),
  source_checksum: z.string().nullable(),
  version: z.coerce.number().int().positive(),
  fetched_at: z.coerce.date()
});

const freshnessRowSchema = snapshotRowSchema.omit({ payload: true });

const SNAPSHOT_COLUMNS = "resource_type, payload, record_count, source_checksum, version, fetched_at";
const FRESHNESS_COLUMNS = "resource_type, record_count, source_checksum, version, fetched_at";

const UPSERT_SNAPSHOT_SQL = `
  INSERT INTO cache_snapshots (resource_type, payload, record_count, source_checksum, version, fetched_at)
  VALUES ($1, $2::jsonb, $3, $4, 1, $5)
  ON CONFLICT (resource_type) DO UPDATE SET
    payload = EXCLUDED.payload,
    record_count = EXCLUDED.record_count,
    source_checksum = EXCLUDED.source_checksum,
    version = cache_snapshots.version + 1,
    fetched_at = EXCLUDED.fetched_at
  RETURNING ${FRESHNESS_COLUMNS}`;

export interface PostgresSnapshotStoreOptions {
  now?: () => Date;
  guard?: StorageOutageGuard;
}

/**
 * One row per resource type in cache_snapshots. The upsert is a single statement,
 * so the row lock serializes concurrent commits and the version bump cannot be lost.
 */
export class PostgresSnapshotStore implements SnapshotStore {
  private readonly now: () => Date;
  private readonly guard: StorageOutageGuard;

  constructor(private readonly client: SqlClient, options: PostgresSnapshotStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.guard = options.guard ?? new StorageOutageGuard({ dependency: "postgres" });
  }

  async get<T extends ResourceType>(resourceType: T): Promise<Snapshot<T> | null> {
    const result = await this.guard.run("snapshot.get", () =>
      this.client.query(`SELECT ${SNAPSHOT_COLUMNS} FROM cache_snapshots WHERE resource_type = $1`, [resourceType])
    );
    if (result.rows.length === 0) {
      return null;
    }

    const row = snapshotRowSchema.parse(result.rows[0]);
    const records = parseRecords(resourceType, row.payload);
    return {
      resourceType,
      records,
      fetchedAt: row.fetched_at,
      version: row.version,
      sourceChecksum: row.source_checksum,
      recordCount: row.record_count
    };
  }

  async commit<T extends ResourceType>(
    resourceType: T,
    records: readonly ResourceRecordMap[T][],
    options: CommitOptions = {}
  ): Promise<Snapshot<T>> {
    const fetchedAt = this.now();
    const result = await this.guard.run("snapshot.commit", () =>
      this.client.query(UPSERT_SNAPSHOT_SQL, [
        resourceType,
        JSON.stringify(records),
        records.length,
        options.sourceChecksum ?? null,
        fetchedAt
      ])
    );

    const row = freshnessRowSchema.parse(result.rows[0]);
    return {
      resourceType,
      records: [...records],
      fetchedAt: row.fetched_at,
      version: row.version,
      sourceChecksum: row.source_checksum,
      recordCount: row.record_count
    };
  }

  async freshnessOf(resourceType: ResourceType): Promise<SnapshotFreshness | null> {
    const result = await this.guard.run("snapshot.freshness", () =>
      this.client.query(`SELECT ${FRESHNESS_COLUMNS} FROM cache_snapshots WHERE resource_type = $1`, [resourceType])
    );
    if (result.rows.length === 0) {
      return null;
    }

    const row = freshnessRowSchema.parse(result.rows[0]);
    return {
      resourceType,
      fetchedAt: row.fetched_at,
      version: row.version,
      recordCount: row.record_count,
      sourceChecksum: row.source_checksum
    };
  }
}

export function toFreshness(snapshot: Snapshot): SnapshotFreshness {
  return {
    resourceType: snapshot.resourceType,
    fetchedAt: snapshot.fetchedAt,
    version: snapshot.version,
    recordCount: snapshot.recordCount,
    sourceChecksum: snapshot.sourceChecksum
  };
}
