import type { ResourceRecordMap } from "../domain/records.js";
import { RESOURCE_TYPES, type ResourceType } from "../domain/resourceTypes.js";
import type { RefreshStatus, Snapshot } from "../domain/snapshot.js";
import { getAppLogger, type AppLogger } from "../logging/logger.js";
import { SnapshotNotFoundError, describeError } from "../models/errorCodes.js";
import type { RefreshLeaseStore } from "../models/refreshLease.js";
import type { RefreshStatusRepository } from "../models/refreshStatusRepository.js";
import type { SnapshotStore } from "../models/snapshotStore.js";
import type { MetricsService } from "./metricsService.js";

export interface RecordFilter {
  status?: string;
  /** Case-insensitive match against any assignee. */
  assignee?: string;
  /** YYYY-MM-DD, UTC. */
  createdOn?: string;
  editedOn?: string;
  /** Keeps records whose due date is strictly earlier than this day. */
  dueBefore?: string;
}

export interface FreshnessView {
  resourceType: ResourceType;
  fetchedAt: Date;
  version: number;
  recordCount: number;
  sourceChecksum: string | null;
  ageMs: number;
  staleAfterMs: number;
  isStale: boolean;
}

export interface ReadResult<T extends ResourceType> {
  records: readonly ResourceRecordMap[T][];
  freshness: FreshnessView;
}

export interface FreshnessReport extends FreshnessView {
  refreshing: boolean;
  lastRefresh: RefreshStatus | null;
}

export type OverviewEntry =
  | ({ exists: true } & FreshnessReport)
  | { exists: false; resourceType: ResourceType; refreshing: boolean; lastRefresh: RefreshStatus | null };

export interface ReadServiceDependencies {
  store: SnapshotStore;
  leases?: RefreshLeaseStore;
  statuses?: RefreshStatusRepository;
  metrics?: MetricsService;
  logger?: AppLogger;
  now?: () => Date;
}

interface FilterableFields {
  status: string | null;
  assignees: readonly string[];
  createdTime: string | null;
  editedTime: string | null;
  dueDate: string | null;
}

type FieldAccessors = { [K in ResourceType]: (record: ResourceRecordMap[K]) => FilterableFields };

const FILTER_FIELDS: FieldAccessors = {
  projects: (record) => ({
    status: record.status,
    assignees: record.assignees,
    createdTime: record.createdTime,
    editedTime: record.lastEditedTime,
    dueDate: null
  }),
  tasks: (record) => ({
    status: record.status,
    assignees: record.assignees,
    createdTime: record.createdTime,
    editedTime: record.lastEditedTime,
    dueDate: record.dueDate
  }),
  todos: (record) => ({
    status: record.status,
    assignees: record.assignees,
    createdTime: null,
    editedTime: null,
    dueDate: record.deadline
  }),
  members: (record) => ({
    status: record.status,
    assignees: [record.name],
    createdTime: record.createdTime || null,
    editedTime: record.lastEditedTime || null,
    dueDate: null
  })
};

function sameDay(timestamp: string | null, day: string): boolean {
  return timestamp !== null && timestamp.slice(0, 10) === day;
}

function matches(fields: FilterableFields, filter: RecordFilter): boolean {
  if (filter.status !== undefined && fields.status !== filter.status) {
    return false;
  }
  if (filter.assignee !== undefined) {
    const wanted = filter.assignee.toLowerCase();
    if (!fields.assignees.some((assignee) => assignee.toLowerCase() === wanted)) {
      return false;
    }
  }
  if (filter.createdOn !== undefined && !sameDay(fields.createdTime, filter.createdOn)) {
    return false;
  }
  if (filter.editedOn !== undefined && !sameDay(fields.editedTime, filter.editedOn)) {
    return false;
  }
  if (filter.dueBefore !== undefined) {
    if (fields.dueDate === null || fields.dueDate.slice(0, 10) >= filter.dueBefore) {
      return false;
    }
  }
  return true;
}

export function filterRecords<T extends ResourceType>(
  resourceType: T,
  records: readonly ResourceRecordMap[T][],
  filter: RecordFilter = {}
): ResourceRecordMap[T][] {
  const fieldsOf: FieldAccessors[T] = FILTER_FIELDS[resourceType];
  return records.filter((record) => matches(fieldsOf(record), filter));
}

/**
 * Serves the last committed snapshot. Never fetches upstream and never waits on a
 * refresh in flight.
 */
export class ReadService {
  private readonly logger: AppLogger;
  private readonly now: () => Date;

  constructor(
    private readonly deps: ReadServiceDependencies,
    private readonly staleAfterMs: Record<ResourceType, number>
  ) {
    const rootLogger = deps.logger ?? getAppLogger();
    this.logger = rootLogger.child?.({ module: "readService" }) ?? rootLogger;
    this.now = deps.now ?? (() => new Date());
  }

  /** Resolves to null when nothing was ever committed for the type. */
  async read<T extends ResourceType>(resourceType: T, filter?: RecordFilter): Promise<ReadResult<T> | null> {
    const snapshot = await this.deps.store.get(resourceType);
    this.deps.metrics?.recordRead(resourceType, snapshot !== null);
    if (!snapshot) {
      return null;
    }
    const records = filter ? filterRecords(resourceType, snapshot.records, filter) : snapshot.records;
    return { records, freshness: this.describe(snapshot) };
  }

  async require<T extends ResourceType>(resourceType: T, filter?: RecordFilter): Promise<ReadResult<T>> {
    const result = await this.read(resourceType, filter);
    if (!result) {
      throw new SnapshotNotFoundError(resourceType);
    }
    return result;
  }

  async freshness(resourceType: ResourceType): Promise<FreshnessReport | null> {
    const freshness = await this.deps.store.freshnessOf(resourceType);
    if (!freshness) {
      return null;
    }
    const [refreshing, lastRefresh] = await Promise.all([this.isRefreshing(resourceType), this.lastRefresh(resourceType)]);
    return { ...this.describe(freshness), refreshing, lastRefresh };
  }

  /** One status listing serves every type. */
  async overview(): Promise<OverviewEntry[]> {
    const statuses = await this.allStatuses();
    return Promise.all(
      RESOURCE_TYPES.map(async (resourceType): Promise<OverviewEntry> => {
        const [freshness, refreshing] = await Promise.all([
          this.deps.store.freshnessOf(resourceType),
          this.isRefreshing(resourceType)
        ]);
        const lastRefresh = statuses.get(resourceType) ?? null;
        if (freshness) {
          return { exists: true, ...this.describe(freshness), refreshing, lastRefresh };
        }
        return { exists: false, resourceType, refreshing, lastRefresh };
      })
    );
  }

  today(): Date {
    return this.now();
  }

  private describe(snapshot: Pick<Snapshot, "resourceType" | "fetchedAt" | "version" | "recordCount" | "sourceChecksum">): FreshnessView {
    const ageMs = Math.max(0, this.now().getTime() - snapshot.fetchedAt.getTime());
    const staleAfterMs = this.staleAfterMs[snapshot.resourceType];
    return {
      resourceType: snapshot.resourceType,
      fetchedAt: snapshot.fetchedAt,
      version: snapshot.version,
      recordCount: snapshot.recordCount,
      sourceChecksum: snapshot.sourceChecksum,
      ageMs,
      staleAfterMs,
      isStale: ageMs > staleAfterMs
    };
  }

  // Lease and status lookups only decorate the answer; their failures are logged.
  private async isRefreshing(resourceType: ResourceType): Promise<boolean> {
    if (!this.deps.leases) {
      return false;
    }
    try {
      return (await this.deps.leases.inspect(resourceType)) !== null;
    } catch (error) {
      this.logger.warn?.({ resourceType, err: describeError(error) }, "read.lease_inspect_failed");
      return false;
    }
  }

  private async allStatuses(): Promise<Map<ResourceType, RefreshStatus>> {
    if (!this.deps.statuses) {
      return new Map();
    }
    try {
      const statuses = await this.deps.statuses.list();
      return new Map(statuses.map((status) => [status.resourceType, status]));
    } catch (error) {
      this.logger.warn?.({ err: describeError(error) }, "read.status_list_failed");
      return new Map();
    }
  }

  private async lastRefresh(resourceType: ResourceType): Promise<RefreshStatus | null> {
    if (!this.deps.statuses) {
      return null;
    }
    try {
      return await this.deps.statuses.get(resourceType);
    } catch (error) {
      this.logger.warn?.({ resourceType, err: describeError(error) }, "read.status_lookup_failed");
      return null;
    }
  }
}
