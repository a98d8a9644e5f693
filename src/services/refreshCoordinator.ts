import { computeSourceChecksum } from "../domain/checksum.js";
import { RESOURCE_TYPES, type ResourceType } from "../domain/resourceTypes.js";
import type { RefreshErrorDetail, RefreshLease, RefreshOutcome, RefreshStatus } from "../domain/snapshot.js";
import { getAppLogger, type AppLogger } from "../logging/logger.js";
import { CacheServiceError, describeError } from "../models/errorCodes.js";
import type { RefreshLeaseStore } from "../models/refreshLease.js";
import type { RefreshStatusRepository } from "../models/refreshStatusRepository.js";
import type { SnapshotStore } from "../models/snapshotStore.js";
import type { MetricsService } from "./metricsService.js";
import type { FetchResult, UpstreamFetcher } from "./upstreamFetcher.js";

const DEFAULT_PERMANENT_FAILURE_ALERT_THRESHOLD = 3;

export interface RefreshCoordinatorDependencies {
  store: SnapshotStore;
  fetcher: UpstreamFetcher;
  leases: RefreshLeaseStore;
  statuses?: RefreshStatusRepository;
  metrics?: MetricsService;
  logger?: AppLogger;
  now?: () => Date;
}

export interface RefreshCoordinatorOptions {
  permanentFailureAlertThreshold?: number;
}

type AttemptOutcome = Exclude<RefreshOutcome, { status: "already_in_progress" }>;

function errorDetail(error: unknown): RefreshErrorDetail {
  if (error instanceof CacheServiceError) {
    return { code: error.code, message: error.message };
  }
  return { code: "INTERNAL_ERROR", message: describeError(error) };
}

/**
 * Runs one refresh attempt per call: lease, fetch, commit, release. Nothing is
 * retried here; the next scheduler tick is the retry.
 */
export class RefreshCoordinator {
  private readonly logger: AppLogger;
  private readonly now: () => Date;
  private readonly alertThreshold: number;

  constructor(private readonly deps: RefreshCoordinatorDependencies, options: RefreshCoordinatorOptions = {}) {
    const rootLogger = deps.logger ?? getAppLogger();
    this.logger = rootLogger.child?.({ module: "refreshCoordinator" }) ?? rootLogger;
    this.now = deps.now ?? (() => new Date());
    this.alertThreshold = Math.max(
      1,
      options.permanentFailureAlertThreshold ?? DEFAULT_PERMANENT_FAILURE_ALERT_THRESHOLD
    );
  }

  async refresh(resourceType: ResourceType): Promise<RefreshOutcome> {
    const startedAt = this.now();

    let lease: RefreshLease | null;
    try {
      lease = await this.deps.leases.acquire(resourceType);
    } catch (error) {
      this.logger.error?.({ resourceType, err: describeError(error) }, "refresh.lease_unavailable");
      return this.finish(startedAt, {
        status: "transient_failure",
        resourceType,
        error: { code: "LEASE_UNAVAILABLE", message: describeError(error) },
        durationMs: this.elapsed(startedAt)
      });
    }

    if (!lease) {
      this.logger.info?.({ resourceType }, "refresh.already_in_progress");
      this.deps.metrics?.recordRefreshOutcome(resourceType, "already_in_progress");
      return { status: "already_in_progress", resourceType };
    }

    let outcome: AttemptOutcome;
    try {
      outcome = await this.attempt(resourceType, startedAt);
    } finally {
      try {
        await this.deps.leases.release(lease);
      } catch (error) {
        this.logger.warn?.(
          { resourceType, ownerToken: lease.ownerToken, err: describeError(error) },
          "refresh.lease_release_failed"
        );
      }
    }

    return this.finish(startedAt, outcome);
  }

  /** Triggers every resource type at once; one slow type never holds up the others. */
  async refreshAll(): Promise<RefreshOutcome[]> {
    return Promise.all(RESOURCE_TYPES.map((resourceType) => this.refresh(resourceType)));
  }

  private async attempt(resourceType: ResourceType, startedAt: Date): Promise<AttemptOutcome> {
    let result: FetchResult<ResourceType>;
    try {
      result = await this.deps.fetcher.fetchAll(resourceType);
    } catch (error) {
      this.logger.error?.({ resourceType, err: describeError(error) }, "refresh.fetch_crashed");
      return { status: "transient_failure", resourceType, error: errorDetail(error), durationMs: this.elapsed(startedAt) };
    }

    if (!result.ok) {
      return {
        status: result.error.kind === "transient" ? "transient_failure" : "permanent_failure",
        resourceType,
        error: errorDetail(result.error),
        durationMs: this.elapsed(startedAt)
      };
    }

    try {
      const previous = await this.deps.store.freshnessOf(resourceType);
      const sourceChecksum = computeSourceChecksum(result.records);
      const snapshot = await this.deps.store.commit(resourceType, result.records, { sourceChecksum });
      this.deps.metrics?.recordCommit(resourceType, snapshot.version, snapshot.recordCount);
      return {
        status: "success",
        resourceType,
        version: snapshot.version,
        recordCount: snapshot.recordCount,
        changed: previous?.sourceChecksum !== sourceChecksum,
        durationMs: this.elapsed(startedAt)
      };
    } catch (error) {
      this.logger.error?.({ resourceType, err: describeError(error) }, "refresh.commit_failed");
      return { status: "transient_failure", resourceType, error: errorDetail(error), durationMs: this.elapsed(startedAt) };
    }
  }

  private async finish(startedAt: Date, outcome: AttemptOutcome): Promise<AttemptOutcome> {
    const { resourceType } = outcome;
    this.deps.metrics?.recordRefreshOutcome(resourceType, outcome.status, outcome.durationMs);

    if (outcome.status === "success") {
      this.logger.info?.(
        {
          resourceType,
          version: outcome.version,
          recordCount: outcome.recordCount,
          changed: outcome.changed,
          durationMs: outcome.durationMs
        },
        "refresh.success"
      );
    } else {
      this.logger.warn?.(
        { resourceType, status: outcome.status, error: outcome.error, durationMs: outcome.durationMs },
        "refresh.failed"
      );
    }

    const status = await this.recordStatus(startedAt, outcome);
    if (
      outcome.status === "permanent_failure" &&
      status !== null &&
      status.consecutiveFailures >= this.alertThreshold
    ) {
      this.logger.error?.(
        {
          resourceType,
          consecutiveFailures: status.consecutiveFailures,
          threshold: this.alertThreshold,
          error: outcome.error
        },
        "refresh.permanent_failure_escalated"
      );
    }
    return outcome;
  }

  /**
   * consecutiveFailures counts the current run of failures of one kind; a success or
   * a change of failure kind starts the count over.
   */
  private async recordStatus(startedAt: Date, outcome: AttemptOutcome): Promise<RefreshStatus | null> {
    const repository = this.deps.statuses;
    if (!repository) {
      return null;
    }

    try {
      const previous = await repository.get(outcome.resourceType);
      const succeeded = outcome.status === "success";
      const sameKind = previous !== null && previous.lastOutcome === outcome.status;
      const status: RefreshStatus = {
        resourceType: outcome.resourceType,
        lastAttemptAt: startedAt,
        lastOutcome: outcome.status,
        lastSuccessAt: succeeded ? startedAt : previous?.lastSuccessAt ?? null,
        lastError: outcome.status === "success" ? null : outcome.error,
        consecutiveFailures: succeeded ? 0 : sameKind ? previous.consecutiveFailures + 1 : 1,
        lastDurationMs: outcome.durationMs
      };
      await repository.save(status);
      return status;
    } catch (error) {
      this.logger.warn?.({ resourceType: outcome.resourceType, err: describeError(error) }, "refresh.status_record_failed");
      return null;
    }
  }

  private elapsed(startedAt: Date): number {
    return Math.max(0, this.now().getTime() - startedAt.getTime());
  }
}
