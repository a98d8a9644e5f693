import { counter, gauge, histogram, type Counter, type Gauge, type Histogram } from "../infra/metrics.js";
import type { ResourceType } from "../domain/resourceTypes.js";
import type { RefreshOutcomeStatus } from "../domain/snapshot.js";

const METRIC_NAMES = {
  refreshOutcomeTotal: "cache_refresh_outcome_total",
  refreshDurationMs: "cache_refresh_duration_ms",
  recordCount: "cache_record_count",
  snapshotVersion: "cache_snapshot_version",
  readHitsTotal: "cache_read_hits_total",
  readMissesTotal: "cache_read_misses_total",
  schedulerTicksSkippedTotal: "cache_scheduler_ticks_skipped_total"
} as const;

const OUTCOME_STATUSES: readonly RefreshOutcomeStatus[] = [
  "success",
  "already_in_progress",
  "transient_failure",
  "permanent_failure"
];

export interface LatencySnapshot {
  p50: number | null;
  p95: number | null;
  p99: number | null;
  samples: number;
}

export interface ResourceMetricsSnapshot {
  outcomes: Record<RefreshOutcomeStatus, number>;
  refreshDurationMs: LatencySnapshot;
  recordCount: number;
  snapshotVersion: number;
  readHits: number;
  readMisses: number;
  readHitRatio: number | null;
  schedulerTicksSkipped: number;
}

export type MetricsServiceSnapshot = Record<ResourceType, ResourceMetricsSnapshot>;

interface ResourceMetrics {
  outcomes: Record<RefreshOutcomeStatus, Counter>;
  refreshDuration: Histogram;
  recordCount: Gauge;
  snapshotVersion: Gauge;
  readHits: Counter;
  readMisses: Counter;
  ticksSkipped: Counter;
}

function metricName(base: string, resourceType: ResourceType, suffix?: string): string {
  return suffix ? `${base}.${resourceType}.${suffix}` : `${base}.${resourceType}`;
}

function createResourceMetrics(resourceType: ResourceType): ResourceMetrics {
  return {
    outcomes: {
      success: counter(metricName(METRIC_NAMES.refreshOutcomeTotal, resourceType, "success")),
      already_in_progress: counter(metricName(METRIC_NAMES.refreshOutcomeTotal, resourceType, "already_in_progress")),
      transient_failure: counter(metricName(METRIC_NAMES.refreshOutcomeTotal, resourceType, "transient_failure")),
      permanent_failure: counter(metricName(METRIC_NAMES.refreshOutcomeTotal, resourceType, "permanent_failure"))
    },
    refreshDuration: histogram(metricName(METRIC_NAMES.refreshDurationMs, resourceType)),
    recordCount: gauge(metricName(METRIC_NAMES.recordCount, resourceType)),
    snapshotVersion: gauge(metricName(METRIC_NAMES.snapshotVersion, resourceType)),
    readHits: counter(metricName(METRIC_NAMES.readHitsTotal, resourceType)),
    readMisses: counter(metricName(METRIC_NAMES.readMissesTotal, resourceType)),
    ticksSkipped: counter(metricName(METRIC_NAMES.schedulerTicksSkippedTotal, resourceType))
  };
}

export class MetricsService {
  private readonly byType: Record<ResourceType, ResourceMetrics> = {
    projects: createResourceMetrics("projects"),
    tasks: createResourceMetrics("tasks"),
    todos: createResourceMetrics("todos"),
    members: createResourceMetrics("members")
  };

  recordRefreshOutcome(resourceType: ResourceType, status: RefreshOutcomeStatus, durationMs?: number): void {
    const metrics = this.byType[resourceType];
    metrics.outcomes[status].inc();
    if (durationMs !== undefined && status !== "already_in_progress") {
      metrics.refreshDuration.observe(Math.max(0, durationMs));
    }
  }

  recordCommit(resourceType: ResourceType, version: number, recordCount: number): void {
    const metrics = this.byType[resourceType];
    metrics.snapshotVersion.set(version);
    metrics.recordCount.set(Math.max(0, Math.floor(recordCount)));
  }

  recordRead(resourceType: ResourceType, hit: boolean): void {
    const metrics = this.byType[resourceType];
    if (hit) {
      metrics.readHits.inc();
    } else {
      metrics.readMisses.inc();
    }
  }

  recordSkippedTick(resourceType: ResourceType): void {
    this.byType[resourceType].ticksSkipped.inc();
  }

  getSnapshot(): MetricsServiceSnapshot {
    return {
      projects: this.describe("projects"),
      tasks: this.describe("tasks"),
      todos: this.describe("todos"),
      members: this.describe("members")
    } satisfies MetricsServiceSnapshot;
  }

  private describe(resourceType: ResourceType): ResourceMetricsSnapshot {
    const metrics = this.byType[resourceType];
    const outcomes: Record<RefreshOutcomeStatus, number> = {
      success: 0,
      already_in_progress: 0,
      transient_failure: 0,
      permanent_failure: 0
    };
    for (const status of OUTCOME_STATUSES) {
      outcomes[status] = metrics.outcomes[status].value();
    }

    const readHits = metrics.readHits.value();
    const readMisses = metrics.readMisses.value();

    return {
      outcomes,
      refreshDurationMs: {
        p50: metrics.refreshDuration.percentile(50),
        p95: metrics.refreshDuration.percentile(95),
        p99: metrics.refreshDuration.percentile(99),
        samples: metrics.refreshDuration.count()
      },
      recordCount: metrics.recordCount.value(),
      snapshotVersion: metrics.snapshotVersion.value(),
      readHits,
      readMisses,
      readHitRatio: computeRate(readHits, readHits + readMisses),
      schedulerTicksSkipped: metrics.ticksSkipped.value()
    };
  }
}

function computeRate(success: number, attempts: number): number | null {
  if (attempts <= 0) {
    return null;
  }
  return success / attempts;
}
