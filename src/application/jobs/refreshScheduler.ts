import { z } from "zod";
import { RESOURCE_TYPES, type ResourceType } from "../../domain/resourceTypes.js";
import type { RefreshOutcome, RefreshOutcomeStatus } from "../../domain/snapshot.js";
import { getAppLogger, type AppLogger } from "../../logging/logger.js";
import { describeError } from "../../models/errorCodes.js";
import type { MetricsService } from "../../services/metricsService.js";

export const RefreshSchedulerConfigSchema = z.object({
  intervalMs: z.number().int().min(1000).default(30 * 60 * 1000),
  runOnStart: z.boolean().default(true),
  enabled: z.boolean().default(true)
});

export type RefreshSchedulerConfig = z.infer<typeof RefreshSchedulerConfigSchema>;

/** What the scheduler drives; the refresh coordinator in production. */
export interface RefreshTrigger {
  refresh(resourceType: ResourceType): Promise<RefreshOutcome>;
}

export interface ResourceTickStats {
  ticks: number;
  skipped: number;
  lastTickAt?: Date;
  lastOutcome?: RefreshOutcomeStatus;
}

export type RefreshSchedulerStats = Record<ResourceType, ResourceTickStats>;

export interface RefreshSchedulerOptions {
  logger?: AppLogger;
  metrics?: MetricsService;
  now?: () => Date;
}

/**
 * Fires a refresh for every resource type on a fixed interval, one timer per type.
 * Ticks are independent across types and are never queued: a tick that meets a
 * refresh still in flight comes back as already_in_progress and is dropped.
 */
export class RefreshScheduler {
  private readonly config: RefreshSchedulerConfig;
  private readonly logger: AppLogger;
  private readonly now: () => Date;
  private readonly timers = new Map<ResourceType, NodeJS.Timeout>();
  private readonly stats: RefreshSchedulerStats = {
    projects: { ticks: 0, skipped: 0 },
    tasks: { ticks: 0, skipped: 0 },
    todos: { ticks: 0, skipped: 0 },
    members: { ticks: 0, skipped: 0 }
  };

  constructor(
    private readonly trigger: RefreshTrigger,
    config: Partial<RefreshSchedulerConfig> = {},
    private readonly options: RefreshSchedulerOptions = {}
  ) {
    this.config = RefreshSchedulerConfigSchema.parse(config);
    const rootLogger = options.logger ?? getAppLogger();
    this.logger = rootLogger.child?.({ module: "refreshScheduler" }) ?? rootLogger;
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.timers.size > 0) {
      this.logger.warn?.({}, "scheduler.already_running");
      return;
    }

    if (!this.config.enabled) {
      this.logger.info?.({}, "scheduler.disabled");
      return;
    }

    this.logger.info?.({ intervalMs: this.config.intervalMs, resourceTypes: RESOURCE_TYPES }, "scheduler.started");

    for (const resourceType of RESOURCE_TYPES) {
      if (this.config.runOnStart) {
        this.fire(resourceType);
      }
      this.timers.set(
        resourceType,
        setInterval(() => this.fire(resourceType), this.config.intervalMs)
      );
    }
  }

  stop(): void {
    if (this.timers.size === 0) {
      return;
    }
    for (const timer of this.timers.values()) {
      clearInterval(timer);
    }
    this.timers.clear();
    this.logger.info?.({}, "scheduler.stopped");
  }

  isScheduled(): boolean {
    return this.timers.size > 0;
  }

  /** Runs one tick for a type and resolves with its outcome. */
  async tick(resourceType: ResourceType): Promise<RefreshOutcome> {
    const stats = this.stats[resourceType];
    stats.ticks += 1;
    stats.lastTickAt = this.now();

    const outcome = await this.trigger.refresh(resourceType);
    stats.lastOutcome = outcome.status;

    if (outcome.status === "already_in_progress") {
      stats.skipped += 1;
      this.options.metrics?.recordSkippedTick(resourceType);
      this.logger.info?.({ resourceType }, "scheduler.tick_skipped");
    }
    return outcome;
  }

  getStats(): RefreshSchedulerStats {
    return {
      projects: { ...this.stats.projects },
      tasks: { ...this.stats.tasks },
      todos: { ...this.stats.todos },
      members: { ...this.stats.members }
    };
  }

  private fire(resourceType: ResourceType): void {
    this.tick(resourceType).catch((error: unknown) => {
      this.logger.error?.({ resourceType, err: describeError(error) }, "scheduler.tick_failed");
    });
  }
}
