import type { Pool } from "pg";
import { getConfig, type AppConfig } from "./config.js";
import { initializePostgres, closePostgres, healthCheckPostgres } from "./postgres.js";
import { initializeRedis, closeRedis, healthCheckRedis, type RedisClient } from "./redis.js";
import { NotionClient } from "./notion/notionClient.js";
import { RefreshScheduler } from "../application/jobs/refreshScheduler.js";
import type { DependencyCheck } from "../api/health.js";
import {
  InMemoryRefreshLeaseStore,
  RedisRefreshLeaseStore,
  type RefreshLeaseStore
} from "../models/refreshLease.js";
import {
  InMemoryRefreshStatusRepository,
  PostgresRefreshStatusRepository,
  type RefreshStatusRepository
} from "../models/refreshStatusRepository.js";
import { InMemorySnapshotStore, PostgresSnapshotStore, type SnapshotStore } from "../models/snapshotStore.js";
import { MetricsService } from "../services/metricsService.js";
import { ReadService } from "../services/readService.js";
import { RefreshCoordinator } from "../services/refreshCoordinator.js";
import { StorageOutageGuard } from "../services/storageOutageGuard.js";
import { NotionUpstreamFetcher, type UpstreamFetcher } from "../services/upstreamFetcher.js";
import { getAppLogger, setLogLevel, type AppLogger } from "../logging/logger.js";

export interface Container {
  config: AppConfig;
  logger: AppLogger;
  postgres: Pool | null;
  redis: RedisClient | null;
  snapshotStore: SnapshotStore;
  refreshStatusRepository: RefreshStatusRepository;
  leaseStore: RefreshLeaseStore;
  fetcher: UpstreamFetcher;
  metricsService: MetricsService;
  coordinator: RefreshCoordinator;
  readService: ReadService;
  scheduler: RefreshScheduler;
  healthChecks: Partial<Record<"postgres" | "redis", DependencyCheck>>;
}

export interface ServiceOverrides {
  snapshotStore?: SnapshotStore;
  refreshStatusRepository?: RefreshStatusRepository;
  leaseStore?: RefreshLeaseStore;
  fetcher?: UpstreamFetcher;
  metricsService?: MetricsService;
  logger?: AppLogger;
  now?: () => Date;
}

/** Wires the services on top of already-connected backends. */
export function createServices(
  config: AppConfig,
  overrides: ServiceOverrides = {}
): Omit<Container, "postgres" | "redis" | "healthChecks"> {
  const logger = overrides.logger ?? getAppLogger();
  const now = overrides.now;
  const snapshotStore = overrides.snapshotStore ?? new InMemorySnapshotStore({ now });
  const refreshStatusRepository = overrides.refreshStatusRepository ?? new InMemoryRefreshStatusRepository();
  const leaseStore = overrides.leaseStore ?? new InMemoryRefreshLeaseStore({ now });
  const metricsService = overrides.metricsService ?? new MetricsService();
  const fetcher =
    overrides.fetcher ??
    new NotionUpstreamFetcher(
      new NotionClient({
        apiKey: config.upstream.apiKey,
        apiUrl: config.upstream.apiUrl,
        apiVersion: config.upstream.apiVersion,
        timeoutMs: config.upstream.timeoutMs
      }),
      { databaseIds: config.upstream.databaseIds, logger }
    );

  const coordinator = new RefreshCoordinator(
    {
      store: snapshotStore,
      fetcher,
      leases: leaseStore,
      statuses: refreshStatusRepository,
      metrics: metricsService,
      logger,
      now
    },
    { permanentFailureAlertThreshold: config.cache.permanentFailureAlertThreshold }
  );

  const readService = new ReadService(
    { store: snapshotStore, leases: leaseStore, statuses: refreshStatusRepository, metrics: metricsService, logger, now },
    config.cache.staleAfterMs
  );

  const scheduler = new RefreshScheduler(
    coordinator,
    { intervalMs: config.cache.refreshIntervalMs, enabled: config.cache.schedulerEnabled },
    { logger, metrics: metricsService, now }
  );

  return {
    config,
    logger,
    snapshotStore,
    refreshStatusRepository,
    leaseStore,
    fetcher,
    metricsService,
    coordinator,
    readService,
    scheduler
  };
}

let container: Container | null = null;

export async function initializeContainer(): Promise<Container> {
  if (container) {
    return container;
  }

  const config = getConfig();
  setLogLevel(config.logLevel);
  const logger = getAppLogger();
  const overrides: ServiceOverrides = { logger };
  const healthChecks: Container["healthChecks"] = {};

  let postgres: Pool | null = null;
  if (config.snapshotStore === "postgres") {
    postgres = await initializePostgres();
    logger.info?.({}, "infra.postgres.initialized");
    const guard = new StorageOutageGuard({ dependency: "postgres", logger });
    overrides.snapshotStore = new PostgresSnapshotStore(postgres, { guard });
    overrides.refreshStatusRepository = new PostgresRefreshStatusRepository(postgres, guard);
    healthChecks.postgres = () => healthCheckPostgres();
  }

  let redis: RedisClient | null = null;
  if (config.leaseStore === "redis") {
    const client = await initializeRedis();
    redis = client;
    logger.info?.({}, "infra.redis.initialized");
    overrides.leaseStore = new RedisRefreshLeaseStore(
      {
        set: (key, value, options) => client.set(key, value, options),
        get: (key) => client.get(key),
        eval: (script, options) => client.eval(script, options)
      },
      { ttlMs: config.cache.leaseTtlMs }
    );
    healthChecks.redis = () => healthCheckRedis();
  }

  container = { ...createServices(config, overrides), postgres, redis, healthChecks };
  return container;
}

export async function shutdownContainer(): Promise<void> {
  if (container) {
    const { logger } = container;
    logger.info?.({}, "infra.shutdown.begin");
    container.scheduler.stop();
    await Promise.all([
      closePostgres().catch((error: unknown) => logger.error?.({ err: error }, "infra.postgres.close_failed")),
      closeRedis().catch((error: unknown) => logger.error?.({ err: error }, "infra.redis.close_failed"))
    ]);
    logger.info?.({}, "infra.shutdown.complete");
    container = null;
  }
}
