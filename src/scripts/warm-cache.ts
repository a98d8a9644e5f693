import "../infra/envBootstrap.js";
import { fileURLToPath } from "node:url";
import type { RefreshOutcome } from "../domain/snapshot.js";
import { initializeContainer, shutdownContainer } from "../infra/container.js";
import { getAppLogger } from "../logging/logger.js";
import { runMigrations } from "./run-migrations.js";

/**
 * One-shot population of every resource type, for use before the server takes
 * traffic. Exits non-zero when any type failed to land.
 */
export async function warmCache(): Promise<RefreshOutcome[]> {
  const container = await initializeContainer();
  try {
    if (container.postgres) {
      await runMigrations({ logger: container.logger, pool: container.postgres });
    }
    return await container.coordinator.refreshAll();
  } finally {
    await shutdownContainer();
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  const logger = getAppLogger();
  warmCache()
    .then((outcomes) => {
      for (const outcome of outcomes) {
        logger.info?.({ resourceType: outcome.resourceType, status: outcome.status }, "warm_cache.outcome");
      }
      if (outcomes.some((outcome) => outcome.status !== "success")) {
        process.exitCode = 1;
      }
    })
    .catch((err: unknown) => {
      logger.error?.({ err }, "warm_cache.failed");
      process.exitCode = 1;
    });
}
