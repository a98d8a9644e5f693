import { Router } from "express";
import type { RefreshScheduler } from "../application/jobs/refreshScheduler.js";
import type { MetricsService } from "../services/metricsService.js";

export interface MetricsRouterDeps {
  metrics: MetricsService;
  scheduler?: RefreshScheduler;
}

export function createMetricsRouter(deps: MetricsRouterDeps): Router {
  const router = Router();

  router.get("/api/metrics", (_req, res) => {
    res.status(200).json({
      resources: deps.metrics.getSnapshot(),
      scheduler: deps.scheduler
        ? { scheduled: deps.scheduler.isScheduled(), ticks: deps.scheduler.getStats() }
        : null
    });
  });

  return router;
}
