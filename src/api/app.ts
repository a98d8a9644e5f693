import express, { type Express } from "express";
import type { Container } from "../infra/container.js";
import { ErrorCodeRegistry, mapDefinitionToEntry } from "../models/errorCodes.js";
import { createCacheRouter } from "./cache.js";
import { createErrorMiddleware } from "./errorMiddleware.js";
import { createHealthRouter } from "./health.js";
import { createMetricsRouter } from "./metrics.js";
import { createViewsRouter } from "./views.js";

export type AppDependencies = Pick<
  Container,
  "coordinator" | "readService" | "metricsService" | "scheduler" | "healthChecks" | "logger"
>;

export function createApp(deps: AppDependencies): Express {
  const app = express();
  const logger = deps.logger.child?.({ module: "http" }) ?? deps.logger;

  app.disable("x-powered-by");
  app.use(express.json());

  app.use(createHealthRouter({ logger, checks: deps.healthChecks }));
  app.use(createCacheRouter({ coordinator: deps.coordinator, reader: deps.readService, logger }));
  app.use(createViewsRouter({ reader: deps.readService, logger }));
  app.use(createMetricsRouter({ metrics: deps.metricsService, scheduler: deps.scheduler }));

  app.use((_req, res) => {
    res.status(404).json({
      ...mapDefinitionToEntry(ErrorCodeRegistry.getDefinitionByKey("SNAPSHOT_NOT_FOUND")),
      humanMessage: "Route not found"
    });
  });

  app.use(createErrorMiddleware(logger));

  return app;
}
