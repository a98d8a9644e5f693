import { Router } from "express";
import type { ResourceType } from "../domain/resourceTypes.js";
import type { RefreshOutcome } from "../domain/snapshot.js";
import { restSchemas } from "../contracts/restSchemas.js";
import type { AppLogger } from "../logging/logger.js";
import { SnapshotNotFoundError } from "../models/errorCodes.js";
import type { ReadService } from "../services/readService.js";
import { parseRequestPart, parseResourceType } from "./validation.js";

export interface RefreshRunner {
  refresh(resourceType: ResourceType): Promise<RefreshOutcome>;
  refreshAll(): Promise<RefreshOutcome[]>;
}

export interface CacheRouterDeps {
  coordinator: RefreshRunner;
  reader: ReadService;
  logger: AppLogger;
}

export function httpStatusForOutcome(outcome: RefreshOutcome): number {
  switch (outcome.status) {
    case "success":
      return 200;
    case "already_in_progress":
      return 202;
    case "transient_failure":
      return 503;
    case "permanent_failure":
      return 502;
  }
}

export function createCacheRouter(deps: CacheRouterDeps): Router {
  const router = Router();
  const { coordinator, reader, logger } = deps;

  router.get("/api/cache", async (_req, res, next) => {
    try {
      const resources = await reader.overview();
      res.status(200).json({ resources });
    } catch (error) {
      next(error);
    }
  });

  router.post("/api/cache/refresh", async (_req, res, next) => {
    try {
      const outcomes = await coordinator.refreshAll();
      logger.info?.({ outcomes: outcomes.map((outcome) => outcome.status) }, "cache.refresh_all.manual");
      res.status(200).json({ outcomes });
    } catch (error) {
      next(error);
    }
  });

  router.post("/api/cache/:resourceType/refresh", async (req, res, next) => {
    try {
      const resourceType = parseResourceType(req.params.resourceType);
      const outcome = await coordinator.refresh(resourceType);
      logger.info?.({ resourceType, status: outcome.status }, "cache.refresh.manual");
      res.status(httpStatusForOutcome(outcome)).json(outcome);
    } catch (error) {
      next(error);
    }
  });

  router.get("/api/cache/:resourceType/freshness", async (req, res, next) => {
    try {
      const resourceType = parseResourceType(req.params.resourceType);
      const freshness = await reader.freshness(resourceType);
      if (!freshness) {
        throw new SnapshotNotFoundError(resourceType);
      }
      res.status(200).json(freshness);
    } catch (error) {
      next(error);
    }
  });

  router.get("/api/cache/:resourceType", async (req, res, next) => {
    try {
      const resourceType = parseResourceType(req.params.resourceType);
      const filter = parseRequestPart(restSchemas.snapshotQuery, req.query);
      const { records, freshness } = await reader.require(resourceType, filter);
      res.status(200).json({ ...freshness, totalCount: records.length, records });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
