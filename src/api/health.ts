import { performance } from "node:perf_hooks";
import { Router } from "express";
import { restSchemas } from "../contracts/restSchemas.js";
import type { AppLogger } from "../logging/logger.js";

type DependencyStatus = "available" | "degraded" | "unavailable" | "disabled";

interface DependencyCheckResult {
  status: DependencyStatus;
  message?: string;
}

export type DependencyCheck = () => Promise<boolean | DependencyCheckResult>;

export interface HealthRouterDeps {
  logger: AppLogger;
  /** Only the backends this process was configured with; the rest report disabled. */
  checks: Partial<Record<"postgres" | "redis", DependencyCheck>>;
  now?: () => Date;
}

interface TimedDependencyResult extends DependencyCheckResult {
  latencyMs?: number;
  checkedAt?: string;
}

const DEPENDENCIES = ["postgres", "redis"] as const;

function coerceResult(result: boolean | DependencyCheckResult): DependencyCheckResult {
  if (typeof result === "boolean") {
    return { status: result ? "available" : "unavailable" } satisfies DependencyCheckResult;
  }
  return result;
}

export function createHealthRouter(deps: HealthRouterDeps): Router {
  const router = Router();
  const { logger, checks } = deps;
  const now = deps.now ?? (() => new Date());

  router.get("/api/health", async (_req, res, next) => {
    const observedAt = now().toISOString();

    try {
      const results = await Promise.all(
        DEPENDENCIES.map(async (name): Promise<[string, TimedDependencyResult]> => {
          const check = checks[name];
          if (!check) {
            return [name, { status: "disabled" }];
          }

          const startedAt = performance.now();
          try {
            const result = coerceResult(await check());
            return [
              name,
              {
                status: result.status,
                message: result.message,
                latencyMs: Math.round(performance.now() - startedAt),
                checkedAt: now().toISOString()
              }
            ];
          } catch (error) {
            logger.warn?.({ dependency: name, err: error }, "health.dependency_failed");
            return [
              name,
              {
                status: "unavailable",
                message: error instanceof Error ? error.message : "Unknown dependency failure",
                latencyMs: Math.round(performance.now() - startedAt),
                checkedAt: now().toISOString()
              }
            ];
          }
        })
      );

      const statuses = results.map(([, result]) => result.status);
      const overall = statuses.includes("unavailable")
        ? "unavailable"
        : statuses.includes("degraded")
          ? "degraded"
          : "ok";

      const response = restSchemas.health.response.parse({
        status: overall,
        dependencies: Object.fromEntries(results),
        observedAt
      });

      if (overall !== "ok") {
        logger.warn?.({ status: response.status, dependencies: response.dependencies }, "health.status_changed");
      } else {
        logger.debug?.({ status: response.status }, "health.check");
      }

      res.status(overall === "unavailable" ? 503 : 200).json(response);
    } catch (error) {
      logger.error?.({ err: error }, "health.check_failed");
      next(error);
    }
  });

  return router;
}
