import type { Request, Response, NextFunction } from "express";
import { CacheServiceError, ErrorCodeRegistry, mapDefinitionToEntry, type ErrorCodeKey } from "../models/errorCodes.js";
import type { AppLogger } from "../logging/logger.js";

const HTTP_STATUS_BY_CODE: Record<ErrorCodeKey, number> = {
  SNAPSHOT_NOT_FOUND: 404,
  MEMBER_NOT_FOUND: 404,
  UNKNOWN_RESOURCE_TYPE: 400,
  INVALID_QUERY: 400,
  UPSTREAM_TRANSIENT: 503,
  UPSTREAM_PERMANENT: 502,
  STORAGE_UNAVAILABLE: 503,
  LEASE_UNAVAILABLE: 503,
  INTERNAL_ERROR: 500
};

export function mapErrorCodeToStatus(code: ErrorCodeKey): number {
  return HTTP_STATUS_BY_CODE[code];
}

export function createErrorMiddleware(logger: AppLogger) {
  // eslint-disable-next-line @typescript-eslint/no-unused-vars -- Express error signature requires 4 args
  return function errorMiddleware(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
    if (err instanceof CacheServiceError) {
      const status = mapErrorCodeToStatus(err.code);
      if (status >= 500) {
        logger.error?.({ err, code: err.code }, "request.error.service");
      } else {
        logger.debug?.({ code: err.code, details: err.details }, "request.error.client");
      }
      res.status(status).json(err.toResponseBody());
      return;
    }

    logger.error?.({ err }, "request.error.unhandled");
    res.status(500).json(mapDefinitionToEntry(ErrorCodeRegistry.getDefinitionByKey("INTERNAL_ERROR")));
  };
}
