/**
 * Request logging middleware.
 *
 * One structured pino line per request, keyed by request ID.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export function loggerMiddleware(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    logger.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        durationMs: Date.now() - start,
        requestId: c.get("requestId"),
      },
      `${c.req.method} ${c.req.path} ${c.res.status}`,
    );
  };
}
