// ---------------------------------------------------------------------------
// Request-scoped logging middleware for the gateway.
// ---------------------------------------------------------------------------

import type { MiddlewareHandler } from "hono";
import type pino from "pino";

import type { GatewayEnv } from "../api/env.js";

/**
 * Attaches a child logger bound to `requestId`, `method` and `path`.  Routes
 * read it with `c.get("logger")`, so upstream Aleph calls and stream
 * progress log under the same request id.
 *
 * The completion line is logged at `error` for 5xx, `warn` for 4xx and
 * `info` otherwise.  Runs after {@link requestIdMiddleware}.
 */
export function createRequestLogger(
  baseLogger: pino.Logger,
): MiddlewareHandler<GatewayEnv> {
  return async (c, next) => {
    const logger = baseLogger.child({
      requestId: c.get("requestId"),
      method: c.req.method,
      path: c.req.path,
    });
    c.set("logger", logger);

    const start = performance.now();
    logger.debug({ query: c.req.query() }, "request started");

    await next();

    const status = c.res.status;
    const completion = {
      status,
      durationMs: Math.round(performance.now() - start),
      // NDJSON responses are still streaming when this runs.
      streaming:
        c.res.headers.get("content-type")?.startsWith("application/x-ndjson") ?? false,
    };

    if (status >= 500) logger.error(completion, "request failed");
    else if (status >= 400) logger.warn(completion, "request rejected");
    else logger.info(completion, "request completed");
  };
}
