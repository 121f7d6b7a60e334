// ---------------------------------------------------------------------------
// Request ID middleware for the gateway.
// ---------------------------------------------------------------------------

import type { MiddlewareHandler } from "hono";

import type { GatewayEnv } from "../env.js";

export const REQUEST_ID_HEADER = "X-Request-ID";

/** Accepted client-supplied ids; anything else could forge log lines. */
const SAFE_REQUEST_ID_RE = /^[a-zA-Z0-9_-]{1,128}$/;

/**
 * Reuses a well-formed incoming `X-Request-ID` or generates a UUID, stores
 * it as the `requestId` variable and echoes it on the response.
 */
export function requestIdMiddleware(): MiddlewareHandler<GatewayEnv> {
  return async (c, next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const requestId =
      incoming !== undefined && SAFE_REQUEST_ID_RE.test(incoming)
        ? incoming
        : crypto.randomUUID();

    c.set("requestId", requestId);
    c.header(REQUEST_ID_HEADER, requestId);
    await next();
  };
}
