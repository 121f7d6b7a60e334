// ---------------------------------------------------------------------------
// Per-request context variables set by the gateway middleware.
// ---------------------------------------------------------------------------

import type pino from "pino";

export type GatewayEnv = {
  Variables: {
    /** Correlation id echoed in `X-Request-ID`. */
    requestId: string;
    /** Child logger bound to the request. */
    logger: pino.Logger;
  };
};
