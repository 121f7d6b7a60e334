// ---------------------------------------------------------------------------
// Hono application factory.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type pino from "pino";

import type { AlephClient } from "../client.js";
import { createRequestLogger } from "../logging/context.js";
import type { GatewayEnv } from "./env.js";
import { errorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { healthRoutes } from "./routes/health.js";
import { oaiRoutes } from "./routes/oai.js";
import { xRoutes } from "./routes/x.js";

// ── Dependency bundle ──────────────────────────────────────────────────────

export interface AppDependencies {
  client: AlephClient;
  logger: pino.Logger;
}

// ── App factory ────────────────────────────────────────────────────────────

/**
 * Create the HTTP gateway over an {@link AlephClient}.
 *
 * Middleware stack (applied in order):
 * 1. Request ID generation (`X-Request-ID`).
 * 2. Request-scoped child logger attached to context.
 * 3. Route handlers.
 * 4. Global error handler (maps client errors to HTTP status codes).
 */
export function createApp(deps: AppDependencies): Hono<GatewayEnv> {
  const app = new Hono<GatewayEnv>();

  app.use("*", requestIdMiddleware());
  app.use("*", createRequestLogger(deps.logger));

  app.get("/", (c) =>
    c.json({
      name: "aleph-client",
      routes: ["/health", "/oai", "/x"],
    }),
  );

  app.route("/health", healthRoutes({ client: deps.client }));
  app.route("/oai", oaiRoutes({ client: deps.client }));
  app.route("/x", xRoutes({ client: deps.client }));

  app.notFound((c) => c.json({ error: "Not found", type: "not_found" }, 404));
  app.onError(errorHandler);

  return app;
}
