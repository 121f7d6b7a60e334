// ---------------------------------------------------------------------------
// Health check routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { AlephClient } from "../../client.js";

/** Dependencies required by health routes. */
export interface HealthRouteDeps {
  client: AlephClient;
}

const startedAt = Date.now();

/**
 * Mounts health-check endpoints:
 *
 * - `GET /health`          -- Basic liveness probe.
 * - `GET /health/services` -- Availability of every configured Aleph service.
 */
export function healthRoutes(deps: HealthRouteDeps): Hono {
  const app = new Hono();

  // GET /health
  app.get("/", (c) => {
    return c.json({
      status: "ok",
      uptime: Date.now() - startedAt,
      timestamp: new Date().toISOString(),
    });
  });

  // GET /health/services
  app.get("/services", async (c) => {
    const services = await deps.client.healthCheck();
    const healthy = services.every((s) => s.healthy);
    return c.json({ status: healthy ? "ok" : "degraded", services }, healthy ? 200 : 503);
  });

  return app;
}
