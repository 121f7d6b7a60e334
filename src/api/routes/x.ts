// ---------------------------------------------------------------------------
// X-Server search routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { Context } from "hono";

import type { AlephClient } from "../../client.js";
import type { GatewayEnv } from "../env.js";
import { streamNdjson } from "./ndjson.js";

export interface XRouteDeps {
  client: AlephClient;
}

type SearchQuery = { field: string; value: string };

function readSearchQuery(c: Context): SearchQuery | null {
  const field = c.req.query("field");
  const value = c.req.query("value");
  if (!field || !value) return null;
  return { field, value };
}

async function* asSystemNumberItems(
  systemNumbers: AsyncGenerator<string, void, undefined>,
): AsyncGenerator<{ systemNumber: string }, void, undefined> {
  for await (const systemNumber of systemNumbers) {
    yield { systemNumber };
  }
}

/**
 * Mounts X-Server endpoints:
 *
 * - `GET /x/system-numbers?field&value` -- Every match, as NDJSON.
 * - `GET /x/system-number?field&value`  -- The single match, or null.
 */
export function xRoutes(deps: XRouteDeps): Hono<GatewayEnv> {
  const app = new Hono<GatewayEnv>();

  const missingQuery = (c: Context): Response =>
    c.json(
      {
        error: "Missing required query parameters: field, value",
        type: "validation_error",
      },
      400,
    );

  app.get("/system-numbers", async (c) => {
    const query = readSearchQuery(c);
    if (!query) return missingQuery(c);

    const systemNumbers = deps.client.x.findSystemNumbers(query.field, query.value, {
      signal: c.req.raw.signal,
    });
    return await streamNdjson(
      c,
      asSystemNumberItems(systemNumbers),
      c.get("logger").child({ route: "x.system-numbers" }),
    );
  });

  app.get("/system-number", async (c) => {
    const query = readSearchQuery(c);
    if (!query) return missingQuery(c);

    const systemNumber = await deps.client.x.getOneOrNoneSystemNumber(
      query.field,
      query.value,
      { signal: c.req.raw.signal },
    );
    return c.json({ ...query, systemNumber });
  });

  return app;
}
