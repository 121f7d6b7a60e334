// ---------------------------------------------------------------------------
// OAI-PMH routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";

import type { AlephClient } from "../../client.js";
import type { GatewayEnv } from "../env.js";
import { streamNdjson } from "./ndjson.js";

export interface OaiRouteDeps {
  client: AlephClient;
}

/**
 * Mounts OAI-PMH endpoints:
 *
 * - `GET /oai/identify`            -- Repository description.
 * - `GET /oai/records/:docNumber`  -- One MARC record, 404 when deleted.
 * - `GET /oai/records?from&until&set` -- Harvest as NDJSON, one result per line.
 */
export function oaiRoutes(deps: OaiRouteDeps): Hono<GatewayEnv> {
  const app = new Hono<GatewayEnv>();

  app.get("/identify", async (c) => {
    const info = await deps.client.oai.identify({ signal: c.req.raw.signal });
    return c.json(info);
  });

  app.get("/records/:docNumber", async (c) => {
    const docNumber = c.req.param("docNumber");
    const record = await deps.client.oai.getRecord(docNumber, {
      signal: c.req.raw.signal,
    });

    if (record === null) {
      return c.json(
        { error: `Record ${docNumber} has no body`, type: "not_found" },
        404,
      );
    }
    return c.json({ docNumber, record });
  });

  app.get("/records", async (c) => {
    const oai = deps.client.oai;
    // `?from=` means no lower bound.
    const from = c.req.query("from") || undefined;
    const until = c.req.query("until") || undefined;
    const set = c.req.query("set");
    const options = { signal: c.req.raw.signal };

    const results = set
      ? oai.listSetRecords(set, from, until, options)
      : oai.listRecords(from, until, options);

    return await streamNdjson(c, results, c.get("logger").child({ route: "oai.records" }));
  });

  return app;
}
