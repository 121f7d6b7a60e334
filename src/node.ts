// ---------------------------------------------------------------------------
// Node.js HTTP server entrypoint for the gateway.
// ---------------------------------------------------------------------------

import { serve } from "@hono/node-server";
import { buildApp } from "./app.js";

const { app, client, config } = buildApp();

const server = serve({
  fetch: app.fetch,
  port: config.port,
});

async function shutdown(): Promise<void> {
  server.close();
  await client.close();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(err);
        process.exit(1);
      },
    );
  });
}
