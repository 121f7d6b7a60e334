// ---------------------------------------------------------------------------
// Gateway bootstrap: configuration, logger, Aleph client and Hono app.
// ---------------------------------------------------------------------------

import type { Hono } from "hono";

import { AlephClient } from "./client.js";
import type { Z3950Connector } from "./clients/z3950/connector.js";
import { loadAlephConfig } from "./config/aleph-config.js";
import { loadConfig } from "./config/config.js";
import type { AppConfig } from "./core/types.js";
import { createLogger } from "./logging/logger.js";
import type { GatewayEnv } from "./api/env.js";
import { createApp } from "./api/server.js";

export interface BuildAppOptions {
  /** Enables the z3950 section of the config; it is skipped without one. */
  z3950Connector?: Z3950Connector;
  config?: AppConfig;
}

export interface BuiltApp {
  app: Hono<GatewayEnv>;
  client: AlephClient;
  config: AppConfig;
}

export function buildApp(options: BuildAppOptions = {}): BuiltApp {
  // 1. Load configuration
  const config = options.config ?? loadConfig();

  // 2. Create logger
  const logger = createLogger({
    level: config.logLevel,
    prettyPrint: config.env === "development",
    redactSecrets: true,
  });

  // 3. Load the Aleph service configuration
  const alephConfig = loadAlephConfig(config.alephConfigPath);
  if (alephConfig.z3950 && !options.z3950Connector) {
    logger.warn("no Z39.50 connector supplied; z3950 service disabled");
    delete alephConfig.z3950;
  }

  // 4. Create the client facade
  const client = new AlephClient(alephConfig, {
    logger,
    z3950Connector: options.z3950Connector,
  });

  // 5. Create Hono app
  const app = createApp({ client, logger });

  logger.info(
    {
      port: config.port,
      env: config.env,
      base: alephConfig.base,
      services: {
        oai: alephConfig.oai !== undefined,
        x: alephConfig.x !== undefined,
        z3950: alephConfig.z3950 !== undefined,
      },
    },
    "aleph gateway ready",
  );

  return { app, client, config };
}
