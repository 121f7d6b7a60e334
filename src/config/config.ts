// ---------------------------------------------------------------------------
// Typed process configuration loader.
// Reads from environment variables with sensible defaults.
// ---------------------------------------------------------------------------

import type { AppConfig } from "../core/types.js";

const ENVIRONMENTS: readonly AppConfig["env"][] = [
  "development",
  "staging",
  "production",
];

function parseEnvironment(raw: string | undefined): AppConfig["env"] {
  return ENVIRONMENTS.find((env) => env === raw) ?? "development";
}

/**
 * Load the gateway configuration from environment variables.
 *
 * Every setting has a default so the gateway can start with only an
 * Aleph config file in place.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = Number.parseInt(env["ALEPH_PORT"] ?? "3000", 10);

  return {
    env: parseEnvironment(env["ALEPH_ENV"]),
    port: Number.isNaN(port) ? 3000 : port,
    logLevel: env["ALEPH_LOG_LEVEL"] ?? "info",
    alephConfigPath: env["ALEPH_CONFIG_PATH"] ?? "config/aleph.yaml",
  };
}
