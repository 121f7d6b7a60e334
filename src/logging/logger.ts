// ---------------------------------------------------------------------------
// Pino structured JSON logger factory.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { LoggingConfig } from "../core/types.js";

/** Re-export pino's Logger type for convenience. */
export type Logger = pino.Logger;

/** Paths that should be redacted from log output to avoid leaking secrets. */
const SECRET_PATHS: string[] = [
  "*.password",
  "*.apiKey",
  "*.session_id",
  "*.sessionId",
  "req.headers.authorization",
];

/**
 * Create a configured pino logger instance.
 *
 * Lines carry the level label and an ISO timestamp, plus the `service` and
 * `version` base fields.  X-Server session ids are redacted along with
 * credentials.  `prettyPrint` routes output through `pino-pretty`;
 * otherwise lines go to `destination` (stdout by default).
 */
export function createLogger(
  config: LoggingConfig,
  destination?: pino.DestinationStream,
): pino.Logger {
  const baseOptions: pino.LoggerOptions = {
    level: config.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: {
      service: "aleph-client",
      version: process.env["APP_VERSION"] ?? "dev",
    },
    ...(config.redactSecrets
      ? {
          redact: {
            paths: SECRET_PATHS,
            censor: "[REDACTED]",
          },
        }
      : {}),
  };

  if (config.prettyPrint) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      },
    });
  }

  return destination ? pino(baseOptions, destination) : pino(baseOptions);
}

/** A logger that discards everything; the default for library callers. */
export function createSilentLogger(): pino.Logger {
  return pino({ level: "silent" });
}
