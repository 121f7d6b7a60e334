// ---------------------------------------------------------------------------
// Hono error handler: maps Aleph client errors to HTTP responses.
// ---------------------------------------------------------------------------

import type { Context } from "hono";
import {
  ConfigurationError,
  HttpStatusError,
  MarcParseError,
  ProtocolError,
  ServiceNotConfiguredError,
  TransportError,
  TransportTimeoutError,
} from "../../core/errors.js";

/**
 * Hono `onError` handler.
 *
 * In production, messages of upstream failures are replaced by a generic
 * text so internal URLs and server responses are not exposed.
 *
 * Mapping:
 * - `ServiceNotConfiguredError` -> 404 Not Found
 * - `ConfigurationError`        -> 400 Bad Request
 * - `TransportTimeoutError`     -> 504 Gateway Timeout
 * - `ProtocolError`, `TransportError`, `MarcParseError` -> 502 Bad Gateway
 * - Everything else             -> 500 Internal Server Error
 */
export function errorHandler(err: Error, c: Context): Response {
  const isProduction = process.env["NODE_ENV"] === "production";

  if (err instanceof ServiceNotConfiguredError) {
    return c.json({ error: err.message, type: "service_not_configured" }, 404);
  }

  if (err instanceof ConfigurationError) {
    return c.json({ error: err.message, type: "configuration_error" }, 400);
  }

  if (err instanceof TransportTimeoutError) {
    return c.json(
      {
        error: isProduction ? "Upstream request timed out" : err.message,
        type: "upstream_timeout",
      },
      504,
    );
  }

  if (
    err instanceof ProtocolError ||
    err instanceof TransportError ||
    err instanceof MarcParseError
  ) {
    return c.json(
      {
        error: isProduction ? "Upstream service failed" : err.message,
        type: "upstream_error",
        ...(err instanceof HttpStatusError ? { upstreamStatus: err.status } : {}),
      },
      502,
    );
  }

  const message = isProduction ? "Internal server error" : err.message;
  return c.json({ error: message, type: "internal_error" }, 500);
}
