// ---------------------------------------------------------------------------
// BaseWebClient – abstract base class shared by the HTTP-based Aleph
// services (OAI-PMH and X-Server).
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type {
  AlephService,
  AlephWebConfig,
  ServiceHealthStatus,
} from "../../core/types.js";
import { ProtocolError, XmlParseError } from "../../core/errors.js";
import { HttpTransport } from "../../transport/http-transport.js";
import type { HttpResponse, Transport } from "../../transport/http-transport.js";
import { parseXml } from "../../utils/xml.js";
import type { XmlElement } from "../../utils/xml.js";

/**
 * Abstract base for the web services.  Concrete clients provide
 * {@link ping} and {@link protocolError}.
 *
 * The base class provides:
 *   - A transport built from the service config (or an injected one).
 *   - A child logger bound to the client, service and base.
 *   - Availability and health checks with latency measurement.
 *   - XML response parsing that turns malformed documents into the
 *     service's protocol error.
 */
export abstract class BaseWebClient {
  public readonly service: AlephService;

  protected readonly transport: Transport;
  protected readonly logger: Logger;

  constructor(
    config: AlephWebConfig & { base: string },
    service: AlephService,
    logger: Logger,
    transport?: Transport,
  ) {
    this.service = service;
    this.logger = logger.child({
      client: this.constructor.name,
      service,
      base: config.base,
    });
    this.transport = transport ?? new HttpTransport(config, service, this.logger);
  }

  // ── Public interface ────────────────────────────────────────────────────

  /** `true` when the service answers its liveness request with HTTP 200. */
  async isAvailable(): Promise<boolean> {
    try {
      const response = await this.ping();
      return response.status === 200;
    } catch (error: unknown) {
      this.logger.debug({ err: error }, "Availability check failed");
      return false;
    }
  }

  async healthCheck(): Promise<ServiceHealthStatus> {
    const start = performance.now();
    let healthy = false;
    let message: string;

    try {
      const response = await this.ping();
      healthy = response.status === 200;
      message = healthy
        ? `${this.service} responded`
        : `${this.service} returned HTTP ${response.status}`;
    } catch (error: unknown) {
      message =
        error instanceof Error ? error.message : "Unknown health-check error";
      this.logger.warn({ err: error }, "Health check failed");
    }

    return {
      service: this.service,
      healthy,
      latencyMs: Math.round(performance.now() - start),
      message,
      checkedAt: new Date().toISOString(),
    };
  }

  // ── Abstract methods for subclasses ─────────────────────────────────────

  /** Issue the service's lightweight liveness request. */
  protected abstract ping(): Promise<HttpResponse>;

  /** Build the protocol error type of this service. */
  protected abstract protocolError(
    message: string,
    options?: ErrorOptions,
  ): ProtocolError;

  // ── Protected helpers ───────────────────────────────────────────────────

  protected parseResponse(response: HttpResponse): XmlElement {
    try {
      return parseXml(response.body);
    } catch (err) {
      if (err instanceof XmlParseError) {
        throw this.protocolError(
          `Malformed ${this.service} response: ${err.message}`,
          { cause: err },
        );
      }
      throw err;
    }
  }
}
