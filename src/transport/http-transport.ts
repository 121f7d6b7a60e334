// ---------------------------------------------------------------------------
// HttpTransport – GET requests against one Aleph web endpoint with a
// per-attempt timeout and bounded retry on configured server errors.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type { AlephService, AlephWebConfig } from "../core/types.js";
import {
  HttpStatusError,
  TransportError,
  TransportTimeoutError,
} from "../core/errors.js";
import { withRetry } from "./retry.js";

/** Query parameters; `undefined` values are left out of the URL. */
export type QueryParams = Record<string, string | number | undefined>;

export interface HttpResponse {
  status: number;
  body: string;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

/**
 * The narrow transport contract the protocol clients depend on.
 */
export interface Transport {
  /** Issue a GET; resolves with any status outside the retried codes. */
  request(params: QueryParams, options?: RequestOptions): Promise<HttpResponse>;
  /** Issue a GET; rejects with {@link HttpStatusError} on a non-2xx status. */
  get(params: QueryParams, options?: RequestOptions): Promise<HttpResponse>;
}

/** Join a host and an endpoint path into the service URL. */
export function buildServiceUrl(host: string, endpoint: string): string {
  const trimmedHost = host.replace(/\/+$/, "");
  const trimmedEndpoint = endpoint.replace(/^\/+/, "");
  return trimmedEndpoint ? `${trimmedHost}/${trimmedEndpoint}` : trimmedHost;
}

export function buildQueryString(params: QueryParams): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) search.append(key, String(value));
  }
  return search.toString();
}

/**
 * `fetch`-based {@link Transport}.
 *
 * Connection pooling is left to the runtime's global dispatcher.  Retries
 * cover network failures, per-attempt timeouts and the status codes listed
 * in `config.retryStatusCodes`; the protocol clients never retry themselves.
 */
export class HttpTransport implements Transport {
  public readonly url: string;

  private readonly service: AlephService;
  private readonly config: AlephWebConfig;
  private readonly logger: Logger;

  constructor(config: AlephWebConfig, service: AlephService, logger: Logger) {
    this.config = config;
    this.service = service;
    this.url = buildServiceUrl(config.host, config.endpoint);
    this.logger = logger.child({ module: "transport" });
  }

  async get(
    params: QueryParams,
    options: RequestOptions = {},
  ): Promise<HttpResponse> {
    const response = await this.request(params, options);
    if (response.status < 200 || response.status >= 300) {
      throw new HttpStatusError(
        `${this.service} request failed with HTTP ${response.status}`,
        this.service,
        response.status,
      );
    }
    return response;
  }

  async request(
    params: QueryParams,
    options: RequestOptions = {},
  ): Promise<HttpResponse> {
    const query = buildQueryString(params);
    const url = query ? `${this.url}?${query}` : this.url;
    const { signal } = options;

    return withRetry(() => this.attempt(url, signal), {
      maxRetries: this.config.totalRetry,
      baseDelayMs: this.config.retryBackoffMs,
      signal,
      shouldRetry: (error) => this.isRetryable(error),
      onRetry: (error, attempt, delayMs) => {
        this.logger.warn(
          { attempt, delayMs, err: error },
          "Retrying request",
        );
      },
    });
  }

  // ── Private helpers ─────────────────────────────────────────────────────

  private async attempt(
    url: string,
    callerSignal: AbortSignal | undefined,
  ): Promise<HttpResponse> {
    const timeout = AbortSignal.timeout(this.config.timeoutMs);
    const signal = callerSignal
      ? AbortSignal.any([callerSignal, timeout])
      : timeout;

    this.logger.debug({ url }, "GET");

    try {
      const response = await fetch(url, {
        signal,
        headers: {
          Accept: "application/xml, text/xml",
          "User-Agent": "aleph-client/0.1",
        },
      });
      const body = await response.text();

      if (this.config.retryStatusCodes.includes(response.status)) {
        throw new HttpStatusError(
          `${this.service} request failed with HTTP ${response.status}`,
          this.service,
          response.status,
        );
      }

      return { status: response.status, body };
    } catch (error: unknown) {
      throw this.wrapError(error, callerSignal);
    }
  }

  private isRetryable(error: unknown): boolean {
    if (error instanceof HttpStatusError) {
      return this.config.retryStatusCodes.includes(error.status);
    }
    return error instanceof TransportError;
  }

  private wrapError(error: unknown, callerSignal: AbortSignal | undefined): unknown {
    // A caller abort is surfaced untouched so it is never retried.
    if (callerSignal?.aborted) return callerSignal.reason;
    if (error instanceof TransportError) return error;

    // fetch rejects with a DOMException named after the signal that fired.
    if (
      error instanceof Error &&
      (error.name === "TimeoutError" || error.name === "AbortError")
    ) {
      return new TransportTimeoutError(
        `${this.service} request timed out after ${this.config.timeoutMs}ms`,
        this.service,
        this.config.timeoutMs,
        { cause: error },
      );
    }

    if (error instanceof TypeError) {
      return new TransportError(
        `Network error calling ${this.service}: ${error.message}`,
        this.service,
        { cause: error },
      );
    }

    return error;
  }
}
