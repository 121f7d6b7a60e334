// ---------------------------------------------------------------------------
// Error hierarchy for the Aleph client.
// ---------------------------------------------------------------------------

import type { AlephService } from "./types.js";

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all Aleph client errors.
 */
export class AlephError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "AlephError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Service errors ──────────────────────────────────────────────────────────

/**
 * Base class for errors raised while talking to one of the Aleph services.
 */
export class ServiceError extends AlephError {
  public readonly service: AlephService;

  constructor(message: string, service: AlephService, options?: ErrorOptions) {
    super(message, options);
    this.name = "ServiceError";
    this.service = service;
  }
}

// ── Transport errors (transient, after retries) ─────────────────────────────

/** The request could not reach the server. */
export class TransportError extends ServiceError {
  constructor(message: string, service: AlephService, options?: ErrorOptions) {
    super(message, service, options);
    this.name = "TransportError";
  }
}

/** Every attempt exceeded the per-request timeout. */
export class TransportTimeoutError extends TransportError {
  public readonly timeoutMs: number;

  constructor(
    message: string,
    service: AlephService,
    timeoutMs: number,
    options?: ErrorOptions,
  ) {
    super(message, service, options);
    this.name = "TransportTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** The server answered with a non-success HTTP status. */
export class HttpStatusError extends TransportError {
  public readonly status: number;

  constructor(
    message: string,
    service: AlephService,
    status: number,
    options?: ErrorOptions,
  ) {
    super(message, service, options);
    this.name = "HttpStatusError";
    this.status = status;
  }
}

// ── Protocol violations (fatal for the invocation) ──────────────────────────

/** The response did not follow the protocol contract. */
export class ProtocolError extends ServiceError {
  constructor(message: string, service: AlephService, options?: ErrorOptions) {
    super(message, service, options);
    this.name = "ProtocolError";
  }
}

/** An OAI-PMH response was structurally broken. */
export class OaiProtocolError extends ProtocolError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "oai", options);
    this.name = "OaiProtocolError";
  }
}

/** The OAI-PMH repository answered with an `<error>` element. */
export class OaiServerError extends ProtocolError {
  public readonly code: string | null;

  constructor(message: string, code: string | null, options?: ErrorOptions) {
    super(code ? `${code}: ${message}` : message, "oai", options);
    this.name = "OaiServerError";
    this.code = code;
  }
}

/**
 * A harvested identifier did not match the configured identifier template.
 * Points at a wrong template or base, never at a single bad record.
 */
export class IdentifierMismatchError extends ProtocolError {
  public readonly identifier: string;
  public readonly pattern: string;

  constructor(identifier: string, pattern: string, options?: ErrorOptions) {
    super(
      `Identifier "${identifier}" does not match pattern ${pattern}`,
      "oai",
      options,
    );
    this.name = "IdentifierMismatchError";
    this.identifier = identifier;
    this.pattern = pattern;
  }
}

/** The X-Server refused or broke the find/present exchange. */
export class XServerError extends ProtocolError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "x", options);
    this.name = "XServerError";
  }
}

/** The Z39.50 toolkit failed to connect, search or render a record. */
export class Z3950Error extends ServiceError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "z3950", options);
    this.name = "Z3950Error";
  }
}

// ── Record format errors ────────────────────────────────────────────────────

/** A document could not be parsed as XML. */
export class XmlParseError extends AlephError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "XmlParseError";
  }
}

/** A MARCXML body could not be decoded into a {@link MarcRecord}. */
export class MarcParseError extends AlephError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MarcParseError";
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends AlephError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/** The facade was asked for a service that has no configuration. */
export class ServiceNotConfiguredError extends AlephError {
  public readonly service: AlephService;

  constructor(service: AlephService, options?: ErrorOptions) {
    super(`${service} service is not configured`, options);
    this.name = "ServiceNotConfiguredError";
    this.service = service;
  }
}
