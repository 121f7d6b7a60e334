// ---------------------------------------------------------------------------
// Core types for the Aleph client.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Enums ───────────────────────────────────────────────────────────────────

export const AlephService = {
  OAI: "oai",
  X: "x",
  Z3950: "z3950",
} as const;
export type AlephService = (typeof AlephService)[keyof typeof AlephService];

/**
 * Lifecycle status of a harvested record.  Exactly one per record.
 */
export const RecordStatus = {
  /** Record present and parsed. */
  ACTIVE: "Active",
  /** The server marked the record deleted; there is no body. */
  DELETED: "Deleted",
  /** Record present but its body could not be parsed as MARC. */
  FAILED: "Failed",
} as const;
export type RecordStatus = (typeof RecordStatus)[keyof typeof RecordStatus];

// ── MARC ────────────────────────────────────────────────────────────────────

export interface MarcControlField {
  tag: string;
  value: string;
}

export interface MarcSubfield {
  code: string;
  value: string;
}

export interface MarcDataField {
  tag: string;
  ind1: string;
  ind2: string;
  subfields: MarcSubfield[];
}

/** A bibliographic record decoded from MARCXML. */
export interface MarcRecord {
  leader: string;
  controlFields: MarcControlField[];
  dataFields: MarcDataField[];
}

// ── Harvest results ─────────────────────────────────────────────────────────

/** `base` and `systemNumber` recovered from a harvest identifier. */
export interface SystemNumberRef {
  base: string;
  systemNumber: string;
}

export type ListRecordResult =
  | (SystemNumberRef & { status: typeof RecordStatus.ACTIVE; record: MarcRecord })
  | (SystemNumberRef & { status: typeof RecordStatus.DELETED; record: null })
  | (SystemNumberRef & { status: typeof RecordStatus.FAILED; record: null });

/** Answer to the OAI-PMH `Identify` verb. */
export interface OaiRepositoryInfo {
  repositoryName: string | null;
  baseUrl: string | null;
  protocolVersion: string | null;
  earliestDatestamp: string | null;
  granularity: string | null;
}

/** Timestamp accepted by the harvest window. */
export type HarvestDate = string | Date;

// ── X-Server ────────────────────────────────────────────────────────────────

/**
 * Sticky state of one logical X-Server session.  Created per search and
 * passed by reference through the `find` and `present` calls so that
 * concurrent searches on one client never share a session id.
 */
export interface XSession {
  sessionId: string | null;
}

/** Result-set handle returned by the X-Server `find` operation. */
export interface XSearchResult {
  setNumber: string;
  totalCount: number;
}

/** Inclusive 1-based window of a result set. */
export interface PageWindow {
  start: number;
  end: number;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface ServiceHealthStatus {
  service: AlephService;
  healthy: boolean;
  latencyMs: number;
  message: string;
  checkedAt: string;
}

// ── Config types ────────────────────────────────────────────────────────────

export interface AlephWebConfig {
  host: string;
  endpoint: string;
  /** Per-attempt timeout in ms. */
  timeoutMs: number;
  /** Retries after the first attempt. */
  totalRetry: number;
  retryBackoffMs: number;
  /** HTTP status codes that are retried. */
  retryStatusCodes: number[];
}

export interface AlephOaiConfig extends AlephWebConfig {
  base: string;
  /** Harvest identifier template with `{base}` and `{doc_number}` placeholders. */
  identifierTemplate: string;
  /** Regular expression source matching a system number. */
  systemNumberPattern: string;
  /** OAI sets harvested by `listRecords`, in order. */
  sets: string[];
  metadataPrefix: string;
}

export interface AlephXConfig extends AlephWebConfig {
  base: string;
  pageSize: number;
}

export interface AlephZ3950Config {
  host: string;
  port: number;
  base: string;
  preferredRecordSyntax: string;
}

export interface AlephConfig {
  base: string;
  oai?: AlephOaiConfig;
  x?: AlephXConfig;
  z3950?: AlephZ3950Config;
}

export interface AppConfig {
  env: "development" | "staging" | "production";
  port: number;
  logLevel: string;
  /** Path of the YAML file holding the {@link AlephConfig}. */
  alephConfigPath: string;
}

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
  redactSecrets: boolean;
}
