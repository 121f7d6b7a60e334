// ---------------------------------------------------------------------------
// Public entry point of the Aleph client library.
// ---------------------------------------------------------------------------

export { AlephClient } from "./client.js";
export type { AlephClientOptions } from "./client.js";

export { AlephOaiClient, formatHarvestDate } from "./clients/oai/oai-client.js";
export { HarvestIdentifierPattern } from "./clients/oai/identifier-pattern.js";
export { classifyRecord } from "./clients/oai/record-classifier.js";
export { OaiVerb } from "./clients/oai/definitions.js";
export { AlephXClient, pageWindows } from "./clients/x/x-client.js";
export { XOperation } from "./clients/x/definitions.js";
export { AlephZ3950Client } from "./clients/z3950/z3950-client.js";
export type {
  Z3950Connection,
  Z3950ConnectionOptions,
  Z3950Connector,
  Z3950ResultSet,
} from "./clients/z3950/connector.js";

export {
  AlephConfigSchema,
  loadAlephConfig,
  parseAlephConfig,
} from "./config/aleph-config.js";

export { HttpTransport } from "./transport/http-transport.js";
export type {
  HttpResponse,
  QueryParams,
  RequestOptions,
  Transport,
} from "./transport/http-transport.js";

export {
  controlNumber,
  getControlField,
  getDataFields,
  getFirstSubfield,
  getSubfieldValues,
  isbns,
  parseMarcXml,
  title,
} from "./utils/marc-parser.js";

export { createLogger, createSilentLogger } from "./logging/logger.js";
export type { Logger } from "./logging/logger.js";

export * from "./core/errors.js";
export { AlephService, RecordStatus } from "./core/types.js";
export type {
  AlephConfig,
  AlephOaiConfig,
  AlephWebConfig,
  AlephXConfig,
  AlephZ3950Config,
  HarvestDate,
  ListRecordResult,
  MarcControlField,
  MarcDataField,
  MarcRecord,
  MarcSubfield,
  OaiRepositoryInfo,
  PageWindow,
  ServiceHealthStatus,
  SystemNumberRef,
  XSearchResult,
  XSession,
} from "./core/types.js";
