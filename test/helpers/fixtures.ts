// ---------------------------------------------------------------------------
// XML fixtures and configs shared by the tests.
// ---------------------------------------------------------------------------

import type {
  AlephOaiConfig,
  AlephXConfig,
  AlephZ3950Config,
} from "../../src/core/types.js";

export const LEADER = "00000nam a2200000 a 4500";

export const TEST_OAI_CONFIG: AlephOaiConfig = {
  host: "https://aleph.test.example.org",
  endpoint: "OAI",
  timeoutMs: 1_000,
  totalRetry: 0,
  retryBackoffMs: 0,
  retryStatusCodes: [500, 502, 503, 504],
  base: "MZK01",
  identifierTemplate: "oai:example.org:{base}-{doc_number}",
  systemNumberPattern: "\\d{9}",
  sets: ["MZK01-VDK"],
  metadataPrefix: "marc21",
};

export const TEST_X_CONFIG: AlephXConfig = {
  host: "https://aleph.test.example.org",
  endpoint: "X",
  timeoutMs: 1_000,
  totalRetry: 0,
  retryBackoffMs: 0,
  retryStatusCodes: [500, 502, 503, 504],
  base: "MZK01",
  pageSize: 10,
};

export const TEST_Z3950_CONFIG: AlephZ3950Config = {
  host: "z3950.test.example.org",
  port: 9991,
  base: "MZK01-UTF",
  preferredRecordSyntax: "MARC21",
};

export { createSilentLogger } from "../../src/logging/logger.js";

/** A well-formed MARCXML record with 001 and 245$a. */
export function marcXml(controlNumber: string, title = "Test Title"): string {
  return `<record xmlns="http://www.loc.gov/MARC21/slim">
  <leader>${LEADER}</leader>
  <controlfield tag="001">${controlNumber}</controlfield>
  <datafield tag="245" ind1="1" ind2="0">
    <subfield code="a">${title}</subfield>
  </datafield>
</record>`;
}

/** MARCXML without a leader; decoding it fails. */
export function malformedMarcXml(): string {
  return `<record xmlns="http://www.loc.gov/MARC21/slim">
  <controlfield tag="001">broken</controlfield>
</record>`;
}

export function identifier(systemNumber: string, base = "MZK01"): string {
  return `oai:example.org:${base}-${systemNumber}`;
}

export function activeRecord(systemNumber: string, body = marcXml(systemNumber)): string {
  return `<record>
    <header>
      <identifier>${identifier(systemNumber)}</identifier>
      <datestamp>2025-03-01T10:00:00Z</datestamp>
    </header>
    <metadata>${body}</metadata>
  </record>`;
}

export function deletedRecord(systemNumber: string): string {
  return `<record>
    <header status="deleted">
      <identifier>${identifier(systemNumber)}</identifier>
      <datestamp>2025-03-01T10:00:00Z</datestamp>
    </header>
  </record>`;
}

export function malformedRecord(systemNumber: string): string {
  return activeRecord(systemNumber, malformedMarcXml());
}

function envelope(body: string): string {
  return `<OAI-PMH xmlns="http://www.openarchives.org/OAI/2.0/">
  <responseDate>2025-03-08T00:00:00Z</responseDate>
  ${body}
</OAI-PMH>`;
}

/** A ListRecords page; `token` of `null` leaves the token out. */
export function listRecordsPage(records: string[], token: string | null = null): string {
  const tokenXml =
    token === null ? "" : `<resumptionToken cursor="0">${token}</resumptionToken>`;
  return envelope(`<ListRecords>
    ${records.join("\n")}
    ${tokenXml}
  </ListRecords>`);
}

export function getRecordResponse(record: string): string {
  return envelope(`<GetRecord>${record}</GetRecord>`);
}

export function oaiErrorResponse(code: string, message: string): string {
  return envelope(`<error code="${code}">${message}</error>`);
}

export function identifyResponse(): string {
  return envelope(`<Identify>
    <repositoryName>Test Aleph Repository</repositoryName>
    <baseURL>https://aleph.test.example.org/OAI</baseURL>
    <protocolVersion>2.0</protocolVersion>
    <earliestDatestamp>2001-01-01T00:00:00Z</earliestDatestamp>
    <granularity>YYYY-MM-DDThh:mm:ssZ</granularity>
  </Identify>`);
}

// ── X-Server ────────────────────────────────────────────────────────────────

export function xFindResponse(
  setNumber: string,
  totalCount: number,
  sessionId = "SESSION-1",
): string {
  const padded = String(totalCount).padStart(9, "0");
  return `<find>
  <set_number>${setNumber}</set_number>
  <no_records>${padded}</no_records>
  <no_entries>${padded}</no_entries>
  <session-id>${sessionId}</session-id>
</find>`;
}

export function xPresentResponse(docNumbers: string[], sessionId = "SESSION-1"): string {
  const records = docNumbers
    .map(
      (docNumber, i) => `<record>
    <record_header><set_entry>${String(i + 1).padStart(9, "0")}</set_entry></record_header>
    <doc_number>${docNumber}</doc_number>
  </record>`,
    )
    .join("\n");
  return `<present>
  ${records}
  <session-id>${sessionId}</session-id>
</present>`;
}
