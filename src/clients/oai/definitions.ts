// ---------------------------------------------------------------------------
// OAI-PMH protocol constants.
// https://www.openarchives.org/OAI/openarchivesprotocol.html
// ---------------------------------------------------------------------------

export const OaiVerb = {
  GET_RECORD: "GetRecord",
  IDENTIFY: "Identify",
  LIST_IDENTIFIERS: "ListIdentifiers",
  LIST_METADATA_FORMATS: "ListMetadataFormats",
  LIST_RECORDS: "ListRecords",
  LIST_SETS: "ListSets",
} as const;
export type OaiVerb = (typeof OaiVerb)[keyof typeof OaiVerb];

/** Error code a repository returns for an empty harvest window. */
export const NO_RECORDS_MATCH = "noRecordsMatch";

export const DELETED_STATUS = "deleted";

export const OAI_ROOT = "OAI-PMH";
