// ---------------------------------------------------------------------------
// AlephOaiClient – OAI-PMH harvesting against an Aleph OAI endpoint.
//
// ListRecords is driven per set as a small state machine:
//   Requesting -> Processing -> Requesting (resumption token) -> ... -> Done
// Each record is yielded as soon as it is classified, so at most one page
// is held in memory and a consumer can stop mid-page.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type {
  AlephOaiConfig,
  HarvestDate,
  ListRecordResult,
  MarcRecord,
  OaiRepositoryInfo,
} from "../../core/types.js";
import { OaiProtocolError, OaiServerError } from "../../core/errors.js";
import type {
  HttpResponse,
  QueryParams,
  RequestOptions,
  Transport,
} from "../../transport/http-transport.js";
import { marcRecordFromNode } from "../../utils/marc-parser.js";
import {
  attributeOf,
  childOf,
  childrenOf,
  findFirst,
  textOf,
} from "../../utils/xml.js";
import type { XmlElement, XmlValue } from "../../utils/xml.js";
import { BaseWebClient } from "../base/base-web-client.js";
import { NO_RECORDS_MATCH, OAI_ROOT, OaiVerb } from "./definitions.js";
import { HarvestIdentifierPattern } from "./identifier-pattern.js";
import { classifyRecord } from "./record-classifier.js";

/**
 * Render a harvest bound the way OAI-PMH expects it.  Strings pass through
 * untouched; dates use second granularity in UTC.
 */
export function formatHarvestDate(date: HarvestDate): string {
  if (typeof date === "string") return date;
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

function rootOf(document: XmlElement): XmlValue {
  return childOf(document, OAI_ROOT) ?? document;
}

function optionalText(node: XmlValue | undefined): string | null {
  const text = textOf(node)?.trim();
  return text ? text : null;
}

export class AlephOaiClient extends BaseWebClient {
  /** Compiled once from the configured template, base and pattern. */
  public readonly identifierPattern: HarvestIdentifierPattern;

  private readonly config: AlephOaiConfig;

  constructor(config: AlephOaiConfig, logger: Logger, transport?: Transport) {
    super(config, "oai", logger, transport);
    this.config = config;
    this.identifierPattern = HarvestIdentifierPattern.compile(
      config.identifierTemplate,
      config.base,
      config.systemNumberPattern,
    );
  }

  // ── Identify ────────────────────────────────────────────────────────────

  async identify(options: RequestOptions = {}): Promise<OaiRepositoryInfo> {
    const response = await this.transport.get(
      { verb: OaiVerb.IDENTIFY },
      options,
    );
    const root = rootOf(this.parseResponse(response));
    this.raiseOnError(root);

    const identify = childOf(root, "Identify");
    if (identify === undefined) {
      throw new OaiProtocolError("Identify response has no Identify element");
    }

    return {
      repositoryName: optionalText(childOf(identify, "repositoryName")),
      baseUrl: optionalText(childOf(identify, "baseURL")),
      protocolVersion: optionalText(childOf(identify, "protocolVersion")),
      earliestDatestamp: optionalText(childOf(identify, "earliestDatestamp")),
      granularity: optionalText(childOf(identify, "granularity")),
    };
  }

  // ── GetRecord ───────────────────────────────────────────────────────────

  /**
   * Fetch one record by system number.  The base is fixed by configuration.
   *
   * @returns `null` when the repository answers without a MARC body
   *   (a deleted record).
   * @throws OaiServerError when the repository reports an error.
   * @throws MarcParseError when the body is not valid MARCXML.
   */
  async getRecord(
    docNumber: string,
    options: RequestOptions = {},
  ): Promise<MarcRecord | null> {
    const identifier = this.identifierPattern.format(docNumber);
    this.logger.debug({ identifier }, "Fetching record");

    const response = await this.transport.get(
      {
        verb: OaiVerb.GET_RECORD,
        metadataPrefix: this.config.metadataPrefix,
        identifier,
      },
      options,
    );
    const root = rootOf(this.parseResponse(response));
    this.raiseOnError(root);

    const fragment = childOf(childOf(root, "GetRecord"), "record");
    const body = findFirst(childOf(fragment, "metadata"), "record");
    if (body === undefined) return null;

    return marcRecordFromNode(body);
  }

  // ── ListRecords ─────────────────────────────────────────────────────────

  /**
   * Harvest every configured set, in declared order, within an optional
   * datestamp window.  Re-invoke with an adjusted window to resume after a
   * failure; no cursor survives between calls.
   */
  async *listRecords(
    from?: HarvestDate,
    until?: HarvestDate,
    options: RequestOptions = {},
  ): AsyncGenerator<ListRecordResult, void, undefined> {
    for (const set of this.config.sets) {
      yield* this.listSetRecords(set, from, until, options);
    }
  }

  /**
   * Harvest one set, following resumption tokens until the repository
   * stops issuing them or returns an empty page.
   */
  async *listSetRecords(
    set: string,
    from?: HarvestDate,
    until?: HarvestDate,
    options: RequestOptions = {},
  ): AsyncGenerator<ListRecordResult, void, undefined> {
    const log = this.logger.child({ set });

    let params: QueryParams = {
      verb: OaiVerb.LIST_RECORDS,
      metadataPrefix: this.config.metadataPrefix,
      set,
      from: from === undefined ? undefined : formatHarvestDate(from),
      until: until === undefined ? undefined : formatHarvestDate(until),
    };
    let page = 0;
    let harvested = 0;

    for (;;) {
      page++;
      const response = await this.transport.get(params, options);
      const root = rootOf(this.parseResponse(response));

      if (this.raiseOnError(root, { allowNoRecordsMatch: true })) {
        log.info({ page }, "No records match the harvest window");
        break;
      }

      const listRecords = childOf(root, "ListRecords");
      const fragments = childrenOf(listRecords, "record");
      const token = optionalText(childOf(listRecords, "resumptionToken"));

      log.debug(
        { page, records: fragments.length, hasResumptionToken: token !== null },
        "Fetched ListRecords page",
      );

      if (fragments.length === 0) {
        log.info({ page }, "No records found in this batch");
        break;
      }

      for (const fragment of fragments) {
        yield classifyRecord(fragment, this.identifierPattern, log);
        harvested++;
      }

      if (token === null) break;

      // The token is the whole continuation state.
      params = { verb: OaiVerb.LIST_RECORDS, resumptionToken: token };
    }

    log.info({ pages: page, records: harvested }, "Finished harvesting set");
  }

  // ── BaseWebClient hooks ─────────────────────────────────────────────────

  protected ping(): Promise<HttpResponse> {
    return this.transport.request({ verb: OaiVerb.IDENTIFY });
  }

  protected protocolError(
    message: string,
    options?: ErrorOptions,
  ): OaiProtocolError {
    return new OaiProtocolError(message, options);
  }

  // ── Private helpers ─────────────────────────────────────────────────────

  /**
   * Raise the repository's `<error>`, if any.
   *
   * @returns `true` when the error is `noRecordsMatch` and the caller
   *   allowed it.
   */
  private raiseOnError(
    root: XmlValue,
    { allowNoRecordsMatch = false }: { allowNoRecordsMatch?: boolean } = {},
  ): boolean {
    const error = childOf(root, "error");
    if (error === undefined) return false;

    const code = attributeOf(error, "code");
    if (allowNoRecordsMatch && code === NO_RECORDS_MATCH) return true;

    const message = optionalText(error) ?? "OAI-PMH request failed";
    this.logger.error({ code, message }, "Repository reported an error");
    throw new OaiServerError(message, code);
  }
}
