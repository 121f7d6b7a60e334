// ---------------------------------------------------------------------------
// AlephXClient – two-phase search against the Aleph X-Server.
//
// `find` opens a result set and reports its size; `present` then fetches
// 1-based windows of that set.  The X-Server keeps state per session id,
// so every logical search carries its own XSession through both phases.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type {
  AlephXConfig,
  PageWindow,
  XSearchResult,
  XSession,
} from "../../core/types.js";
import { ConfigurationError, XServerError } from "../../core/errors.js";
import type {
  HttpResponse,
  QueryParams,
  RequestOptions,
  Transport,
} from "../../transport/http-transport.js";
import { findAll, findText, textOf } from "../../utils/xml.js";
import type { XmlElement } from "../../utils/xml.js";
import { BaseWebClient } from "../base/base-web-client.js";
import { SESSION_PARAM, XOperation } from "./definitions.js";

/**
 * Split `[1, totalCount]` into consecutive windows of `pageSize`; the last
 * window is clipped to `totalCount`.
 *
 * @example pageWindows(25, 10) // [{1,10}, {11,20}, {21,25}]
 */
export function pageWindows(totalCount: number, pageSize: number): PageWindow[] {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new ConfigurationError(`Page size must be a positive integer, got ${pageSize}`);
  }

  const windows: PageWindow[] = [];
  for (let offset = 0; offset < totalCount; offset += pageSize) {
    windows.push({
      start: offset + 1,
      end: Math.min(offset + pageSize, totalCount),
    });
  }
  return windows;
}

function trimmedText(document: XmlElement, name: string): string | null {
  const text = findText(document, name)?.trim();
  return text ? text : null;
}

export class AlephXClient extends BaseWebClient {
  private readonly config: AlephXConfig;

  constructor(config: AlephXConfig, logger: Logger, transport?: Transport) {
    super(config, "x", logger, transport);
    this.config = config;
  }

  /** A fresh session; pass it to {@link search} and {@link fetchResults}. */
  openSession(): XSession {
    return { sessionId: null };
  }

  // ── Search operations ───────────────────────────────────────────────────

  /**
   * Every system number matching `field=value`, fetched `pageSize` at a
   * time.
   */
  async *findSystemNumbers(
    field: string,
    value: string,
    options: RequestOptions = {},
  ): AsyncGenerator<string, void, undefined> {
    const session = this.openSession();
    const { setNumber, totalCount } = await this.search(
      field,
      value,
      session,
      options,
    );

    for (const window of pageWindows(totalCount, this.config.pageSize)) {
      yield* this.fetchResults(setNumber, window.start, window.end, session, options);
    }
  }

  /**
   * The system number of the only record matching `field=value`.
   *
   * `null` both for no match and for several matches; use
   * {@link findSystemNumbers} to tell them apart.
   */
  async getOneOrNoneSystemNumber(
    field: string,
    value: string,
    options: RequestOptions = {},
  ): Promise<string | null> {
    const session = this.openSession();
    const { setNumber, totalCount } = await this.search(
      field,
      value,
      session,
      options,
    );

    if (totalCount !== 1) return null;

    for await (const systemNumber of this.fetchResults(setNumber, 1, 1, session, options)) {
      return systemNumber;
    }
    return null;
  }

  // ── Protocol phases ─────────────────────────────────────────────────────

  /**
   * `find`: open a result set.  Stores the returned session id on `session`.
   *
   * @throws XServerError when the response carries no session id.
   */
  async search(
    field: string,
    value: string,
    session: XSession,
    options: RequestOptions = {},
  ): Promise<XSearchResult> {
    const response = await this.transport.get(
      this.withSession(
        {
          op: XOperation.FIND,
          base: this.config.base,
          code: field,
          request: value,
        },
        session,
      ),
      options,
    );
    const document = this.parseResponse(response);

    const sessionId = trimmedText(document, "session-id");
    if (sessionId === null) {
      const message =
        trimmedText(document, "error") ??
        trimmedText(document, "h1") ??
        "Unexpected response";
      throw new XServerError(message);
    }
    session.sessionId = sessionId;

    const totalCount = Number.parseInt(trimmedText(document, "no_records") ?? "0", 10) || 0;
    const setNumber = trimmedText(document, "set_number") ?? "";

    if (totalCount > 0 && setNumber === "") {
      throw new XServerError("find response reports records but no set number");
    }

    this.logger.debug({ field, setNumber, totalCount }, "X-Server find completed");
    return { setNumber, totalCount };
  }

  /**
   * `present`: fetch the system numbers in entries `start..end` (1-based,
   * inclusive) of a result set, in response order.
   */
  async *fetchResults(
    setNumber: string,
    start: number,
    end: number,
    session: XSession,
    options: RequestOptions = {},
  ): AsyncGenerator<string, void, undefined> {
    const response = await this.transport.get(
      this.withSession(
        {
          op: XOperation.PRESENT,
          set_number: setNumber,
          set_entry: `${start}-${end}`,
        },
        session,
      ),
      options,
    );
    const document = this.parseResponse(response);

    // The server may rotate the session id on any response.
    const sessionId = trimmedText(document, "session-id");
    if (sessionId !== null) session.sessionId = sessionId;

    const docNumbers = findAll(document, "doc_number")
      .map((node) => textOf(node)?.trim() ?? "")
      .filter((docNumber) => docNumber !== "");

    const error = trimmedText(document, "error");
    if (docNumbers.length === 0 && error !== null) {
      throw new XServerError(error);
    }

    this.logger.debug(
      { setNumber, start, end, received: docNumbers.length },
      "X-Server present completed",
    );

    for (const docNumber of docNumbers) {
      yield docNumber;
    }
  }

  // ── BaseWebClient hooks ─────────────────────────────────────────────────

  protected ping(): Promise<HttpResponse> {
    return this.transport.request({ op: XOperation.PING });
  }

  protected protocolError(message: string, options?: ErrorOptions): XServerError {
    return new XServerError(message, options);
  }

  // ── Private helpers ─────────────────────────────────────────────────────

  private withSession(params: QueryParams, session: XSession): QueryParams {
    return session.sessionId === null
      ? params
      : { ...params, [SESSION_PARAM]: session.sessionId };
  }
}
