// ---------------------------------------------------------------------------
// AlephZ3950Client – PQF searches over Z39.50, records decoded as MARC21.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type {
  AlephZ3950Config,
  MarcRecord,
  ServiceHealthStatus,
} from "../../core/types.js";
import { AlephError, Z3950Error } from "../../core/errors.js";
import { parseMarcXml } from "../../utils/marc-parser.js";
import type { Z3950Connection, Z3950Connector } from "./connector.js";

export class AlephZ3950Client {
  public readonly service = "z3950" as const;

  private readonly config: AlephZ3950Config;
  private readonly connector: Z3950Connector;
  private readonly logger: Logger;
  private connection: Promise<Z3950Connection> | null = null;

  constructor(config: AlephZ3950Config, connector: Z3950Connector, logger: Logger) {
    this.config = config;
    this.connector = connector;
    this.logger = logger.child({
      client: "AlephZ3950Client",
      service: this.service,
      base: config.base,
    });
  }

  /**
   * Run a PQF query and decode every hit.
   *
   * @throws Z3950Error when the toolkit fails.
   * @throws MarcParseError when a hit is not valid MARCXML.
   */
  async search(pqf: string): Promise<MarcRecord[]> {
    const records: MarcRecord[] = [];
    for await (const record of this.searchIterator(pqf)) {
      records.push(record);
    }
    return records;
  }

  /** Lazy form of {@link search}: one hit is rendered per step. */
  async *searchIterator(pqf: string): AsyncGenerator<MarcRecord, void, undefined> {
    const connection = await this.connect();

    const resultSet = await this.wrap(
      () => connection.search(pqf),
      `Z39.50 search failed for "${pqf}"`,
    );
    this.logger.debug({ pqf, hits: resultSet.size }, "Z39.50 search completed");

    for (let index = 0; index < resultSet.size; index++) {
      const xml = await this.wrap(
        () => resultSet.record(index),
        `Z39.50 record ${index} could not be retrieved`,
      );
      yield parseMarcXml(xml);
    }
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.connect();
      return true;
    } catch (error: unknown) {
      this.logger.debug({ err: error }, "Availability check failed");
      return false;
    }
  }

  async healthCheck(): Promise<ServiceHealthStatus> {
    const start = performance.now();
    let healthy = true;
    let message = "z3950 connection open";

    try {
      await this.connect();
    } catch (error: unknown) {
      healthy = false;
      message = error instanceof Error ? error.message : "Unknown health-check error";
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

  /** Close the connection, if one was opened.  Safe to call repeatedly. */
  async close(): Promise<void> {
    const pending = this.connection;
    this.connection = null;
    if (pending === null) return;

    try {
      const connection = await pending;
      await connection.close();
      this.logger.debug("Z39.50 connection closed");
    } catch (error: unknown) {
      // A connection that never opened has nothing to release.
      this.logger.warn({ err: error }, "Closing Z39.50 connection failed");
    }
  }

  // ── Private helpers ─────────────────────────────────────────────────────

  private connect(): Promise<Z3950Connection> {
    if (this.connection === null) {
      const { host, port, base, preferredRecordSyntax } = this.config;
      this.logger.debug({ host, port }, "Opening Z39.50 connection");

      const pending = this.wrap(
        () =>
          this.connector.connect({
            host,
            port,
            databaseName: base,
            preferredRecordSyntax,
          }),
        `Could not connect to ${host}:${port}`,
      );
      // Let the next call retry after a failed connect.
      void pending.catch(() => {
        if (this.connection === pending) this.connection = null;
      });
      this.connection = pending;
    }
    return this.connection;
  }

  private async wrap<T>(fn: () => Promise<T>, message: string): Promise<T> {
    try {
      return await fn();
    } catch (error: unknown) {
      if (error instanceof AlephError) throw error;
      const detail = error instanceof Error ? error.message : String(error);
      throw new Z3950Error(`${message}: ${detail}`, { cause: error });
    }
  }
}
