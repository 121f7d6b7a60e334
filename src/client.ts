// ---------------------------------------------------------------------------
// AlephClient – one facade over the OAI-PMH, X-Server and Z39.50 clients.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type { AlephConfig, ServiceHealthStatus } from "./core/types.js";
import { ConfigurationError, ServiceNotConfiguredError } from "./core/errors.js";
import { createSilentLogger } from "./logging/logger.js";
import type { Transport } from "./transport/http-transport.js";
import { AlephOaiClient } from "./clients/oai/oai-client.js";
import { AlephXClient } from "./clients/x/x-client.js";
import { AlephZ3950Client } from "./clients/z3950/z3950-client.js";
import type { Z3950Connector } from "./clients/z3950/connector.js";

export interface AlephClientOptions {
  /** Defaults to a silent logger. */
  logger?: Logger;
  /** Required when the config has a `z3950` section. */
  z3950Connector?: Z3950Connector;
  /** Replace the HTTP transports, e.g. with in-process fakes. */
  transports?: {
    oai?: Transport;
    x?: Transport;
  };
}

export class AlephClient {
  public readonly config: AlephConfig;

  private readonly oaiClient: AlephOaiClient | null;
  private readonly xClient: AlephXClient | null;
  private readonly z3950Client: AlephZ3950Client | null;

  constructor(config: AlephConfig, options: AlephClientOptions = {}) {
    if (!config.oai && !config.x && !config.z3950) {
      throw new ConfigurationError(
        "At least one of the Aleph services must be configured",
      );
    }

    const logger = options.logger ?? createSilentLogger();
    this.config = config;

    this.oaiClient = config.oai
      ? new AlephOaiClient(config.oai, logger, options.transports?.oai)
      : null;
    this.xClient = config.x
      ? new AlephXClient(config.x, logger, options.transports?.x)
      : null;

    if (config.z3950) {
      if (!options.z3950Connector) {
        throw new ConfigurationError(
          "A Z39.50 connector is required when the z3950 service is configured",
        );
      }
      this.z3950Client = new AlephZ3950Client(
        config.z3950,
        options.z3950Connector,
        logger,
      );
    } else {
      this.z3950Client = null;
    }
  }

  get oai(): AlephOaiClient {
    if (!this.oaiClient) throw new ServiceNotConfiguredError("oai");
    return this.oaiClient;
  }

  get x(): AlephXClient {
    if (!this.xClient) throw new ServiceNotConfiguredError("x");
    return this.xClient;
  }

  get z3950(): AlephZ3950Client {
    if (!this.z3950Client) throw new ServiceNotConfiguredError("z3950");
    return this.z3950Client;
  }

  /** One status per configured service, checked one after another. */
  async healthCheck(): Promise<ServiceHealthStatus[]> {
    const statuses: ServiceHealthStatus[] = [];
    if (this.oaiClient) statuses.push(await this.oaiClient.healthCheck());
    if (this.xClient) statuses.push(await this.xClient.healthCheck());
    if (this.z3950Client) statuses.push(await this.z3950Client.healthCheck());
    return statuses;
  }

  /** Release the Z39.50 connection.  HTTP connections need no cleanup. */
  async close(): Promise<void> {
    await this.z3950Client?.close();
  }
}
