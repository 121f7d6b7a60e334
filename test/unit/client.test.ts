import { describe, it, expect } from "vitest";

import { AlephClient } from "../../src/client.js";
import type { Z3950Connector } from "../../src/clients/z3950/connector.js";
import {
  ConfigurationError,
  ServiceNotConfiguredError,
} from "../../src/core/errors.js";
import { FakeTransport } from "../helpers/fake-transport.js";
import {
  TEST_OAI_CONFIG,
  TEST_X_CONFIG,
  TEST_Z3950_CONFIG,
  createSilentLogger,
  identifyResponse,
  xFindResponse,
  xPresentResponse,
} from "../helpers/fixtures.js";

const connector: Z3950Connector = {
  connect: async () => ({
    search: async () => ({ size: 0, record: async () => "" }),
    close: async () => undefined,
  }),
};

describe("AlephClient", () => {
  it("requires at least one service", () => {
    expect(() => new AlephClient({ base: "MZK01" })).toThrow(ConfigurationError);
  });

  it("requires a connector for Z39.50", () => {
    expect(
      () => new AlephClient({ base: "MZK01", z3950: TEST_Z3950_CONFIG }),
    ).toThrow("A Z39.50 connector is required when the z3950 service is configured");
  });

  it("raises ServiceNotConfiguredError for a missing service", () => {
    const client = new AlephClient({ base: "MZK01", oai: TEST_OAI_CONFIG });

    expect(client.oai.service).toBe("oai");
    expect(() => client.x).toThrow(ServiceNotConfiguredError);
    expect(() => client.z3950).toThrow("z3950 service is not configured");
  });

  it("routes calls through the injected transports", async () => {
    const x = new FakeTransport("x").reply(
      xFindResponse("000001", 1),
      xPresentResponse(["000960080"]),
    );
    const client = new AlephClient(
      { base: "MZK01", x: TEST_X_CONFIG },
      { logger: createSilentLogger(), transports: { x } },
    );

    expect(await client.x.getOneOrNoneSystemNumber("BAR", "2610002885")).toBe(
      "000960080",
    );
    expect(x.calls).toHaveLength(2);
  });

  it("checks every configured service in order", async () => {
    const client = new AlephClient(
      {
        base: "MZK01",
        oai: TEST_OAI_CONFIG,
        x: TEST_X_CONFIG,
        z3950: TEST_Z3950_CONFIG,
      },
      {
        logger: createSilentLogger(),
        z3950Connector: connector,
        transports: {
          oai: new FakeTransport("oai").reply(identifyResponse()),
          x: new FakeTransport("x").replyStatus(500, "down"),
        },
      },
    );

    const statuses = await client.healthCheck();

    expect(statuses.map((s) => [s.service, s.healthy])).toEqual([
      ["oai", true],
      ["x", false],
      ["z3950", true],
    ]);
    expect(statuses[1]?.message).toBe("x returned HTTP 500");

    await client.close();
  });
});
