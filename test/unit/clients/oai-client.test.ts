// ---------------------------------------------------------------------------
// Tests for AlephOaiClient, driven through an in-process transport.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import {
  AlephOaiClient,
  formatHarvestDate,
} from "../../../src/clients/oai/oai-client.js";
import {
  HttpStatusError,
  IdentifierMismatchError,
  OaiProtocolError,
  OaiServerError,
} from "../../../src/core/errors.js";
import type { AlephOaiConfig, ListRecordResult } from "../../../src/core/types.js";
import { FakeTransport } from "../../helpers/fake-transport.js";
import {
  TEST_OAI_CONFIG,
  activeRecord,
  createSilentLogger,
  deletedRecord,
  getRecordResponse,
  identifyResponse,
  listRecordsPage,
  malformedRecord,
  oaiErrorResponse,
} from "../../helpers/fixtures.js";

function createClient(
  transport: FakeTransport,
  overrides: Partial<AlephOaiConfig> = {},
): AlephOaiClient {
  return new AlephOaiClient(
    { ...TEST_OAI_CONFIG, ...overrides },
    createSilentLogger(),
    transport,
  );
}

async function collect(
  results: AsyncGenerator<ListRecordResult, void, undefined>,
): Promise<ListRecordResult[]> {
  const collected: ListRecordResult[] = [];
  for await (const result of results) collected.push(result);
  return collected;
}

describe("AlephOaiClient.listRecords", () => {
  it("harvests two pages in fragment order with one request per page", async () => {
    const transport = new FakeTransport().reply(
      listRecordsPage(
        [
          activeRecord("000000001"),
          deletedRecord("000000002"),
          malformedRecord("000000003"),
        ],
        "token-page-2",
      ),
      listRecordsPage([activeRecord("000000004")]),
    );
    const client = createClient(transport);

    const results = await collect(
      client.listRecords("2025-03-01T00:00:00Z", "2025-03-02T00:00:00Z"),
    );

    expect(results.map((r) => r.status)).toEqual([
      "Active",
      "Deleted",
      "Failed",
      "Active",
    ]);
    expect(results.map((r) => r.systemNumber)).toEqual([
      "000000001",
      "000000002",
      "000000003",
      "000000004",
    ]);
    expect(results.every((r) => r.base === "MZK01")).toBe(true);
    expect(results[0]?.record).not.toBeNull();
    expect(results[1]?.record).toBeNull();
    expect(results[2]?.record).toBeNull();
    expect(transport.calls).toHaveLength(2);
  });

  it("scopes the first request to the set and window and follows up with the token only", async () => {
    const transport = new FakeTransport().reply(
      listRecordsPage([activeRecord("000000001")], "abc/123"),
      listRecordsPage([activeRecord("000000002")]),
    );
    const client = createClient(transport);

    await collect(client.listRecords("2025-03-01T00:00:00Z", "2025-03-02T00:00:00Z"));

    expect(transport.calls[0]).toEqual({
      verb: "ListRecords",
      metadataPrefix: "marc21",
      set: "MZK01-VDK",
      from: "2025-03-01T00:00:00Z",
      until: "2025-03-02T00:00:00Z",
    });
    expect(transport.calls[1]).toEqual({
      verb: "ListRecords",
      resumptionToken: "abc/123",
    });
  });

  it("leaves out window bounds that are not given", async () => {
    const transport = new FakeTransport().reply(listRecordsPage([]));
    const client = createClient(transport);

    await collect(client.listRecords());

    expect(transport.calls[0]).toEqual({
      verb: "ListRecords",
      metadataPrefix: "marc21",
      set: "MZK01-VDK",
      from: undefined,
      until: undefined,
    });
  });

  it("stops on an empty resumption token", async () => {
    const transport = new FakeTransport().reply(
      listRecordsPage([activeRecord("000000001")], ""),
    );
    const client = createClient(transport);

    const results = await collect(client.listRecords());

    expect(results).toHaveLength(1);
    expect(transport.calls).toHaveLength(1);
  });

  it("stops on a page without records even when a token is present", async () => {
    const transport = new FakeTransport().reply(listRecordsPage([], "dangling"));
    const client = createClient(transport);

    expect(await collect(client.listRecords())).toEqual([]);
    expect(transport.calls).toHaveLength(1);
  });

  it("treats noRecordsMatch as an empty set", async () => {
    const transport = new FakeTransport().reply(
      oaiErrorResponse("noRecordsMatch", "No records match"),
    );
    const client = createClient(transport);

    expect(await collect(client.listRecords())).toEqual([]);
  });

  it("raises any other repository error", async () => {
    const transport = new FakeTransport().reply(
      oaiErrorResponse("badResumptionToken", "Token expired"),
    );
    const client = createClient(transport);

    const error = await collect(client.listRecords()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(OaiServerError);
    expect(error).toMatchObject({ code: "badResumptionToken" });
  });

  it("harvests sets in declared order", async () => {
    const transport = new FakeTransport().reply(
      listRecordsPage([activeRecord("000000011"), activeRecord("000000012")]),
      listRecordsPage([activeRecord("000000021")]),
    );
    const client = createClient(transport, { sets: ["SET-1", "SET-2"] });

    const results = await collect(client.listRecords());

    expect(results.map((r) => r.systemNumber)).toEqual([
      "000000011",
      "000000012",
      "000000021",
    ]);
    expect(transport.calls.map((c) => c["set"])).toEqual(["SET-1", "SET-2"]);
  });

  it("yields earlier records before failing on a record without header", async () => {
    const transport = new FakeTransport().reply(
      listRecordsPage([
        activeRecord("000000001"),
        "<record><metadata/></record>",
        activeRecord("000000003"),
      ]),
    );
    const client = createClient(transport);

    const seen: string[] = [];
    const error = await (async () => {
      for await (const result of client.listRecords()) seen.push(result.systemNumber);
    })().catch((e: unknown) => e);

    expect(seen).toEqual(["000000001"]);
    expect(error).toBeInstanceOf(OaiProtocolError);
  });

  it("fails the harvest on an identifier outside the template", async () => {
    const foreign = `<record><header>
      <identifier>oai:other.org:MZK01-000000001</identifier>
    </header></record>`;
    const transport = new FakeTransport().reply(listRecordsPage([foreign]));
    const client = createClient(transport);

    await expect(collect(client.listRecords())).rejects.toBeInstanceOf(
      IdentifierMismatchError,
    );
  });

  it("does not request the next page when the consumer stops early", async () => {
    const transport = new FakeTransport().reply(
      listRecordsPage(
        [activeRecord("000000001"), activeRecord("000000002")],
        "next",
      ),
    );
    const client = createClient(transport);

    const seen: string[] = [];
    for await (const result of client.listRecords()) {
      seen.push(result.systemNumber);
      break;
    }

    expect(seen).toEqual(["000000001"]);
    expect(transport.calls).toHaveLength(1);
  });

  it("propagates transport failures", async () => {
    const transport = new FakeTransport().replyStatus(503, "busy");
    const client = createClient(transport);

    await expect(collect(client.listRecords())).rejects.toBeInstanceOf(
      HttpStatusError,
    );
  });

  it("turns a malformed page into a protocol error", async () => {
    const transport = new FakeTransport().reply("<OAI-PMH><ListRecords>");
    const client = createClient(transport);

    await expect(collect(client.listRecords())).rejects.toBeInstanceOf(
      OaiProtocolError,
    );
  });
});

describe("AlephOaiClient.listSetRecords", () => {
  it("harvests only the given set", async () => {
    const transport = new FakeTransport().reply(
      listRecordsPage([activeRecord("000000001")]),
    );
    const client = createClient(transport, { sets: ["SET-1", "SET-2"] });

    const results = await collect(client.listSetRecords("OTHER"));

    expect(results).toHaveLength(1);
    expect(transport.calls).toHaveLength(1);
    expect(transport.calls[0]?.["set"]).toBe("OTHER");
  });

  it("renders Date bounds with second granularity", async () => {
    const transport = new FakeTransport().reply(listRecordsPage([]));
    const client = createClient(transport);

    await collect(
      client.listSetRecords(
        "MZK01-VDK",
        new Date(Date.UTC(2025, 2, 1, 16, 15, 40, 123)),
        new Date(Date.UTC(2025, 2, 7, 18, 15, 40)),
      ),
    );

    expect(transport.calls[0]?.["from"]).toBe("2025-03-01T16:15:40Z");
    expect(transport.calls[0]?.["until"]).toBe("2025-03-07T18:15:40Z");
  });
});

describe("formatHarvestDate", () => {
  it("passes strings through", () => {
    expect(formatHarvestDate("2025-03-01")).toBe("2025-03-01");
  });
});

describe("AlephOaiClient.getRecord", () => {
  it("requests the templated identifier and decodes the record", async () => {
    const transport = new FakeTransport().reply(
      getRecordResponse(activeRecord("000960080")),
    );
    const client = createClient(transport);

    const record = await client.getRecord("000960080");

    expect(transport.calls[0]).toEqual({
      verb: "GetRecord",
      metadataPrefix: "marc21",
      identifier: "oai:example.org:MZK01-000960080",
    });
    expect(record?.controlFields[0]).toEqual({ tag: "001", value: "000960080" });
  });

  it("returns null for a record without a body", async () => {
    const transport = new FakeTransport().reply(
      getRecordResponse(deletedRecord("000960080")),
    );
    const client = createClient(transport);

    expect(await client.getRecord("000960080")).toBeNull();
  });

  it("raises the repository's error", async () => {
    const transport = new FakeTransport().reply(
      oaiErrorResponse("idDoesNotExist", "No matching identifier"),
    );
    const client = createClient(transport);

    await expect(client.getRecord("invalid_number")).rejects.toThrow(
      "idDoesNotExist: No matching identifier",
    );
  });
});

describe("AlephOaiClient.identify", () => {
  it("reads the repository description", async () => {
    const transport = new FakeTransport().reply(identifyResponse());
    const client = createClient(transport);

    expect(await client.identify()).toEqual({
      repositoryName: "Test Aleph Repository",
      baseUrl: "https://aleph.test.example.org/OAI",
      protocolVersion: "2.0",
      earliestDatestamp: "2001-01-01T00:00:00Z",
      granularity: "YYYY-MM-DDThh:mm:ssZ",
    });
    expect(transport.calls).toEqual([{ verb: "Identify" }]);
  });
});

describe("AlephOaiClient.isAvailable", () => {
  it("is true for HTTP 200", async () => {
    const client = createClient(new FakeTransport().reply(identifyResponse()));
    expect(await client.isAvailable()).toBe(true);
  });

  it("is false for other statuses", async () => {
    const client = createClient(new FakeTransport().replyStatus(404));
    expect(await client.isAvailable()).toBe(false);
  });

  it("is false when the request fails", async () => {
    const client = createClient(new FakeTransport().fail(new Error("down")));
    expect(await client.isAvailable()).toBe(false);
  });
});
