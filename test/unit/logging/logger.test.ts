// ---------------------------------------------------------------------------
// Tests for the logger factory and the request logging middleware.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import { describe, it, expect } from "vitest";

import type { GatewayEnv } from "../../../src/api/env.js";
import { requestIdMiddleware } from "../../../src/api/middleware/request-id.js";
import { createRequestLogger } from "../../../src/logging/context.js";
import { createLogger } from "../../../src/logging/logger.js";

function collectingLogger(level = "info", redactSecrets = true) {
  const lines: string[] = [];
  const logger = createLogger(
    { level, prettyPrint: false, redactSecrets },
    {
      write(msg: string) {
        lines.push(msg);
      },
    },
  );
  const entries = (): unknown[] => lines.map((line): unknown => JSON.parse(line));
  return { logger, entries };
}

describe("createLogger", () => {
  it("writes level labels, service fields and an ISO timestamp", () => {
    const { logger, entries } = collectingLogger();

    logger.info({ op: "find" }, "x-server request");

    expect(entries()).toEqual([
      expect.objectContaining({
        level: "info",
        service: "aleph-client",
        op: "find",
        msg: "x-server request",
        time: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/),
      }),
    ]);
  });

  it("redacts X-Server session ids", () => {
    const { logger, entries } = collectingLogger();

    logger.info({ params: { session_id: "SESSION-1", op: "present" } }, "request");

    expect(entries()).toEqual([
      expect.objectContaining({
        params: { session_id: "[REDACTED]", op: "present" },
      }),
    ]);
  });

  it("keeps session ids when redaction is off", () => {
    const { logger, entries } = collectingLogger("info", false);

    logger.info({ params: { session_id: "SESSION-1" } }, "request");

    expect(entries()).toEqual([
      expect.objectContaining({ params: { session_id: "SESSION-1" } }),
    ]);
  });

  it("drops entries below the configured level", () => {
    const { logger, entries } = collectingLogger("warn");

    logger.info("ignored");
    logger.warn("kept");

    expect(entries()).toEqual([expect.objectContaining({ level: "warn", msg: "kept" })]);
  });
});

describe("createRequestLogger", () => {
  function gateway() {
    const { logger, entries } = collectingLogger();
    const app = new Hono<GatewayEnv>();
    app.use("*", requestIdMiddleware());
    app.use("*", createRequestLogger(logger));
    app.get("/ok", (c) => {
      c.get("logger").info("handling");
      return c.json({ ok: true });
    });
    app.get("/missing", (c) => c.json({ error: "gone" }, 404));
    app.get("/broken", (c) => c.json({ error: "down" }, 502));
    return { app, entries };
  }

  it("binds the request id to lines logged by handlers", async () => {
    const { app, entries } = gateway();

    await app.request("/ok", { headers: { "X-Request-ID": "req-1" } });

    expect(entries()).toEqual([
      expect.objectContaining({ requestId: "req-1", path: "/ok", msg: "handling" }),
      expect.objectContaining({
        level: "info",
        requestId: "req-1",
        method: "GET",
        path: "/ok",
        status: 200,
        streaming: false,
        durationMs: expect.any(Number),
        msg: "request completed",
      }),
    ]);
  });

  it("logs client errors at warn", async () => {
    const { app, entries } = gateway();

    await app.request("/missing", { headers: { "X-Request-ID": "req-2" } });

    expect(entries()).toEqual([
      expect.objectContaining({
        level: "warn",
        requestId: "req-2",
        status: 404,
        msg: "request rejected",
      }),
    ]);
  });

  it("logs upstream failures at error", async () => {
    const { app, entries } = gateway();

    await app.request("/broken");

    expect(entries()).toEqual([
      expect.objectContaining({ level: "error", status: 502, msg: "request failed" }),
    ]);
  });
});
