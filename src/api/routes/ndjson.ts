// ---------------------------------------------------------------------------
// NDJSON streaming of async result sequences.
// ---------------------------------------------------------------------------

import type { Context } from "hono";
import { stream } from "hono/streaming";
import type pino from "pino";

/** The part of Hono's `StreamingApi` the line writer needs. */
export interface LineSink {
  write(line: string): Promise<unknown>;
  onAbort(listener: () => void | Promise<void>): void;
}

/**
 * Writes `first` and every remaining item of `items` as one JSON line each.
 * Once the client disconnects no further item is pulled and the generator
 * is closed, so its pending upstream requests are not issued.
 */
export async function writeNdjsonLines<T>(
  out: LineSink,
  first: IteratorResult<T, void>,
  items: AsyncGenerator<T, void, undefined>,
  logger: pino.Logger,
): Promise<void> {
  let aborted = false;
  out.onAbort(() => {
    aborted = true;
  });

  let written = 0;
  for (let next = first; !next.done; next = await items.next()) {
    await out.write(`${JSON.stringify(next.value)}\n`);
    written++;
    if (aborted) {
      await items.return();
      break;
    }
  }
  logger.info({ written, aborted }, "stream finished");
}

/**
 * Streams `items` as `application/x-ndjson`.
 *
 * The first item is pulled before the response starts, so a request that
 * fails up front still goes through the app's error handler with its own
 * status.  A failure after that can only be reported in-band: the stream
 * ends with an `{ error, type }` line.
 */
export async function streamNdjson<T>(
  c: Context,
  items: AsyncGenerator<T, void, undefined>,
  logger: pino.Logger,
): Promise<Response> {
  const first = await items.next();

  c.header("Content-Type", "application/x-ndjson; charset=utf-8");
  return stream(
    c,
    (out) => writeNdjsonLines(out, first, items, logger),
    async (err, out) => {
      logger.error({ err }, "stream failed");
      await out.write(`${JSON.stringify({ error: err.message, type: err.name })}\n`);
    },
  );
}
