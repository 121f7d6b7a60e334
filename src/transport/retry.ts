// ---------------------------------------------------------------------------
// Retry logic with exponential backoff and jitter.
// ---------------------------------------------------------------------------

import {
  HttpStatusError,
  TransportError,
} from "../core/errors.js";

// ── Types ──────────────────────────────────────────────────────────────────

export interface RetryOptions {
  /** Maximum number of retries (0 means no retries, just the initial call). */
  maxRetries: number;
  /** Base delay in milliseconds before the first retry. */
  baseDelayMs: number;
  /**
   * Predicate that decides whether a given error is retryable.
   *
   * When omitted the default policy is used:
   * - Retry: `TransportError` and its timeout subclass
   * - Do NOT retry: `HttpStatusError`, anything that is not a transport error
   */
  shouldRetry?: (error: unknown) => boolean;
  /** Called before sleeping ahead of each retry. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Aborting stops further attempts and rejects with the signal's reason. */
  signal?: AbortSignal;
}

// ── Default retry predicate ────────────────────────────────────────────────

function defaultShouldRetry(error: unknown): boolean {
  if (error instanceof HttpStatusError) return false;
  return error instanceof TransportError;
}

// ── Delay helper ───────────────────────────────────────────────────────────

/**
 * Compute the delay for a given attempt using exponential backoff with
 * full jitter (random value between 0 and the exponential ceiling).
 */
export function computeDelay(attempt: number, baseDelayMs: number): number {
  const exponential = baseDelayMs * 2 ** attempt;
  return Math.round(Math.random() * exponential);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

// ── Public API ─────────────────────────────────────────────────────────────

/**
 * Execute `fn` with retry semantics.
 *
 * On failure `shouldRetry` is consulted.  If `true`, the function sleeps
 * using exponential backoff with jitter before retrying up to
 * `maxRetries` times.
 *
 * If all attempts are exhausted, the last error is thrown.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const {
    maxRetries,
    baseDelayMs,
    shouldRetry = defaultShouldRetry,
    onRetry,
    signal,
  } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (signal?.aborted || !shouldRetry(error) || attempt >= maxRetries) {
        throw error;
      }

      const delay = computeDelay(attempt, baseDelayMs);
      onRetry?.(error, attempt + 1, delay);
      await sleep(delay, signal);
    }
  }

  // Should be unreachable, but satisfy the compiler.
  throw lastError;
}
