// ---------------------------------------------------------------------------
// Retry logic with exponential backoff.
// ---------------------------------------------------------------------------

import type pino from "pino";
import type { MetricsCollector } from "../metrics/metrics-collector.js";

// ── Types ──────────────────────────────────────────────────────────────────

/** Details handed to `onRetry` before each backoff sleep. */
export interface RetryAttemptInfo {
  /** Zero-based index of the attempt that just failed. */
  attempt: number;
  /** How long we are about to wait before the next attempt. */
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  /** Maximum number of retries (0 means no retries, just the initial call). */
  maxRetries: number;
  /** Base delay in milliseconds before the first retry. */
  baseDelayMs: number;
  /** Label for log lines. */
  operation?: string;
  logger?: pino.Logger;
  metrics?: MetricsCollector;
  onRetry?: (info: RetryAttemptInfo) => void;
}

// ── Delay helper ───────────────────────────────────────────────────────────

/**
 * Backoff before retry number `attempt + 1`: `baseDelayMs * 2^attempt`.
 */
export function computeDelay(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * 2 ** attempt;
}

/** Returns a promise that resolves after `ms` milliseconds. */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function validateOptions(options: RetryOptions): void {
  if (!Number.isInteger(options.maxRetries) || options.maxRetries < 0) {
    throw new RangeError("maxRetries must be a non-negative integer");
  }
  if (!(options.baseDelayMs >= 0)) {
    throw new RangeError("baseDelayMs must not be negative");
  }
}

function describeError(error: unknown): unknown {
  return error instanceof Error ? { name: error.name, message: error.message } : error;
}

// ── Public API ─────────────────────────────────────────────────────────────

/**
 * Execute `fn` with retry semantics.
 *
 * Any thrown error triggers a retry, whatever its type. Between attempts the
 * function sleeps `baseDelayMs * 2^attempt`, for at most `maxRetries`
 * retries (`maxRetries + 1` calls in total).
 *
 * If all attempts are exhausted, the last error is thrown unchanged.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  validateOptions(options);
  const { maxRetries, baseDelayMs, operation = fn.name || "operation", logger, metrics, onRetry } = options;

  for (let attempt = 0; ; attempt++) {
    metrics?.recordRetryEvent("attempt");
    if (attempt > 0) metrics?.recordRetryEvent("retry");

    try {
      return await fn();
    } catch (error: unknown) {
      if (attempt >= maxRetries) {
        metrics?.recordRetryEvent("exhausted");
        logger?.error(
          { operation, attempts: attempt + 1, err: describeError(error) },
          "operation failed after all attempts",
        );
        throw error;
      }

      const delayMs = computeDelay(attempt, baseDelayMs);
      logger?.warn(
        { operation, attempt: attempt + 1, delayMs, err: describeError(error) },
        "operation failed; retrying",
      );
      onRetry?.({ attempt, delayMs, error });

      await sleep(delayMs);
    }
  }
}

/**
 * Wrap `fn` so that every call goes through {@link withRetry}.
 * The returned function has the same signature as `fn`.
 */
export function retrying<A extends unknown[], R>(
  fn: (...args: A) => Promise<R>,
  options: RetryOptions,
): (...args: A) => Promise<R> {
  validateOptions(options);
  const operation = options.operation ?? (fn.name || "operation");
  return (...args: A): Promise<R> =>
    withRetry(() => fn(...args), { ...options, operation });
}
