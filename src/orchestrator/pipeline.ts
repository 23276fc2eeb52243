// ---------------------------------------------------------------------------
// Composable Operation -> Operation stages (retry, memoization).
// ---------------------------------------------------------------------------

import type { CacheStore } from "../cache/cache-store.js";
import { memoize } from "../cache/memoize.js";
import type { MemoizeOptions } from "../cache/memoize.js";
import { retrying } from "./retry.js";
import type { RetryOptions } from "./retry.js";

/** An async call with arguments `A` resolving to `R`. */
export type Operation<A extends unknown[], R> = (...args: A) => Promise<R>;

/** Wraps an operation and returns an equivalent one with added behaviour. */
export type OperationStage<A extends unknown[], R> = (op: Operation<A, R>) => Operation<A, R>;

/**
 * Apply `stages` to `op` from left to right: the first stage wraps the bare
 * operation, the last stage is the outermost layer the caller talks to.
 */
export function pipeline<A extends unknown[], R>(
  op: Operation<A, R>,
  ...stages: OperationStage<A, R>[]
): Operation<A, R> {
  return stages.reduce<Operation<A, R>>((wrapped, stage) => stage(wrapped), op);
}

export function retryStage<A extends unknown[], R>(options: RetryOptions): OperationStage<A, R> {
  return (op) => retrying(op, options);
}

/** Memoization needs a name because staged operations are anonymous. */
export function memoizeStage<A extends unknown[], R>(
  options: MemoizeOptions<R> & { name: string },
): OperationStage<A, R> {
  return (op) => memoize(op, options);
}

export interface GuardedLookupOptions<R> {
  cache: CacheStore<R>;
  ttlMs?: number;
  keyPrefix?: string;
  retry: Omit<RetryOptions, "operation">;
}

/**
 * The standard chain for a remote lookup: results are served from `cache`
 * when fresh, and a miss calls `op` with retry and backoff.
 */
export function guardedLookup<A extends unknown[], R>(
  name: string,
  op: Operation<A, R>,
  options: GuardedLookupOptions<R>,
): Operation<A, R> {
  return pipeline(
    op,
    retryStage<A, R>({ ...options.retry, operation: name }),
    memoizeStage<A, R>({
      cache: options.cache,
      ttlMs: options.ttlMs,
      keyPrefix: options.keyPrefix,
      logger: options.retry.logger,
      name,
    }),
  );
}
