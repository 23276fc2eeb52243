// ---------------------------------------------------------------------------
// Memoization wrapper backed by CacheStore.
// ---------------------------------------------------------------------------

import type pino from "pino";
import { ConfigurationError } from "../core/errors.js";
import type { CacheStore } from "./cache-store.js";
import { deriveCacheKey } from "./cache-key.js";

export interface MemoizeOptions<R> {
  cache: CacheStore<R>;
  /** TTL for stored results; the store's default when omitted. */
  ttlMs?: number;
  /** Function identity used in the key. Defaults to `fn.name`. */
  name?: string;
  keyPrefix?: string;
  logger?: pino.Logger;
}

/**
 * Wrap an async function so that identical calls within `ttlMs` are served
 * from `cache` instead of calling `fn` again.
 *
 * - Successful results are stored; thrown errors are never cached and
 *   propagate unchanged.
 * - Concurrent calls for the same uncached key are not de-duplicated: each
 *   one runs `fn` and writes the same slot.
 */
export function memoize<A extends unknown[], R>(
  fn: (...args: A) => Promise<R>,
  options: MemoizeOptions<R>,
): (...args: A) => Promise<R> {
  const { cache, ttlMs, keyPrefix = "", logger } = options;
  const name = options.name ?? fn.name;

  if (!name) {
    throw new ConfigurationError(
      "memoize() needs a name for anonymous functions; pass options.name",
    );
  }

  return async (...args: A): Promise<R> => {
    const key = deriveCacheKey(name, args, keyPrefix);

    const cached = await cache.lookup(key);
    if (cached.hit) {
      return cached.value;
    }

    let result: R;
    try {
      result = await fn(...args);
    } catch (error: unknown) {
      logger?.error(
        { fn: name, err: error instanceof Error ? { name: error.name, message: error.message } : error },
        "memoized function failed",
      );
      throw error;
    }

    await cache.set(key, result, ttlMs ?? cache.defaultTtlMs);
    return result;
  };
}
