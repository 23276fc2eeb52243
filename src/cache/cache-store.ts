// ---------------------------------------------------------------------------
// Generic in-memory cache with per-entry TTL and LRU eviction.
// ---------------------------------------------------------------------------

import pLimit from "p-limit";
import type pino from "pino";
import type { CacheLookup, CacheStats } from "../core/types.js";
import type { MetricsCollector } from "../metrics/metrics-collector.js";

/** Internal cache entry. Replaced wholesale on overwrite, never mutated. */
interface CacheEntry<T> {
  readonly value: T;
  readonly createdAt: number;
  readonly expiresAt: number;
}

/** Default time-to-live: 1 hour. */
const DEFAULT_TTL_MS = 3_600_000;

export interface CacheStoreOptions {
  maxSize: number;
  defaultTtlMs?: number;
  logger?: pino.Logger;
  metrics?: MetricsCollector;
}

/**
 * A generic LRU (Least Recently Used) cache with per-entry TTL support.
 *
 * - Entries whose `expiresAt` is at or before the current time are treated as
 *   absent and removed when read (lazy expiry); {@link cleanupExpired} sweeps
 *   the rest and is meant to be driven by a periodic timer.
 * - Inserting a new key into a full store first evicts the key with the
 *   oldest access time. Overwriting an existing key never evicts.
 * - Every read and write goes through a store-scoped mutex so that the
 *   capacity check, eviction and insert happen as one step. The critical
 *   sections never await I/O.
 */
export class CacheStore<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  /** Iteration order doubles as recency order: touched keys move to the end. */
  private readonly accessTimes = new Map<string, number>();
  private readonly lock = pLimit(1);

  readonly maxSize: number;
  readonly defaultTtlMs: number;

  private readonly logger?: pino.Logger;
  private readonly metrics?: MetricsCollector;

  constructor(options: CacheStoreOptions) {
    const { maxSize, defaultTtlMs = DEFAULT_TTL_MS } = options;

    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError("maxSize must be an integer of at least 1");
    }
    if (!(defaultTtlMs > 0)) {
      throw new RangeError("defaultTtlMs must be positive");
    }

    this.maxSize = maxSize;
    this.defaultTtlMs = defaultTtlMs;
    this.logger = options.logger;
    this.metrics = options.metrics;
  }

  // ── Reads ───────────────────────────────────────────────────────────────

  async get(key: string): Promise<T | null> {
    const result = await this.lookup(key);
    return result.hit ? result.value : null;
  }

  /**
   * Like {@link get}, but tells a cached `null` apart from a miss.
   */
  lookup(key: string): Promise<CacheLookup<T>> {
    return this.lock(() => this.readEntry(key, Date.now()));
  }

  async has(key: string): Promise<boolean> {
    const result = await this.lookup(key);
    return result.hit;
  }

  // ── Writes ──────────────────────────────────────────────────────────────

  async set(key: string, value: T, ttlMs: number = this.defaultTtlMs): Promise<void> {
    if (!(ttlMs >= 0)) {
      throw new RangeError("ttlMs must not be negative");
    }

    await this.lock(() => {
      const now = Date.now();

      if (!this.entries.has(key) && this.entries.size >= this.maxSize) {
        this.evictLeastRecentlyUsed();
      }

      this.entries.set(key, { value, createdAt: now, expiresAt: now + ttlMs });
      this.touch(key, now);

      this.metrics?.recordCacheEvent("set");
      this.logger?.debug({ key, ttlMs }, "cache set");
    });
  }

  delete(key: string): Promise<boolean> {
    return this.lock(() => {
      const existed = this.removeEntry(key);
      if (existed) {
        this.logger?.debug({ key }, "cache deleted");
      }
      return existed;
    });
  }

  clear(): Promise<void> {
    return this.lock(() => {
      this.entries.clear();
      this.accessTimes.clear();
      this.logger?.info("cache cleared");
    });
  }

  // ── Maintenance ─────────────────────────────────────────────────────────

  /**
   * Remove every entry whose TTL has elapsed. Returns the number removed.
   */
  cleanupExpired(): Promise<number> {
    return this.lock(() => {
      const now = Date.now();
      let removed = 0;

      for (const [key, entry] of this.entries) {
        if (entry.expiresAt <= now) {
          this.removeEntry(key);
          removed++;
        }
      }

      if (removed > 0) {
        this.metrics?.recordCacheEvent("expiration", removed);
        this.logger?.info({ removed }, "cleaned up expired cache entries");
      }

      return removed;
    });
  }

  getStats(): Promise<CacheStats> {
    return this.lock(() => {
      const now = Date.now();
      let expired = 0;

      for (const entry of this.entries.values()) {
        if (entry.expiresAt <= now) expired++;
      }

      const total = this.entries.size;
      return {
        totalEntries: total,
        expiredEntries: expired,
        activeEntries: total - expired,
        maxSize: this.maxSize,
        usagePercentage: (total / this.maxSize) * 100,
      };
    });
  }

  /** Drop everything; called on shutdown. */
  async close(): Promise<void> {
    await this.clear();
  }

  /** Number of stored entries, expired ones included until swept. */
  get size(): number {
    return this.entries.size;
  }

  // ── Internals (always called with the lock held) ───────────────────────

  private readEntry(key: string, now: number): CacheLookup<T> {
    const entry = this.entries.get(key);

    if (!entry) {
      this.metrics?.recordCacheEvent("miss");
      this.logger?.debug({ key }, "cache miss");
      return { hit: false };
    }

    if (entry.expiresAt <= now) {
      this.removeEntry(key);
      this.metrics?.recordCacheEvent("expiration");
      this.metrics?.recordCacheEvent("miss");
      this.logger?.debug({ key }, "cache entry expired");
      return { hit: false };
    }

    this.touch(key, now);
    this.metrics?.recordCacheEvent("hit");
    this.logger?.debug({ key }, "cache hit");
    return { hit: true, value: entry.value };
  }

  private touch(key: string, now: number): void {
    // delete + re-insert keeps the map ordered by recency
    this.accessTimes.delete(key);
    this.accessTimes.set(key, now);
  }

  private removeEntry(key: string): boolean {
    this.accessTimes.delete(key);
    return this.entries.delete(key);
  }

  private evictLeastRecentlyUsed(): void {
    let lruKey: string | null = null;
    let lruTime = Infinity;

    // Strict `<` keeps the earliest-touched key on timestamp ties.
    for (const [key, accessedAt] of this.accessTimes) {
      if (accessedAt < lruTime) {
        lruKey = key;
        lruTime = accessedAt;
      }
    }

    if (lruKey === null) return;

    this.removeEntry(lruKey);
    this.metrics?.recordCacheEvent("eviction");
    this.logger?.debug({ key: lruKey }, "evicted least recently used cache entry");
  }
}
