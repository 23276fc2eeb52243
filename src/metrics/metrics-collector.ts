// ---------------------------------------------------------------------------
// In-memory metrics for the cache, rate limiter, quota tracker and retries.
// ---------------------------------------------------------------------------

import type { MetricsConfig, QuotaOperation, RateCategory } from "../core/types.js";
import type pino from "pino";

// ── Cache metrics ───────────────────────────────────────────────────────────

interface CacheMetrics {
  hits: number;
  misses: number;
  sets: number;
  evictions: number;
  expirations: number;
}

// ── Rate-limit / quota metrics ──────────────────────────────────────────────

interface AdmissionMetrics {
  allowed: number;
  denied: number;
}

// ── Retry metrics ───────────────────────────────────────────────────────────

interface RetryMetrics {
  /** Every invocation of the wrapped operation, first try included. */
  attempts: number;
  /** Invocations after the first one. */
  retries: number;
  /** Sequences that ran out of retries and rethrew. */
  exhausted: number;
}

/** Cache event recorded by `CacheStore`. */
export type CacheEvent = "hit" | "miss" | "set" | "eviction" | "expiration";

/** Event recorded by `withRetry`. */
export type RetryEvent = "attempt" | "retry" | "exhausted";

/** Immutable snapshot of all metrics at a point in time. */
export interface MetricsSnapshot {
  cache: Readonly<CacheMetrics>;
  rateLimit: ReadonlyMap<string, Readonly<AdmissionMetrics>>;
  quota: ReadonlyMap<string, Readonly<AdmissionMetrics>>;
  retry: Readonly<RetryMetrics>;
  collectedAt: string;
}

/**
 * Collects in-memory counters for the resilience components.
 *
 * Optionally logs a periodic report at a configurable interval.
 */
export class MetricsCollector {
  private readonly cacheMetrics: CacheMetrics = {
    hits: 0,
    misses: 0,
    sets: 0,
    evictions: 0,
    expirations: 0,
  };
  private readonly rateLimitMetrics = new Map<string, AdmissionMetrics>();
  private readonly quotaMetrics = new Map<string, AdmissionMetrics>();
  private readonly retryMetrics: RetryMetrics = {
    attempts: 0,
    retries: 0,
    exhausted: 0,
  };

  private reportTimer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly config: MetricsConfig,
    private readonly logger?: pino.Logger,
  ) {
    if (config.enabled && config.reportIntervalMs > 0 && logger) {
      this.reportTimer = setInterval(() => {
        this.logReport();
      }, config.reportIntervalMs);

      // Allow the process to exit even if the timer is still running.
      if (typeof this.reportTimer === "object" && "unref" in this.reportTimer) {
        this.reportTimer.unref();
      }
    }
  }

  // ── Recording ───────────────────────────────────────────────────────────

  recordCacheEvent(event: CacheEvent, count = 1): void {
    if (!this.config.enabled) return;

    const m = this.cacheMetrics;
    switch (event) {
      case "hit":
        m.hits += count;
        break;
      case "miss":
        m.misses += count;
        break;
      case "set":
        m.sets += count;
        break;
      case "eviction":
        m.evictions += count;
        break;
      case "expiration":
        m.expirations += count;
        break;
    }
  }

  recordRateDecision(category: RateCategory, allowed: boolean): void {
    if (!this.config.enabled) return;
    bump(this.rateLimitMetrics, category, allowed);
  }

  recordQuotaDecision(operation: QuotaOperation, allowed: boolean): void {
    if (!this.config.enabled) return;
    bump(this.quotaMetrics, operation, allowed);
  }

  recordRetryEvent(event: RetryEvent): void {
    if (!this.config.enabled) return;

    const r = this.retryMetrics;
    switch (event) {
      case "attempt":
        r.attempts++;
        break;
      case "retry":
        r.retries++;
        break;
      case "exhausted":
        r.exhausted++;
        break;
    }
  }

  // ── Snapshot ────────────────────────────────────────────────────────────

  snapshot(): MetricsSnapshot {
    return {
      cache: { ...this.cacheMetrics },
      rateLimit: copyAdmissions(this.rateLimitMetrics),
      quota: copyAdmissions(this.quotaMetrics),
      retry: { ...this.retryMetrics },
      collectedAt: new Date().toISOString(),
    };
  }

  /** Plain-object form of {@link snapshot}, suitable for JSON and log lines. */
  toJSON(): Record<string, unknown> {
    const snap = this.snapshot();
    return {
      cache: snap.cache,
      rateLimit: Object.fromEntries(snap.rateLimit),
      quota: Object.fromEntries(snap.quota),
      retry: snap.retry,
      collectedAt: snap.collectedAt,
    };
  }

  // ── Periodic report ─────────────────────────────────────────────────────

  private logReport(): void {
    if (!this.logger) return;
    this.logger.info({ metrics: this.toJSON() }, "periodic metrics report");
  }

  // ── Cleanup ─────────────────────────────────────────────────────────────

  dispose(): void {
    if (this.reportTimer !== null) {
      clearInterval(this.reportTimer);
      this.reportTimer = null;
    }
  }
}

// ── Helpers ────────────────────────────────────────────────────────────────

function bump(
  target: Map<string, AdmissionMetrics>,
  key: string,
  allowed: boolean,
): void {
  let m = target.get(key);
  if (!m) {
    m = { allowed: 0, denied: 0 };
    target.set(key, m);
  }
  if (allowed) {
    m.allowed++;
  } else {
    m.denied++;
  }
}

function copyAdmissions(
  source: Map<string, AdmissionMetrics>,
): Map<string, AdmissionMetrics> {
  const copy = new Map<string, AdmissionMetrics>();
  for (const [key, value] of source) {
    copy.set(key, { ...value });
  }
  return copy;
}
