// ---------------------------------------------------------------------------
// Per-user daily / monthly usage ceilings.
// ---------------------------------------------------------------------------

import type pino from "pino";
import type {
  QuotaDecision,
  QuotaLimits,
  QuotaOperation,
  QuotaPeriod,
  QuotaUsage,
  UserId,
} from "../core/types.js";
import type { MetricsCollector } from "../metrics/metrics-collector.js";

/** Built-in ceilings. Operations missing here are unbounded. */
export const DEFAULT_QUOTAS: Readonly<Record<QuotaOperation, QuotaLimits>> = {
  image_analysis: { daily: 50, monthly: 1_000 },
  barcode_scans: { daily: 100, monthly: 2_000 },
  searches: { daily: 200, monthly: 5_000 },
};

/** Metrics label shared by every operation without configured ceilings. */
export const UNBOUNDED_OPERATION = "unbounded";

export interface QuotaTrackerOptions {
  quotas?: Record<QuotaOperation, Partial<QuotaLimits>>;
  logger?: pino.Logger;
  metrics?: MetricsCollector;
}

/** user → operation → count */
type UsageTable = Map<string, Map<QuotaOperation, number>>;

/**
 * Tracks how often each user ran each quota-gated operation in the current
 * day and month.
 *
 * Counters only move up through {@link useQuota} and only go back to zero
 * through {@link resetDaily} / {@link resetMonthly}. The tracker has no idea
 * when a day or month ends; a scheduler decides when to reset.
 */
export class QuotaTracker {
  private readonly daily: UsageTable = new Map();
  private readonly monthly: UsageTable = new Map();
  private readonly limits: Record<QuotaOperation, Partial<QuotaLimits>>;

  private lastDailyReset: number;
  private lastMonthlyReset: number;

  private readonly logger?: pino.Logger;
  private readonly metrics?: MetricsCollector;

  constructor(options: QuotaTrackerOptions = {}) {
    this.limits = { ...(options.quotas ?? DEFAULT_QUOTAS) };
    this.logger = options.logger;
    this.metrics = options.metrics;

    const now = Date.now();
    this.lastDailyReset = now;
    this.lastMonthlyReset = now;
  }

  /**
   * Check the daily ceiling first, then the monthly one, and report the
   * first one already reached.
   */
  checkQuota(user: UserId, operation: QuotaOperation): QuotaDecision {
    const limits = this.limitsFor(operation);

    const dailyUsed = readCount(this.daily, user, operation);
    if (dailyUsed >= limits.daily) {
      return this.deny(user, operation, `daily limit of ${limits.daily} exceeded`);
    }

    const monthlyUsed = readCount(this.monthly, user, operation);
    if (monthlyUsed >= limits.monthly) {
      return this.deny(user, operation, `monthly limit of ${limits.monthly} exceeded`);
    }

    this.metrics?.recordQuotaDecision(this.metricLabel(operation), true);
    return { allowed: true, reason: "quota available" };
  }

  /** Record one confirmed use. Call only after the operation actually ran. */
  useQuota(user: UserId, operation: QuotaOperation): void {
    increment(this.daily, user, operation);
    increment(this.monthly, user, operation);
  }

  getUsage(user: UserId): QuotaUsage {
    return {
      daily: Object.fromEntries(this.daily.get(String(user)) ?? []),
      monthly: Object.fromEntries(this.monthly.get(String(user)) ?? []),
    };
  }

  /** Whether the operation has an entry in the configured quotas. */
  isTracked(operation: QuotaOperation): boolean {
    return Object.hasOwn(this.limits, operation);
  }

  /** Ceilings for an operation; missing ones are `Infinity`. */
  limitsFor(operation: QuotaOperation): QuotaLimits {
    const configured = this.isTracked(operation) ? this.limits[operation] : undefined;
    return {
      daily: configured?.daily ?? Infinity,
      monthly: configured?.monthly ?? Infinity,
    };
  }

  resetDaily(): void {
    this.daily.clear();
    this.lastDailyReset = Date.now();
    this.logger?.info("daily quotas reset");
  }

  resetMonthly(): void {
    this.monthly.clear();
    this.lastMonthlyReset = Date.now();
    this.logger?.info("monthly quotas reset");
  }

  reset(period: QuotaPeriod): void {
    if (period === "daily") {
      this.resetDaily();
    } else {
      this.resetMonthly();
    }
  }

  /** Epoch milliseconds of the last reset (construction time if none). */
  lastResetAt(period: QuotaPeriod): number {
    return period === "daily" ? this.lastDailyReset : this.lastMonthlyReset;
  }

  // ── Internals ───────────────────────────────────────────────────────────

  private metricLabel(operation: QuotaOperation): string {
    return this.isTracked(operation) ? operation : UNBOUNDED_OPERATION;
  }

  private deny(user: UserId, operation: QuotaOperation, reason: string): QuotaDecision {
    this.metrics?.recordQuotaDecision(this.metricLabel(operation), false);
    this.logger?.warn({ user: String(user), operation, reason }, "quota exceeded");
    return { allowed: false, reason };
  }
}

// ── Helpers ────────────────────────────────────────────────────────────────

function readCount(table: UsageTable, user: UserId, operation: QuotaOperation): number {
  return table.get(String(user))?.get(operation) ?? 0;
}

function increment(table: UsageTable, user: UserId, operation: QuotaOperation): void {
  const key = String(user);
  let counters = table.get(key);
  if (!counters) {
    counters = new Map();
    table.set(key, counters);
  }
  counters.set(operation, (counters.get(operation) ?? 0) + 1);
}
