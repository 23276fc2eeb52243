// ---------------------------------------------------------------------------
// Routes admission checks to an independent RateWindow per category.
// ---------------------------------------------------------------------------

import type pino from "pino";
import { ConfigurationError } from "../core/errors.js";
import { DEFAULT_CATEGORY } from "../core/types.js";
import type {
  RateCategory,
  RateDecision,
  RateWindowPolicy,
  RateWindowStats,
  UserId,
} from "../core/types.js";
import type { MetricsCollector } from "../metrics/metrics-collector.js";
import { RateWindow } from "./rate-window.js";

/** Built-in budgets, one minute each; image analysis is the tightest. */
export const DEFAULT_RATE_POLICIES: Readonly<Record<RateCategory, RateWindowPolicy>> = {
  general: { capacity: 30, windowMs: 60_000 },
  search: { capacity: 20, windowMs: 60_000 },
  image_analysis: { capacity: 5, windowMs: 60_000 },
  barcode: { capacity: 10, windowMs: 60_000 },
};

export interface MultiCategoryRateLimiterOptions {
  policies?: Record<RateCategory, RateWindowPolicy>;
  logger?: pino.Logger;
  metrics?: MetricsCollector;
}

/**
 * Holds one sliding window per operation category so that cheap and
 * expensive operations never draw on the same budget.
 *
 * Unknown categories are checked against the `general` window.
 */
export class MultiCategoryRateLimiter {
  private readonly windows = new Map<RateCategory, RateWindow>();
  private readonly fallback: RateWindow;

  constructor(options: MultiCategoryRateLimiterOptions = {}) {
    const policies = options.policies ?? DEFAULT_RATE_POLICIES;

    for (const [category, policy] of Object.entries(policies)) {
      this.windows.set(
        category,
        new RateWindow({
          ...policy,
          category,
          logger: options.logger,
          metrics: options.metrics,
        }),
      );
    }

    const general = this.windows.get(DEFAULT_CATEGORY);
    if (!general) {
      throw new ConfigurationError(
        `rate limit policies must define the "${DEFAULT_CATEGORY}" category`,
      );
    }
    this.fallback = general;
  }

  isAllowed(user: UserId, category: RateCategory = DEFAULT_CATEGORY): RateDecision {
    return this.windowFor(category).isAllowed(user);
  }

  getRemaining(user: UserId, category: RateCategory = DEFAULT_CATEGORY): number {
    return this.windowFor(category).getRemaining(user);
  }

  /** Sweep every category; returns users removed per category. */
  cleanup(): Record<RateCategory, number> {
    const removed: Record<RateCategory, number> = {};
    for (const [category, window] of this.windows) {
      removed[category] = window.cleanup();
    }
    return removed;
  }

  /**
   * Clear a user's history in one category, or in all of them when no
   * category is given. Unknown categories are ignored.
   */
  resetUser(user: UserId, category?: RateCategory): void {
    if (category !== undefined) {
      this.windows.get(category)?.resetUser(user);
      return;
    }
    for (const window of this.windows.values()) {
      window.resetUser(user);
    }
  }

  getStats(): Record<RateCategory, RateWindowStats> {
    const stats: Record<RateCategory, RateWindowStats> = {};
    for (const [category, window] of this.windows) {
      stats[category] = window.getStats();
    }
    return stats;
  }

  categories(): RateCategory[] {
    return [...this.windows.keys()];
  }

  windowFor(category: RateCategory): RateWindow {
    return this.windows.get(category) ?? this.fallback;
  }
}
