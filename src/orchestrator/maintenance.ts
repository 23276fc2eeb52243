// ---------------------------------------------------------------------------
// Background maintenance: cache sweeps, limiter cleanup, quota resets.
// ---------------------------------------------------------------------------

import type pino from "pino";
import type { MaintenanceConfig, QuotaPeriod } from "../core/types.js";
import type { CacheStore } from "../cache/cache-store.js";
import type { MultiCategoryRateLimiter } from "../rate-limit/multi-category-limiter.js";
import type { QuotaTracker } from "../rate-limit/quota-tracker.js";

export interface MaintenanceTargets {
  cache: CacheStore<unknown>;
  limiter: MultiCategoryRateLimiter;
  quota: QuotaTracker;
}

/** What a single maintenance pass did. `null` means the task failed. */
export interface MaintenanceReport {
  expiredCacheEntries: number | null;
  inactiveUsersRemoved: Record<string, number> | null;
  quotaResets: QuotaPeriod[];
  failedTasks: string[];
}

/**
 * Periodically runs the sweeps that none of the components trigger on
 * their own.
 *
 * Quota resets fire once the configured interval has passed since the
 * tracker's previous reset. This is interval-based, not aligned to calendar
 * days or months.
 *
 * Each task runs in isolation: a failure is logged and the remaining tasks
 * still run.
 */
export class MaintenanceScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private running: Promise<MaintenanceReport> | null = null;

  constructor(
    private readonly targets: MaintenanceTargets,
    private readonly config: MaintenanceConfig,
    private readonly logger?: pino.Logger,
  ) {
    if (!(config.intervalMs > 0)) {
      throw new RangeError("maintenance intervalMs must be positive");
    }
  }

  start(): void {
    if (this.timer !== null) return;

    this.timer = setInterval(() => {
      // Skip a tick while the previous pass is still sweeping.
      if (this.running) return;
      this.running = this.runOnce().finally(() => {
        this.running = null;
      });
    }, this.config.intervalMs);

    // Allow the process to exit even if the timer is still running.
    if (typeof this.timer === "object" && "unref" in this.timer) {
      this.timer.unref();
    }

    this.logger?.info({ intervalMs: this.config.intervalMs }, "maintenance scheduler started");
  }

  stop(): void {
    if (this.timer === null) return;
    clearInterval(this.timer);
    this.timer = null;
    this.logger?.info("maintenance scheduler stopped");
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  async runOnce(): Promise<MaintenanceReport> {
    const report: MaintenanceReport = {
      expiredCacheEntries: null,
      inactiveUsersRemoved: null,
      quotaResets: [],
      failedTasks: [],
    };

    try {
      report.expiredCacheEntries = await this.targets.cache.cleanupExpired();
    } catch (err) {
      this.taskFailed(report, "cache-cleanup", err);
    }

    try {
      report.inactiveUsersRemoved = this.targets.limiter.cleanup();
    } catch (err) {
      this.taskFailed(report, "rate-limit-cleanup", err);
    }

    this.maybeResetQuota(report, "daily", this.config.dailyResetIntervalMs);
    this.maybeResetQuota(report, "monthly", this.config.monthlyResetIntervalMs);

    this.logger?.debug({ report }, "maintenance pass complete");
    return report;
  }

  // ── Internals ───────────────────────────────────────────────────────────

  private maybeResetQuota(report: MaintenanceReport, period: QuotaPeriod, intervalMs: number): void {
    if (!(intervalMs > 0)) return;

    try {
      const quota = this.targets.quota;
      if (Date.now() - quota.lastResetAt(period) >= intervalMs) {
        quota.reset(period);
        report.quotaResets.push(period);
      }
    } catch (err) {
      this.taskFailed(report, `quota-reset-${period}`, err);
    }
  }

  private taskFailed(report: MaintenanceReport, task: string, err: unknown): void {
    report.failedTasks.push(task);
    this.logger?.warn(
      { task, err: err instanceof Error ? { name: err.name, message: err.message } : err },
      "maintenance task failed",
    );
  }
}
