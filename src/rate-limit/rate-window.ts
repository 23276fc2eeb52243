// ---------------------------------------------------------------------------
// Per-user sliding-window rate limiter for a single category.
// ---------------------------------------------------------------------------

import type pino from "pino";
import type {
  RateDecision,
  RateWindowPolicy,
  RateWindowStats,
  UserId,
} from "../core/types.js";
import type { MetricsCollector } from "../metrics/metrics-collector.js";

export interface RateWindowOptions extends RateWindowPolicy {
  /** Label used in logs and metrics. */
  category?: string;
  logger?: pino.Logger;
  metrics?: MetricsCollector;
}

/**
 * Admits at most `capacity` requests per user in any trailing `windowMs`
 * interval.
 *
 * Each user keeps an ordered list of admission timestamps. A check first
 * drops timestamps that fell out of the window `(now - windowMs, now]`, then
 * either denies (list full) or records `now` and admits. There is no
 * smoothing: request `capacity + 1` inside one window is always denied until
 * the oldest admission ages out.
 *
 * State is created lazily per user and only dropped by {@link cleanup}.
 * Every method is synchronous, so no lock is needed on the event loop.
 */
export class RateWindow {
  private readonly requests = new Map<string, number[]>();

  readonly capacity: number;
  readonly windowMs: number;
  readonly category: string;

  private readonly logger?: pino.Logger;
  private readonly metrics?: MetricsCollector;

  constructor(options: RateWindowOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError("capacity must be an integer of at least 1");
    }
    if (!(options.windowMs > 0)) {
      throw new RangeError("windowMs must be positive");
    }

    this.capacity = options.capacity;
    this.windowMs = options.windowMs;
    this.category = options.category ?? "default";
    this.logger = options.logger;
    this.metrics = options.metrics;
  }

  isAllowed(user: UserId): RateDecision {
    const now = Date.now();
    const timestamps = this.timestampsFor(user, now);

    if (timestamps.length >= this.capacity) {
      const oldest = timestamps[0] ?? now;
      const retryAfterSeconds = Math.floor((oldest + this.windowMs - now) / 1000) + 1;

      this.metrics?.recordRateDecision(this.category, false);
      this.logger?.warn(
        { user: String(user), category: this.category, retryAfterSeconds },
        "rate limit exceeded",
      );
      return { allowed: false, retryAfterSeconds };
    }

    timestamps.push(now);

    this.metrics?.recordRateDecision(this.category, true);
    this.logger?.debug(
      { user: String(user), category: this.category, count: timestamps.length, capacity: this.capacity },
      "request allowed",
    );
    return { allowed: true, retryAfterSeconds: null };
  }

  getRemaining(user: UserId): number {
    const timestamps = this.timestampsFor(user, Date.now());
    return Math.max(0, this.capacity - timestamps.length);
  }

  /**
   * Epoch milliseconds at which the oldest recorded admission leaves the
   * window, or `null` if the user has none.
   */
  getResetTime(user: UserId): number | null {
    const timestamps = this.requests.get(String(user));
    if (!timestamps) return null;

    this.prune(timestamps, Date.now());
    const oldest = timestamps[0];
    return oldest === undefined ? null : oldest + this.windowMs;
  }

  resetUser(user: UserId): void {
    if (this.requests.delete(String(user))) {
      this.logger?.info({ user: String(user), category: this.category }, "rate limit reset for user");
    }
  }

  /**
   * Drop users with no admissions left inside the window.
   * Returns the number of users removed.
   */
  cleanup(): number {
    const now = Date.now();
    let removed = 0;

    for (const [user, timestamps] of this.requests) {
      this.prune(timestamps, now);
      if (timestamps.length === 0) {
        this.requests.delete(user);
        removed++;
      }
    }

    if (removed > 0) {
      this.logger?.info({ category: this.category, removed }, "rate limiter cleanup removed inactive users");
    }

    return removed;
  }

  getStats(): RateWindowStats {
    const cutoff = Date.now() - this.windowMs;
    let activeUsers = 0;
    let totalRecentRequests = 0;

    for (const timestamps of this.requests.values()) {
      const recent = timestamps.filter((t) => t > cutoff).length;
      if (recent > 0) {
        activeUsers++;
        totalRecentRequests += recent;
      }
    }

    return {
      activeUsers,
      totalRecentRequests,
      capacity: this.capacity,
      windowMs: this.windowMs,
    };
  }

  /** Number of users currently holding state (active or not yet swept). */
  get trackedUsers(): number {
    return this.requests.size;
  }

  // ── Internals ───────────────────────────────────────────────────────────

  private timestampsFor(user: UserId, now: number): number[] {
    const key = String(user);
    let timestamps = this.requests.get(key);

    if (!timestamps) {
      timestamps = [];
      this.requests.set(key, timestamps);
    }

    this.prune(timestamps, now);
    return timestamps;
  }

  private prune(timestamps: number[], now: number): void {
    const cutoff = now - this.windowMs;
    let expired = 0;
    while (expired < timestamps.length && (timestamps[expired] ?? now) <= cutoff) {
      expired++;
    }
    if (expired > 0) {
      timestamps.splice(0, expired);
    }
  }
}
