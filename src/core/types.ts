// ---------------------------------------------------------------------------
// Core types for the request-shield resilience layer.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Identifiers ─────────────────────────────────────────────────────────────

/** Caller identity as handed over by the dispatch layer (chat id, account id). */
export type UserId = string | number;

/** Name of a rate-limit category such as `"search"` or `"image_analysis"`. */
export type RateCategory = string;

/** Name of a quota-gated operation such as `"searches"` or `"barcode_scans"`. */
export type QuotaOperation = string;

export const DEFAULT_CATEGORY = "general";

// ── Rate limiting ───────────────────────────────────────────────────────────

/**
 * Outcome of a sliding-window admission check.
 * A denial carries the whole seconds until a slot frees up.
 */
export type RateDecision =
  | { allowed: true; retryAfterSeconds: null }
  | { allowed: false; retryAfterSeconds: number };

export interface RateWindowPolicy {
  /** Admissions permitted inside any trailing window. */
  capacity: number;
  /** Window length in milliseconds. */
  windowMs: number;
}

export interface RateWindowStats {
  activeUsers: number;
  totalRecentRequests: number;
  capacity: number;
  windowMs: number;
}

// ── Quotas ──────────────────────────────────────────────────────────────────

export interface QuotaLimits {
  daily: number;
  monthly: number;
}

export interface QuotaDecision {
  allowed: boolean;
  reason: string;
}

export interface QuotaUsage {
  daily: Record<QuotaOperation, number>;
  monthly: Record<QuotaOperation, number>;
}

export type QuotaPeriod = "daily" | "monthly";

// ── Policies (loaded from YAML) ─────────────────────────────────────────────

export interface PolicySet {
  rateLimits: Record<RateCategory, RateWindowPolicy>;
  quotas: Record<QuotaOperation, Partial<QuotaLimits>>;
}

// ── Cache ───────────────────────────────────────────────────────────────────

export type CacheLookup<T> = { hit: true; value: T } | { hit: false };

export interface CacheStats {
  totalEntries: number;
  expiredEntries: number;
  activeEntries: number;
  maxSize: number;
  usagePercentage: number;
}

// ── Config types ────────────────────────────────────────────────────────────

export interface AppConfig {
  env: "development" | "staging" | "production";
  port: number;
  logLevel: string;
  policyFile: string;
  cache: CacheConfig;
  retry: RetryConfig;
  maintenance: MaintenanceConfig;
  metrics: MetricsConfig;
}

export interface CacheConfig {
  maxEntries: number;
  defaultTtlMs: number;
}

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
}

export interface MaintenanceConfig {
  intervalMs: number;
  dailyResetIntervalMs: number;
  monthlyResetIntervalMs: number;
}

export interface MetricsConfig {
  enabled: boolean;
  reportIntervalMs: number;
}

export interface LoggingConfig {
  level: string;
  env: AppConfig["env"];
  prettyPrint: boolean;
  redactSecrets: boolean;
}
