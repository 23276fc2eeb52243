// ---------------------------------------------------------------------------
// Public entry point for library consumers.
// ---------------------------------------------------------------------------

export * from "./core/types.js";
export * from "./core/errors.js";

export { CacheStore } from "./cache/cache-store.js";
export type { CacheStoreOptions } from "./cache/cache-store.js";
export { canonicalize, deriveCacheKey } from "./cache/cache-key.js";
export { memoize } from "./cache/memoize.js";
export type { MemoizeOptions } from "./cache/memoize.js";
export {
  CacheNamespace,
  barcodeKey,
  searchKey,
  imageDigest,
  photoKey,
} from "./cache/cache-namespace.js";

export { RateWindow } from "./rate-limit/rate-window.js";
export type { RateWindowOptions } from "./rate-limit/rate-window.js";
export {
  MultiCategoryRateLimiter,
  DEFAULT_RATE_POLICIES,
} from "./rate-limit/multi-category-limiter.js";
export type { MultiCategoryRateLimiterOptions } from "./rate-limit/multi-category-limiter.js";
export { QuotaTracker, DEFAULT_QUOTAS } from "./rate-limit/quota-tracker.js";
export type { QuotaTrackerOptions } from "./rate-limit/quota-tracker.js";
export { formatWaitTime } from "./rate-limit/wait-time.js";

export { withRetry, retrying, computeDelay } from "./orchestrator/retry.js";
export type { RetryOptions, RetryAttemptInfo } from "./orchestrator/retry.js";
export {
  pipeline,
  retryStage,
  memoizeStage,
  guardedLookup,
} from "./orchestrator/pipeline.js";
export type {
  Operation,
  OperationStage,
  GuardedLookupOptions,
} from "./orchestrator/pipeline.js";
export { MaintenanceScheduler } from "./orchestrator/maintenance.js";
export type { MaintenanceReport, MaintenanceTargets } from "./orchestrator/maintenance.js";

export { MetricsCollector } from "./metrics/metrics-collector.js";
export type { MetricsSnapshot } from "./metrics/metrics-collector.js";

export { loadConfig } from "./config/config.js";
export { loadPolicies, parsePolicies } from "./config/policy-loader.js";
export { createLogger, loggingConfigFrom } from "./logging/logger.js";
export type { Logger } from "./logging/logger.js";

export { createApp } from "./api/server.js";
export type { AppDependencies } from "./api/server.js";
export { buildApp, DEFAULT_POLICY_FILE } from "./app.js";
export type { BuildOptions, ShieldRuntime } from "./app.js";
