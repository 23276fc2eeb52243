// ---------------------------------------------------------------------------
// request-shield -- application bootstrap.
//
// Every stateful component is constructed here and handed to its consumers;
// nothing is a module-level singleton, so tests build fresh instances.
// ---------------------------------------------------------------------------

import path from "node:path";
import { fileURLToPath } from "node:url";
import type { Hono } from "hono";
import type pino from "pino";

import type { AppConfig, PolicySet } from "./core/types.js";
import { loadConfig } from "./config/config.js";
import { loadPolicies } from "./config/policy-loader.js";
import { createLogger, loggingConfigFrom } from "./logging/logger.js";
import { CacheStore } from "./cache/cache-store.js";
import { MultiCategoryRateLimiter } from "./rate-limit/multi-category-limiter.js";
import { QuotaTracker } from "./rate-limit/quota-tracker.js";
import { MetricsCollector } from "./metrics/metrics-collector.js";
import { MaintenanceScheduler } from "./orchestrator/maintenance.js";
import { guardedLookup } from "./orchestrator/pipeline.js";
import type { Operation } from "./orchestrator/pipeline.js";
import { createApp } from "./api/server.js";
import type { AppEnv } from "./api/env.js";

/** Default policy file, resolved next to the package root. */
export const DEFAULT_POLICY_FILE = fileURLToPath(
  new URL("../config/policies.yaml", import.meta.url),
);

export interface ShieldRuntime {
  app: Hono<AppEnv>;
  config: AppConfig;
  logger: pino.Logger;
  cache: CacheStore<unknown>;
  limiter: MultiCategoryRateLimiter;
  quota: QuotaTracker;
  metrics: MetricsCollector;
  scheduler: MaintenanceScheduler;
  /**
   * Wrap a remote lookup with the shared cache and the configured retry
   * policy. Cached values are opaque; parse the result at the call site.
   */
  guard<A extends unknown[]>(
    name: string,
    op: Operation<A, unknown>,
    ttlMs?: number,
  ): Operation<A, unknown>;
  shutdown(): Promise<void>;
}

export interface BuildOptions {
  config?: AppConfig;
  policies?: PolicySet;
  logger?: pino.Logger;
  /** Start the maintenance timer (default true). */
  startScheduler?: boolean;
}

// ── Main ───────────────────────────────────────────────────────────────────

export function buildApp(options: BuildOptions = {}): ShieldRuntime {
  // 1. Load configuration
  const config = options.config ?? loadConfig(process.env, DEFAULT_POLICY_FILE);

  // 2. Create logger
  const logger = options.logger ?? createLogger(loggingConfigFrom(config));

  // 3. Load rate-limit and quota policies
  const policies = options.policies ?? loadPolicies(path.resolve(config.policyFile));
  logger.info(
    {
      categories: Object.keys(policies.rateLimits),
      quotaOperations: Object.keys(policies.quotas),
    },
    "policies loaded",
  );

  // 4. Create infrastructure services
  const metrics = new MetricsCollector(config.metrics, logger.child({ module: "metrics" }));

  const cache = new CacheStore<unknown>({
    maxSize: config.cache.maxEntries,
    defaultTtlMs: config.cache.defaultTtlMs,
    logger: logger.child({ module: "cache" }),
    metrics,
  });

  const limiter = new MultiCategoryRateLimiter({
    policies: policies.rateLimits,
    logger: logger.child({ module: "rate-limit" }),
    metrics,
  });

  const quota = new QuotaTracker({
    quotas: policies.quotas,
    logger: logger.child({ module: "quota" }),
    metrics,
  });

  const scheduler = new MaintenanceScheduler(
    { cache, limiter, quota },
    config.maintenance,
    logger.child({ module: "maintenance" }),
  );

  const retryLogger = logger.child({ module: "retry" });

  // 5. Create Hono app
  const app = createApp({ cache, limiter, quota, metricsCollector: metrics, logger });

  if (options.startScheduler ?? true) {
    scheduler.start();
  }

  // 6. Log startup summary
  logger.info(
    {
      port: config.port,
      env: config.env,
      cacheMaxEntries: config.cache.maxEntries,
      retry: config.retry,
    },
    "request-shield ready",
  );

  return {
    app,
    config,
    logger,
    cache,
    limiter,
    quota,
    metrics,
    scheduler,
    guard: <A extends unknown[]>(name: string, op: Operation<A, unknown>, ttlMs?: number) =>
      guardedLookup<A, unknown>(name, op, {
        cache,
        ttlMs,
        retry: { ...config.retry, logger: retryLogger, metrics },
      }),
    shutdown: async () => {
      scheduler.stop();
      metrics.dispose();
      await cache.close();
      logger.info("request-shield stopped");
    },
  };
}
