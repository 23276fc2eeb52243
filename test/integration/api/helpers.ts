// ---------------------------------------------------------------------------
// Shared fixtures for the HTTP integration tests.
// ---------------------------------------------------------------------------

import pino from "pino";

import { createApp } from "../../../src/api/server.js";
import type { AppDependencies } from "../../../src/api/server.js";
import { CacheStore } from "../../../src/cache/cache-store.js";
import { MetricsCollector } from "../../../src/metrics/metrics-collector.js";
import { MultiCategoryRateLimiter } from "../../../src/rate-limit/multi-category-limiter.js";
import { QuotaTracker } from "../../../src/rate-limit/quota-tracker.js";

export function makeDeps(overrides: Partial<AppDependencies> = {}): AppDependencies {
  const metrics = new MetricsCollector({ enabled: true, reportIntervalMs: 0 });
  return {
    cache: new CacheStore<unknown>({ maxSize: 4, metrics }),
    limiter: new MultiCategoryRateLimiter({
      policies: {
        general: { capacity: 100, windowMs: 60_000 },
        search: { capacity: 100, windowMs: 60_000 },
      },
      metrics,
    }),
    quota: new QuotaTracker({ quotas: { searches: { daily: 2, monthly: 5 } }, metrics }),
    metricsCollector: metrics,
    logger: pino({ level: "silent" }),
    ...overrides,
  };
}

export function makeApp(overrides: Partial<AppDependencies> = {}) {
  const deps = makeDeps(overrides);
  return { deps, app: createApp(deps) };
}
