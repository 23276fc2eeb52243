// ---------------------------------------------------------------------------
// Health check routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { CacheStore } from "../../cache/cache-store.js";
import type { MetricsCollector } from "../../metrics/metrics-collector.js";
import type { MultiCategoryRateLimiter } from "../../rate-limit/multi-category-limiter.js";
import type { AppEnv } from "../env.js";

/** Dependencies required by health routes. */
export interface HealthRouteDeps {
  cache: CacheStore<unknown>;
  limiter: MultiCategoryRateLimiter;
  metricsCollector: MetricsCollector;
}

const startedAt = Date.now();

/**
 * Mounts health-check endpoints:
 *
 * - `GET /health`       -- Basic liveness probe.
 * - `GET /health/stats` -- Cache occupancy, per-category limiter load, counters.
 */
export function healthRoutes(deps: HealthRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // GET /health
  app.get("/", (c) => {
    const uptimeMs = Date.now() - startedAt;
    return c.json({
      status: "ok",
      uptime: uptimeMs,
      timestamp: new Date().toISOString(),
    });
  });

  // GET /health/stats
  app.get("/stats", async (c) => {
    const cache = await deps.cache.getStats();
    return c.json({
      cache,
      rateLimits: deps.limiter.getStats(),
      metrics: deps.metricsCollector.toJSON(),
    });
  });

  return app;
}
