// ---------------------------------------------------------------------------
// Hono application factory.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type pino from "pino";
import type { CacheStore } from "../cache/cache-store.js";
import type { MetricsCollector } from "../metrics/metrics-collector.js";
import type { MultiCategoryRateLimiter } from "../rate-limit/multi-category-limiter.js";
import type { QuotaTracker } from "../rate-limit/quota-tracker.js";
import type { AppEnv } from "./env.js";

import { requestIdMiddleware } from "./middleware/request-id.js";
import { createRequestLogger } from "../logging/context.js";
import { rateLimitMiddleware } from "./middleware/rate-limit.js";
import type { RateLimitMiddlewareOptions } from "./middleware/rate-limit.js";
import { errorHandler } from "./middleware/error-handler.js";

import { healthRoutes } from "./routes/health.js";
import { quotaRoutes } from "./routes/quota.js";

// ── Dependency bundle ──────────────────────────────────────────────────────

export interface AppDependencies {
  cache: CacheStore<unknown>;
  limiter: MultiCategoryRateLimiter;
  quota: QuotaTracker;
  metricsCollector: MetricsCollector;
  logger: pino.Logger;
  rateLimit?: Omit<RateLimitMiddlewareOptions, "limiter">;
}

// ── App factory ────────────────────────────────────────────────────────────

/**
 * Create and configure the Hono application.
 *
 * Middleware stack (applied in order):
 * 1. Request ID generation (`X-Request-ID`).
 * 2. Request-scoped child logger attached to context.
 * 3. Per-user, per-category rate limiting.
 * 4. Route handlers.
 * 5. Global error handler.
 */
export function createApp(deps: AppDependencies): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // ── Global middleware ──────────────────────────────────────────────────

  app.use("*", requestIdMiddleware());
  app.use("*", createRequestLogger(deps.logger));
  app.use("*", rateLimitMiddleware({ ...deps.rateLimit, limiter: deps.limiter }));

  // ── Routes ────────────────────────────────────────────────────────────

  app.get("/", (c) =>
    c.json({
      service: "request-shield",
      routes: ["/health", "/health/stats", "/quota"],
      categories: deps.limiter.categories(),
    }),
  );

  app.route(
    "/health",
    healthRoutes({
      cache: deps.cache,
      limiter: deps.limiter,
      metricsCollector: deps.metricsCollector,
    }),
  );

  app.route("/quota", quotaRoutes({ quota: deps.quota }));

  // ── Error handler ─────────────────────────────────────────────────────

  app.onError(errorHandler);

  return app;
}
