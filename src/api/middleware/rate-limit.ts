// ---------------------------------------------------------------------------
// Per-user, per-category rate-limiting middleware for Hono.
// ---------------------------------------------------------------------------

import type { Context, Next } from "hono";
import { DEFAULT_CATEGORY } from "../../core/types.js";
import type { RateCategory } from "../../core/types.js";
import type { MultiCategoryRateLimiter } from "../../rate-limit/multi-category-limiter.js";
import { formatWaitTime } from "../../rate-limit/wait-time.js";
import { SAFE_IDENTIFIER_RE } from "../env.js";
import type { AppEnv } from "../env.js";

export const ANONYMOUS_USER = "anonymous";

export interface RateLimitMiddlewareOptions {
  limiter: MultiCategoryRateLimiter;
  /** When false every request passes straight through. */
  enabled?: boolean;
  /** Picks the category for a request. Defaults to the `X-Operation` header. */
  resolveCategory?: (c: Context<AppEnv>) => RateCategory;
  /** Picks the caller. Defaults to the `X-User-ID` header. */
  resolveUser?: (c: Context<AppEnv>) => string;
}

/**
 * Creates a Hono middleware that checks every request against the
 * sliding window of its category before it reaches a route.
 *
 * A denied request is answered with `429 Too Many Requests`, a `Retry-After`
 * header in seconds, and the same wait rendered for humans in `waitTime`.
 */
export function rateLimitMiddleware(
  options: RateLimitMiddlewareOptions,
): (c: Context<AppEnv>, next: Next) => Promise<Response | void> {
  const {
    limiter,
    enabled = true,
    resolveCategory = categoryFromHeader,
    resolveUser = userFromHeader,
  } = options;

  return async (c: Context<AppEnv>, next: Next): Promise<Response | void> => {
    const userId = resolveUser(c);
    c.set("userId", userId);

    if (!enabled) {
      await next();
      return;
    }

    // Unknown categories resolve to the general window; report that one.
    const window = limiter.windowFor(resolveCategory(c));
    const category = window.category;
    const decision = window.isAllowed(userId);

    if (!decision.allowed) {
      const { retryAfterSeconds } = decision;
      const waitTime = formatWaitTime(retryAfterSeconds);

      c.header("Retry-After", String(retryAfterSeconds));
      return c.json(
        {
          error: `Too many requests. Try again in ${waitTime}.`,
          type: "rate_limit_exceeded",
          category,
          retryAfterSeconds,
          waitTime,
        },
        429,
      );
    }

    await next();
  };
}

// ── Helpers ────────────────────────────────────────────────────────────────

/**
 * SECURITY: the header is caller-controlled. That is acceptable behind a
 * gateway that authenticates and overwrites it; anything that does not look
 * like a plain identifier lands in the shared anonymous bucket.
 */
function userFromHeader(c: Context<AppEnv>): string {
  const raw = c.req.header("x-user-id")?.trim();
  return raw && SAFE_IDENTIFIER_RE.test(raw) ? raw : ANONYMOUS_USER;
}

function categoryFromHeader(c: Context<AppEnv>): RateCategory {
  const raw = c.req.header("x-operation")?.trim();
  return raw && SAFE_IDENTIFIER_RE.test(raw) ? raw : DEFAULT_CATEGORY;
}
