// ---------------------------------------------------------------------------
// Quota routes: inspect, consume and reset per-user usage ceilings.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import { z } from "zod";
import { RequestValidationError } from "../../core/errors.js";
import type { QuotaLimits } from "../../core/types.js";
import type { QuotaTracker } from "../../rate-limit/quota-tracker.js";
import { SAFE_IDENTIFIER_RE } from "../env.js";
import type { AppEnv } from "../env.js";

/** Dependencies required by quota routes. */
export interface QuotaRouteDeps {
  quota: QuotaTracker;
}

const ResetBodySchema = z.object({
  period: z.enum(["daily", "monthly"]),
});

function requireIdentifier(field: string, value: string): string {
  if (!SAFE_IDENTIFIER_RE.test(value)) {
    throw new RequestValidationError(field, "must be 1-64 letters, digits, '-' or '_'");
  }
  return value;
}

/** JSON has no Infinity; unbounded ceilings are reported as `null`. */
function limitsToJson(limits: QuotaLimits): { daily: number | null; monthly: number | null } {
  return {
    daily: Number.isFinite(limits.daily) ? limits.daily : null,
    monthly: Number.isFinite(limits.monthly) ? limits.monthly : null,
  };
}

/**
 * Mounts quota endpoints:
 *
 * - `GET  /quota/:userId`                 -- Usage for every operation.
 * - `GET  /quota/:userId/:operation`      -- Would the next use be allowed?
 * - `POST /quota/:userId/:operation/use`  -- Check, then record one use
 *   (configured operations only).
 * - `POST /quota/reset`                   -- `{ "period": "daily" | "monthly" }`.
 */
export function quotaRoutes(deps: QuotaRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  const { quota } = deps;

  // POST /quota/reset
  app.post("/reset", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (err) {
      throw new RequestValidationError("body", "expected a JSON object", { cause: err });
    }

    const parsed = ResetBodySchema.safeParse(body);
    if (!parsed.success) {
      throw new RequestValidationError("period", 'must be "daily" or "monthly"');
    }

    quota.reset(parsed.data.period);
    c.get("logger")?.info({ period: parsed.data.period }, "quota reset requested");
    return c.json({ reset: parsed.data.period });
  });

  // GET /quota/:userId
  app.get("/:userId", (c) => {
    const userId = requireIdentifier("userId", c.req.param("userId"));
    return c.json({ userId, usage: quota.getUsage(userId) });
  });

  // GET /quota/:userId/:operation
  app.get("/:userId/:operation", (c) => {
    const userId = requireIdentifier("userId", c.req.param("userId"));
    const operation = requireIdentifier("operation", c.req.param("operation"));

    const decision = quota.checkQuota(userId, operation);
    return c.json({
      userId,
      operation,
      allowed: decision.allowed,
      reason: decision.reason,
      limits: limitsToJson(quota.limitsFor(operation)),
    });
  });

  // POST /quota/:userId/:operation/use
  app.post("/:userId/:operation/use", (c) => {
    const userId = requireIdentifier("userId", c.req.param("userId"));
    const operation = requireIdentifier("operation", c.req.param("operation"));

    // Usage is only recorded for configured operations, so the tables stay
    // bounded by the policy file between resets.
    if (!quota.isTracked(operation)) {
      throw new RequestValidationError("operation", "has no configured quota");
    }

    const decision = quota.checkQuota(userId, operation);
    if (!decision.allowed) {
      return c.json(
        { error: `Quota exhausted: ${decision.reason}`, type: "quota_exceeded", reason: decision.reason },
        403,
      );
    }

    quota.useQuota(userId, operation);
    const usage = quota.getUsage(userId);
    return c.json({
      userId,
      operation,
      used: {
        daily: usage.daily[operation] ?? 0,
        monthly: usage.monthly[operation] ?? 0,
      },
    });
  });

  return app;
}
