// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads from environment variables with sensible defaults, validated by Zod.
// ---------------------------------------------------------------------------

import { z } from "zod";
import { ConfigurationError } from "../core/errors.js";
import type { AppConfig } from "../core/types.js";

const DAY_MS = 86_400_000;

/** `"false"` / `"0"` / `"no"` switch a flag off; anything else leaves it on. */
const flag = z
  .string()
  .optional()
  .transform((v) => v === undefined || !["false", "0", "no"].includes(v.trim().toLowerCase()));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

export const EnvSchema = z.object({
  SHIELD_ENV: z.enum(["development", "staging", "production"]).default("development"),
  SHIELD_PORT: z.coerce.number().int().min(1).max(65_535).default(3000),
  SHIELD_LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  SHIELD_POLICY_FILE: z.string().min(1).optional(),

  CACHE_MAX_ENTRIES: positiveInt(1_000),
  CACHE_DEFAULT_TTL_MS: positiveInt(3_600_000), // 1 hour

  RETRY_MAX_RETRIES: nonNegativeInt(3),
  RETRY_BASE_DELAY_MS: nonNegativeInt(1_000),

  MAINTENANCE_INTERVAL_MS: positiveInt(300_000), // 5 minutes
  QUOTA_DAILY_RESET_INTERVAL_MS: nonNegativeInt(DAY_MS),
  QUOTA_MONTHLY_RESET_INTERVAL_MS: nonNegativeInt(30 * DAY_MS),

  METRICS_ENABLED: flag,
  METRICS_REPORT_INTERVAL_MS: nonNegativeInt(60_000), // 1 minute
});

/**
 * Load the application configuration from environment variables.
 *
 * Every setting has a default so the service can start with zero
 * configuration for local development. Invalid values raise a
 * {@link ConfigurationError} naming each offending variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  defaultPolicyFile = "config/policies.yaml",
): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new ConfigurationError(`Invalid environment: ${issues.join("; ")}`, issues);
  }

  const e = parsed.data;

  return {
    env: e.SHIELD_ENV,
    port: e.SHIELD_PORT,
    logLevel: e.SHIELD_LOG_LEVEL,
    policyFile: e.SHIELD_POLICY_FILE ?? defaultPolicyFile,

    cache: {
      maxEntries: e.CACHE_MAX_ENTRIES,
      defaultTtlMs: e.CACHE_DEFAULT_TTL_MS,
    },

    retry: {
      maxRetries: e.RETRY_MAX_RETRIES,
      baseDelayMs: e.RETRY_BASE_DELAY_MS,
    },

    maintenance: {
      intervalMs: e.MAINTENANCE_INTERVAL_MS,
      dailyResetIntervalMs: e.QUOTA_DAILY_RESET_INTERVAL_MS,
      monthlyResetIntervalMs: e.QUOTA_MONTHLY_RESET_INTERVAL_MS,
    },

    metrics: {
      enabled: e.METRICS_ENABLED,
      reportIntervalMs: e.METRICS_REPORT_INTERVAL_MS,
    },
  };
}
