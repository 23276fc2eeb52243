// ---------------------------------------------------------------------------
// Rate-limit and quota policy loader.
// Reads a YAML file, validates it with Zod, and returns a typed PolicySet.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { parse } from "yaml";
import { ConfigurationError } from "../core/errors.js";
import { DEFAULT_CATEGORY } from "../core/types.js";
import type { PolicySet } from "../core/types.js";

// ── Zod schemas ─────────────────────────────────────────────────────────────

export const RateWindowPolicySchema = z.object({
  capacity: z.number().int().positive(),
  windowMs: z.number().int().positive(),
});

export const QuotaLimitsSchema = z
  .object({
    daily: z.number().int().nonnegative().optional(),
    monthly: z.number().int().nonnegative().optional(),
  })
  .refine(
    (q) => q.daily === undefined || q.monthly === undefined || q.daily <= q.monthly,
    { message: "daily limit must not exceed monthly limit" },
  );

export const PolicySetSchema = z.object({
  rateLimits: z
    .record(RateWindowPolicySchema)
    .refine((r) => DEFAULT_CATEGORY in r, {
      message: `rateLimits must define the "${DEFAULT_CATEGORY}" category`,
    }),
  quotas: z.record(QuotaLimitsSchema).default({}),
});

// ── Public API ──────────────────────────────────────────────────────────────

/**
 * Validate an already-parsed policy document.
 */
export function parsePolicies(raw: unknown, source = "<inline>"): PolicySet {
  const result = PolicySetSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new ConfigurationError(`Invalid policy file ${source}: ${issues.join("; ")}`, issues);
  }

  return result.data;
}

/**
 * Load and validate the YAML policy file at `file`.
 *
 * A missing file or invalid content is a {@link ConfigurationError}: the
 * service refuses to start with limits it cannot read.
 */
export function loadPolicies(file: string): PolicySet {
  const absolute = path.resolve(file);

  if (!fs.existsSync(absolute)) {
    throw new ConfigurationError(`Policy file does not exist: ${absolute}`);
  }

  let document: unknown;
  try {
    document = parse(fs.readFileSync(absolute, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Policy file ${absolute} is not valid YAML: ${message}`, [], {
      cause: err,
    });
  }

  return parsePolicies(document, absolute);
}
