import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, it, expect, afterEach } from "vitest";

import { loadPolicies, parsePolicies } from "../../../src/config/policy-loader.js";
import { ConfigurationError } from "../../../src/core/errors.js";

const SHIPPED_POLICIES = fileURLToPath(
  new URL("../../../config/policies.yaml", import.meta.url),
);

describe("parsePolicies", () => {
  it("accepts a minimal document and defaults quotas to none", () => {
    expect(parsePolicies({ rateLimits: { general: { capacity: 3, windowMs: 1000 } } })).toEqual({
      rateLimits: { general: { capacity: 3, windowMs: 1000 } },
      quotas: {},
    });
  });

  it("requires a general rate limit", () => {
    expect(() =>
      parsePolicies({ rateLimits: { search: { capacity: 3, windowMs: 1000 } } }),
    ).toThrow('Invalid policy file <inline>: rateLimits: rateLimits must define the "general" category');
  });

  it("rejects a daily ceiling above the monthly one", () => {
    expect(() =>
      parsePolicies({
        rateLimits: { general: { capacity: 3, windowMs: 1000 } },
        quotas: { searches: { daily: 10, monthly: 5 } },
      }),
    ).toThrow("quotas.searches: daily limit must not exceed monthly limit");
  });

  it("rejects non-positive capacities", () => {
    expect(() =>
      parsePolicies({ rateLimits: { general: { capacity: 0, windowMs: 1000 } } }),
    ).toThrow(ConfigurationError);
  });
});

describe("loadPolicies", () => {
  const tempDirs: string[] = [];

  afterEach(() => {
    for (const dir of tempDirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  function writeTemp(content: string): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "shield-policies-"));
    tempDirs.push(dir);
    const file = path.join(dir, "policies.yaml");
    fs.writeFileSync(file, content);
    return file;
  }

  it("loads the shipped policy file", () => {
    const policies = loadPolicies(SHIPPED_POLICIES);

    expect(policies.rateLimits.general).toEqual({ capacity: 30, windowMs: 60_000 });
    expect(policies.rateLimits.image_analysis).toEqual({ capacity: 5, windowMs: 60_000 });
    expect(policies.quotas.searches).toEqual({ daily: 200, monthly: 5000 });
  });

  it("fails for a missing file", () => {
    expect(() => loadPolicies("/nonexistent/policies.yaml")).toThrow(
      "Policy file does not exist: /nonexistent/policies.yaml",
    );
  });

  it("fails for malformed YAML", () => {
    const file = writeTemp("rateLimits: [unclosed\n");
    expect(() => loadPolicies(file)).toThrow(ConfigurationError);
  });

  it("reports the file name when the content is invalid", () => {
    const file = writeTemp("rateLimits:\n  search:\n    capacity: 1\n    windowMs: 1000\n");
    expect(() => loadPolicies(file)).toThrow(`Invalid policy file ${file}`);
  });
});
