import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import {
  DEFAULT_RATE_POLICIES,
  MultiCategoryRateLimiter,
} from "../../../src/rate-limit/multi-category-limiter.js";
import { ConfigurationError } from "../../../src/core/errors.js";

describe("MultiCategoryRateLimiter", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("ships the four default categories", () => {
    const limiter = new MultiCategoryRateLimiter();
    expect(limiter.categories()).toEqual(["general", "search", "image_analysis", "barcode"]);
    expect(DEFAULT_RATE_POLICIES.image_analysis).toEqual({ capacity: 5, windowMs: 60_000 });
  });

  it("exhausting one category leaves the others untouched", () => {
    const limiter = new MultiCategoryRateLimiter();

    for (let i = 0; i < 5; i++) {
      expect(limiter.isAllowed("u1", "image_analysis").allowed).toBe(true);
    }
    expect(limiter.isAllowed("u1", "image_analysis").allowed).toBe(false);

    expect(limiter.isAllowed("u1", "search").allowed).toBe(true);
    expect(limiter.getRemaining("u1", "search")).toBe(19);
  });

  it("checks unknown categories against the general window", () => {
    const limiter = new MultiCategoryRateLimiter({
      policies: {
        general: { capacity: 2, windowMs: 60_000 },
        search: { capacity: 1, windowMs: 60_000 },
      },
    });

    expect(limiter.isAllowed("u1", "export").allowed).toBe(true);
    expect(limiter.isAllowed("u1").allowed).toBe(true);
    expect(limiter.isAllowed("u1", "export").allowed).toBe(false);
    expect(limiter.isAllowed("u1", "search").allowed).toBe(true);
  });

  it("requires a general category", () => {
    expect(
      () =>
        new MultiCategoryRateLimiter({
          policies: { search: { capacity: 1, windowMs: 1000 } },
        }),
    ).toThrow(ConfigurationError);
  });

  it("cleanup reports removed users per category", () => {
    const limiter = new MultiCategoryRateLimiter({
      policies: {
        general: { capacity: 2, windowMs: 1000 },
        search: { capacity: 2, windowMs: 1000 },
      },
    });
    limiter.isAllowed("a", "general");
    limiter.isAllowed("b", "search");
    limiter.isAllowed("c", "search");

    vi.advanceTimersByTime(1000);

    expect(limiter.cleanup()).toEqual({ general: 1, search: 2 });
  });

  it("resetUser clears one category or all of them", () => {
    const limiter = new MultiCategoryRateLimiter({
      policies: {
        general: { capacity: 1, windowMs: 60_000 },
        search: { capacity: 1, windowMs: 60_000 },
      },
    });
    limiter.isAllowed("u1", "general");
    limiter.isAllowed("u1", "search");

    limiter.resetUser("u1", "search");
    expect(limiter.getRemaining("u1", "search")).toBe(1);
    expect(limiter.getRemaining("u1", "general")).toBe(0);

    limiter.resetUser("u1", "nonexistent");
    expect(limiter.getRemaining("u1", "general")).toBe(0);

    limiter.resetUser("u1");
    expect(limiter.getRemaining("u1", "general")).toBe(1);
  });

  it("getStats covers every category", () => {
    const limiter = new MultiCategoryRateLimiter({
      policies: {
        general: { capacity: 3, windowMs: 1000 },
        barcode: { capacity: 2, windowMs: 500 },
      },
    });
    limiter.isAllowed("u1", "barcode");

    expect(limiter.getStats()).toEqual({
      general: { activeUsers: 0, totalRecentRequests: 0, capacity: 3, windowMs: 1000 },
      barcode: { activeUsers: 1, totalRecentRequests: 1, capacity: 2, windowMs: 500 },
    });
  });
});
