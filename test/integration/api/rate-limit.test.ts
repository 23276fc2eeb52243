// ---------------------------------------------------------------------------
// Integration tests for the rate-limit middleware.
// ---------------------------------------------------------------------------

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { MultiCategoryRateLimiter } from "../../../src/rate-limit/multi-category-limiter.js";
import { makeApp } from "./helpers.js";

function tightLimiter(): MultiCategoryRateLimiter {
  return new MultiCategoryRateLimiter({
    policies: {
      general: { capacity: 2, windowMs: 60_000 },
      search: { capacity: 1, windowMs: 60_000 },
    },
  });
}

describe("rate-limit middleware", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-05-04T10:00:00.000Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("answers 429 with Retry-After once a user's window is full", async () => {
    const { app } = makeApp({ limiter: tightLimiter() });
    const headers = { "X-User-ID": "u1" };

    expect((await app.request("/health", { headers })).status).toBe(200);
    expect((await app.request("/health", { headers })).status).toBe(200);

    const res = await app.request("/health", { headers });

    expect(res.status).toBe(429);
    expect(res.headers.get("retry-after")).toBe("61");
    expect(await res.json()).toEqual({
      error: "Too many requests. Try again in 1 min 1 s.",
      type: "rate_limit_exceeded",
      category: "general",
      retryAfterSeconds: 61,
      waitTime: "1 min 1 s",
    });
  });

  it("admits the user again after the window has passed", async () => {
    const { app } = makeApp({ limiter: tightLimiter() });
    const headers = { "X-User-ID": "u1" };
    await app.request("/health", { headers });
    await app.request("/health", { headers });

    vi.advanceTimersByTime(60_000);

    expect((await app.request("/health", { headers })).status).toBe(200);
  });

  it("keeps users and categories apart", async () => {
    const { app } = makeApp({ limiter: tightLimiter() });
    const search = { "X-User-ID": "u1", "X-Operation": "search" };

    expect((await app.request("/health", { headers: search })).status).toBe(200);
    expect((await app.request("/health", { headers: search })).status).toBe(429);

    expect((await app.request("/health", { headers: { "X-User-ID": "u1" } })).status).toBe(200);
    expect(
      (await app.request("/health", { headers: { "X-User-ID": "u2", "X-Operation": "search" } })).status,
    ).toBe(200);
  });

  it("reports the general category when the requested one is unknown", async () => {
    const { app } = makeApp({ limiter: tightLimiter() });
    const headers = { "X-User-ID": "u1", "X-Operation": "export" };
    await app.request("/health", { headers });
    await app.request("/health", { headers });

    const res = await app.request("/health", { headers });

    expect(res.status).toBe(429);
    expect(await res.json()).toEqual({
      error: "Too many requests. Try again in 1 min 1 s.",
      type: "rate_limit_exceeded",
      category: "general",
      retryAfterSeconds: 61,
      waitTime: "1 min 1 s",
    });
  });

  it("puts callers without a usable user id in one anonymous bucket", async () => {
    const limiter = tightLimiter();
    const { app } = makeApp({ limiter });

    await app.request("/health");
    await app.request("/health", { headers: { "X-User-ID": "not a plain id" } });

    expect(limiter.getRemaining("anonymous")).toBe(0);
    expect((await app.request("/health")).status).toBe(429);
  });

  it("lets everything through when disabled", async () => {
    const { app } = makeApp({ limiter: tightLimiter(), rateLimit: { enabled: false } });

    for (let i = 0; i < 5; i++) {
      expect((await app.request("/health", { headers: { "X-User-ID": "u1" } })).status).toBe(200);
    }
  });

  it("uses custom resolvers", async () => {
    const limiter = tightLimiter();
    const { app } = makeApp({
      limiter,
      rateLimit: {
        resolveUser: () => "fixed-user",
        resolveCategory: () => "search",
      },
    });

    await app.request("/health");

    expect(limiter.getRemaining("fixed-user", "search")).toBe(0);
    expect(limiter.getRemaining("fixed-user", "general")).toBe(2);
  });
});
