// ---------------------------------------------------------------------------
// Integration tests for the /health routes.
// ---------------------------------------------------------------------------

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { makeApp } from "./helpers.js";

describe("GET /health", () => {
  it("returns 200 with status ok, uptime, and timestamp", async () => {
    const { app } = makeApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toContain("application/json");
    expect(await res.json()).toEqual({
      status: "ok",
      uptime: expect.any(Number),
      timestamp: expect.any(String),
    });
  });
});

describe("GET /health/stats", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-05-04T10:00:00.000Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("reports cache occupancy and per-category limiter load", async () => {
    const { app, deps } = makeApp();
    await deps.cache.set("a", 1, 100);
    await deps.cache.set("b", 2);
    vi.advanceTimersByTime(100);

    const res = await app.request("/health/stats", { headers: { "X-User-ID": "u1" } });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      cache: {
        totalEntries: 2,
        expiredEntries: 1,
        activeEntries: 1,
        maxSize: 4,
        usagePercentage: 50,
      },
      rateLimits: {
        general: { activeUsers: 1, totalRecentRequests: 1, capacity: 100, windowMs: 60_000 },
        search: { activeUsers: 0, totalRecentRequests: 0, capacity: 100, windowMs: 60_000 },
      },
      metrics: {
        cache: { hits: 0, misses: 0, sets: 2, evictions: 0, expirations: 0 },
        rateLimit: { general: { allowed: 1, denied: 0 } },
        quota: {},
        retry: { attempts: 0, retries: 0, exhausted: 0 },
        collectedAt: "2026-05-04T10:00:00.100Z",
      },
    });
  });
});

describe("GET /", () => {
  it("lists routes and rate-limit categories", async () => {
    const { app } = makeApp();
    const res = await app.request("/");

    expect(await res.json()).toEqual({
      service: "request-shield",
      routes: ["/health", "/health/stats", "/quota"],
      categories: ["general", "search"],
    });
  });
});

describe("X-Request-ID", () => {
  it("echoes a well-formed incoming id", async () => {
    const { app } = makeApp();
    const res = await app.request("/health", { headers: { "X-Request-ID": "trace-123" } });
    expect(res.headers.get("x-request-id")).toBe("trace-123");
  });

  it("replaces a malformed id with a generated UUID", async () => {
    const { app } = makeApp();
    const res = await app.request("/health", { headers: { "X-Request-ID": "bad id!" } });
    expect(res.headers.get("x-request-id")).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
  });
});
