import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { CacheStore } from "../../../src/cache/cache-store.js";
import {
  CacheNamespace,
  barcodeKey,
  imageDigest,
  photoKey,
  searchKey,
} from "../../../src/cache/cache-namespace.js";

describe("CacheNamespace", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("keeps namespaces sharing a store apart", async () => {
    const store = new CacheStore<string>({ maxSize: 10 });
    const products = new CacheNamespace(store, "product:", 60_000);
    const analyses = new CacheNamespace(store, "analysis:", 60_000);

    await products.set("x", "milk");
    await analyses.set("x", "label");

    expect(await products.get("x")).toBe("milk");
    expect(await analyses.get("x")).toBe("label");
    expect(await store.get("product:x")).toBe("milk");
    expect(store.size).toBe(2);
  });

  it("applies the namespace default TTL", async () => {
    const store = new CacheStore<string>({ maxSize: 10 });
    const ns = new CacheNamespace(store, "search:", 1000);

    await ns.set("q", "results");
    vi.advanceTimersByTime(1000);

    expect(await ns.get("q")).toBeNull();
  });

  it("lets a call override the TTL", async () => {
    const store = new CacheStore<string>({ maxSize: 10 });
    const ns = new CacheNamespace(store, "search:", 1000);

    await ns.set("q", "results", 5000);
    vi.advanceTimersByTime(1000);

    expect(await ns.get("q")).toBe("results");
  });

  it("deletes only its own key", async () => {
    const store = new CacheStore<string>({ maxSize: 10 });
    const ns = new CacheNamespace(store, "a:", 1000);
    await store.set("k", "outside");
    await ns.set("k", "inside");

    expect(await ns.delete("k")).toBe(true);
    expect(await store.get("k")).toBe("outside");
  });
});

describe("key shapes", () => {
  it("trims barcodes", () => {
    expect(barcodeKey(" 0123456789012 ")).toBe("barcode:0123456789012");
  });

  it("normalises search queries for case and padding", () => {
    expect(searchKey("  Apple Pie ")).toBe("search:apple pie");
  });

  it("hashes image bytes to 16 hex characters", () => {
    expect(imageDigest(new Uint8Array())).toBe("e3b0c44298fc1c14");
    expect(photoKey(new Uint8Array())).toBe("photo:e3b0c44298fc1c14");
    expect(imageDigest(new Uint8Array([1]))).not.toBe(imageDigest(new Uint8Array([2])));
  });
});
