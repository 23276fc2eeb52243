// ---------------------------------------------------------------------------
// Prefix-scoped views over a shared CacheStore.
// ---------------------------------------------------------------------------

import { createHash } from "node:crypto";
import type pino from "pino";
import type { CacheStore } from "./cache-store.js";

/**
 * A slice of a shared `CacheStore` whose keys all start with `prefix`.
 *
 * Lets several callers (product lookups, search results, image analyses)
 * share one bounded store without colliding, each with its own default TTL.
 */
export class CacheNamespace<T> {
  constructor(
    private readonly store: CacheStore<T>,
    readonly prefix: string,
    readonly defaultTtlMs: number,
    private readonly logger?: pino.Logger,
  ) {}

  keyFor(subKey: string): string {
    return `${this.prefix}${subKey}`;
  }

  get(subKey: string): Promise<T | null> {
    return this.store.get(this.keyFor(subKey));
  }

  async set(subKey: string, value: T, ttlMs: number = this.defaultTtlMs): Promise<void> {
    await this.store.set(this.keyFor(subKey), value, ttlMs);
    this.logger?.debug({ namespace: this.prefix, subKey }, "namespace entry stored");
  }

  delete(subKey: string): Promise<boolean> {
    return this.store.delete(this.keyFor(subKey));
  }
}

// ── Key shapes ─────────────────────────────────────────────────────────────

export function barcodeKey(barcode: string): string {
  return `barcode:${barcode.trim()}`;
}

/** Search keys ignore letter case. */
export function searchKey(query: string): string {
  return `search:${query.trim().toLowerCase()}`;
}

/** First 16 hex characters of the SHA-256 of the image bytes. */
export function imageDigest(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex").slice(0, 16);
}

export function photoKey(bytes: Uint8Array): string {
  return `photo:${imageDigest(bytes)}`;
}
