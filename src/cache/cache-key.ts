// ---------------------------------------------------------------------------
// Deterministic cache keys for memoized calls.
// ---------------------------------------------------------------------------

import { createHash } from "node:crypto";

/** JSON-safe structure every argument is reduced to before hashing. */
type Canonical =
  | null
  | boolean
  | number
  | string
  | Canonical[]
  | { [key: string]: Canonical };

/**
 * Reduce an arbitrary argument to a canonical JSON-safe value.
 *
 * Object keys are sorted at every depth, so `{ a: 1, b: 2 }` and
 * `{ b: 2, a: 1 }` produce the same key. Maps and sets are reduced to sorted
 * entry lists. Raw buffers are encoded as base64 like typed arrays. Any
 * other non-plain object becomes `[ClassName text]`, where the text is its own
 * `toString()` or, failing that, its sorted public fields.
 */
export function canonicalize(value: unknown, seen: WeakSet<object> = new WeakSet()): Canonical {
  if (value === null || value === undefined) return null;

  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      return Number.isFinite(value) ? value : String(value);
    case "bigint":
      return value.toString();
    case "function":
      return `[function ${value.name || "anonymous"}]`;
    case "symbol":
      return value.toString();
    default:
      break;
  }

  if (typeof value !== "object") return String(value);

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString();
  }

  if (ArrayBuffer.isView(value)) {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString("base64");
  }

  if (value instanceof ArrayBuffer || value instanceof SharedArrayBuffer) {
    return Buffer.from(new Uint8Array(value)).toString("base64");
  }

  if (seen.has(value)) return "[Circular]";
  seen.add(value);

  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown) => canonicalize(item, seen));
    }

    if (value instanceof Map) {
      const pairs: Canonical[] = [];
      for (const [k, v] of value) {
        pairs.push([canonicalize(k, seen), canonicalize(v, seen)]);
      }
      return sortByJson(pairs);
    }

    if (value instanceof Set) {
      const items: Canonical[] = [];
      for (const item of value) {
        items.push(canonicalize(item, seen));
      }
      return sortByJson(items);
    }

    const fields = canonicalFields(value, seen);
    if (isPlainObject(value)) return fields;

    // URL, RegExp, Error and friends carry their state behind toString().
    const type = value.constructor?.name || "Object";
    if (value.toString !== Object.prototype.toString) {
      return `[${type} ${String(value)}]`;
    }
    return `[${type} ${JSON.stringify(fields)}]`;
  } finally {
    seen.delete(value);
  }
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Own enumerable fields, keys sorted. */
function canonicalFields(value: object, seen: WeakSet<object>): { [key: string]: Canonical } {
  const entries: [string, unknown][] = Object.entries(value);
  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  const result: { [key: string]: Canonical } = {};
  for (const [key, item] of entries) {
    result[key] = canonicalize(item, seen);
  }
  return result;
}

function sortByJson(items: Canonical[]): Canonical[] {
  return items
    .map((item) => ({ item, json: JSON.stringify(item) }))
    .sort((a, b) => (a.json < b.json ? -1 : a.json > b.json ? 1 : 0))
    .map(({ item }) => item);
}

/**
 * Build the cache key for a call to the function called `name` with `args`.
 *
 * Format: `${prefix}${name}_${sha256(canonical args)}`.
 */
export function deriveCacheKey(
  name: string,
  args: readonly unknown[],
  prefix = "",
): string {
  const payload = JSON.stringify({ args: canonicalize(args) });
  const digest = createHash("sha256").update(payload).digest("hex");
  return `${prefix}${name}_${digest}`;
}
