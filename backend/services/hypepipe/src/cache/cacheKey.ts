// backend/services/hypepipe/src/cache/cacheKey.ts
import { createHash } from "node:crypto";

function isPlainObject(v: unknown): v is Record<string, unknown> {
  if (typeof v !== "object" || v === null || Array.isArray(v)) return false;
  const proto: unknown = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

/**
 * JSON with object keys sorted at every depth; arrays keep their order.
 * Own keys such as `__proto__` stay data keys.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => {
    if (!isPlainObject(v)) return v;
    return Object.fromEntries(Object.keys(v).sort().map((k) => [k, v[k]]));
  });
}

/** SHA-256 hex over canonical `[cap, input]`. */
export function cacheKeyFor(cap: string, input: unknown): string {
  return createHash("sha256")
    .update(canonicalJson([cap, input ?? {}]))
    .digest("hex");
}
