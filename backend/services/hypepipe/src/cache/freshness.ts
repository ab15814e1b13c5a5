// backend/services/hypepipe/src/cache/freshness.ts

/**
 * Effective max age (seconds) for one request.
 *
 * - `null` → capability is not cacheable (default TTL ≤ 0)
 * - otherwise the caller's `freshness_s` clamped to [0, ttl]; absent → ttl
 *
 * Callers can only ask for fresher data, never staler.
 */
export function effectiveMaxAge(
  defaultTtlS: number,
  freshnessS: number | null | undefined
): number | null {
  if (defaultTtlS <= 0) return null;
  const wanted = freshnessS ?? defaultTtlS;
  if (!Number.isFinite(wanted)) return defaultTtlS;
  return Math.min(Math.max(wanted, 0), defaultTtlS);
}
