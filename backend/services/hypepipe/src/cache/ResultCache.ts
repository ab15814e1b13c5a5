// backend/services/hypepipe/src/cache/ResultCache.ts
/**
 * Purpose:
 * - In-process result cache keyed by cacheKeyFor(cap, input).
 *
 * Invariants:
 * - Entries are frozen and replaced wholesale on put; never mutated.
 * - No background sweeper. Staleness is decided per read against the
 *   caller's effective max age.
 * - get/put are synchronous, so no interleaving inside one operation.
 */

import type { Clock } from "../../../shared/src/utils/clock";
import type { CapabilityPayload } from "../capabilities/types";

export type CacheEntry = Readonly<{
  payload: Readonly<CapabilityPayload>;
  asof: string;
  /** Monotonic ms at capture. */
  capturedAt: number;
}>;

export class ResultCache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(private readonly clock: Pick<Clock, "monotonicMs">) {}

  /** Entry if captured within `maxAgeS` seconds, else null. */
  public get(key: string, maxAgeS: number): CacheEntry | null {
    const e = this.entries.get(key);
    if (!e) return null;
    const ageMs = this.clock.monotonicMs() - e.capturedAt;
    return ageMs <= maxAgeS * 1000 ? e : null;
  }

  public put(key: string, payload: CapabilityPayload, asof: string): CacheEntry {
    const entry: CacheEntry = Object.freeze({
      payload: Object.freeze({ ...payload }),
      asof,
      capturedAt: this.clock.monotonicMs(),
    });
    this.entries.set(key, entry);
    return entry;
  }

  public clear(): void {
    this.entries.clear();
  }

  public size(): number {
    return this.entries.size;
  }
}
