// backend/services/shared/src/utils/clock.ts
import { performance } from "node:perf_hooks";

/**
 * Time source seam. `monotonicMs` is for durations and freshness windows,
 * `now` for wall-clock stamps. Tests inject a fixed or stepped clock.
 */
export interface Clock {
  monotonicMs(): number;
  now(): Date;
}

export const systemClock: Clock = {
  monotonicMs: () => performance.now(),
  now: () => new Date(),
};
