// backend/services/hypepipe/src/capabilities/handlers/fearGreed.ts
import type { FearGreedService } from "../../../../market/src/views/fearGreed";
import type { Clock } from "../../../../shared/src/utils/clock";
import { degraded, ok, type CapabilityHandler } from "../types";

/** sentiment.fear_greed: current value/label + 7-point history. */
export function fearGreedHandler(
  service: Pick<FearGreedService, "get">,
  clock: Pick<Clock, "now">
): CapabilityHandler {
  return async () => {
    const res = await service.get();
    if (res === null) {
      return degraded(
        { current: null, history: [], note: "unavailable" },
        clock.now().toISOString(),
        "provider and snapshot unavailable"
      );
    }
    const payload = { ...res.view, origin: res.origin };
    return res.origin === "stale"
      ? degraded(payload, res.asof, "stale snapshot")
      : ok(payload, res.asof);
  };
}
