// backend/services/hypepipe/src/capabilities/handlers/ping.ts
import type { Clock } from "../../../../shared/src/utils/clock";
import { ok, type CapabilityHandler } from "../types";

/** system.ping: open liveness probe through the full gateway pipeline. */
export function pingHandler(clock: Pick<Clock, "now">): CapabilityHandler {
  return async () => ok({ pong: true, service: "hypepipe" }, clock.now().toISOString());
}
