// backend/services/hypepipe/src/capabilities/handlers/macro.ts
/**
 * macro.regime / macro.pillars
 *
 * Both views are rebuilt from snapshots on every miss. With no snapshots at
 * all the placeholder view ("—" everywhere) is served as `degraded`.
 */

import type { ISnapshotReader } from "../../../../market/src/snapshots/types";
import { buildPillars } from "../../../../market/src/views/pillars";
import { buildRegime } from "../../../../market/src/views/regime";
import { normalizeSymbol } from "../../../../market/src/views/signals";
import type { Clock } from "../../../../shared/src/utils/clock";
import { degraded, ok, type CapabilityHandler } from "../types";

export function regimeHandler(
  reader: ISnapshotReader,
  clock: Pick<Clock, "now">
): CapabilityHandler {
  return async () => {
    const built = await buildRegime(reader);
    const asof = (built.latestUpdate ?? clock.now()).toISOString();
    const payload = { ...built.view };
    return built.sources === 0
      ? degraded(payload, asof, "no snapshots")
      : ok(payload, asof);
  };
}

export function pillarsHandler(
  reader: ISnapshotReader,
  clock: Pick<Clock, "now">
): CapabilityHandler {
  return async (input) => {
    const built = await buildPillars(reader, normalizeSymbol(input.symbol));
    const asof = (built.latestUpdate ?? clock.now()).toISOString();
    const payload = { ...built.view };
    return built.sources === 0
      ? degraded(payload, asof, "no snapshots")
      : ok(payload, asof);
  };
}
