// backend/services/hypepipe/src/capabilities/registry.ts
/**
 * Purpose:
 * - Static capability table, built once at process start.
 *
 * Invariants:
 * - No runtime registration; the table is frozen after construction.
 * - `names()` is sorted (used verbatim in unknown-capability replies).
 */

import type { ISnapshotReader } from "../../../market/src/snapshots/types";
import type { FearGreedService } from "../../../market/src/views/fearGreed";
import type { Clock } from "../../../shared/src/utils/clock";
import { assetSnapshotHandler } from "./handlers/assetSnapshot";
import { fearGreedHandler } from "./handlers/fearGreed";
import { pillarsHandler, regimeHandler } from "./handlers/macro";
import { pingHandler } from "./handlers/ping";
import type { CapabilityEntry, ICapabilityRegistry } from "./types";

export type CapabilityDeps = {
  snapshots: ISnapshotReader;
  fearGreed: Pick<FearGreedService, "get">;
  clock: Pick<Clock, "now">;
};

export class StaticCapabilityRegistry implements ICapabilityRegistry {
  private readonly byName: ReadonlyMap<string, CapabilityEntry>;

  constructor(entries: ReadonlyArray<CapabilityEntry>) {
    const m = new Map<string, CapabilityEntry>();
    for (const e of entries) {
      if (m.has(e.name)) throw new Error(`duplicate capability: ${e.name}`);
      m.set(e.name, Object.freeze({ ...e }));
    }
    this.byName = m;
  }

  public resolve(cap: string): CapabilityEntry | null {
    return this.byName.get(cap) ?? null;
  }

  public names(): string[] {
    return [...this.byName.keys()].sort();
  }
}

export function createCapabilityRegistry(
  deps: CapabilityDeps
): ICapabilityRegistry {
  const { snapshots, clock } = deps;
  return new StaticCapabilityRegistry([
    {
      name: "core.asset.snapshot",
      handler: assetSnapshotHandler(snapshots, clock),
      defaultTtlS: 30,
    },
    { name: "macro.regime", handler: regimeHandler(snapshots, clock), defaultTtlS: 60 },
    { name: "macro.pillars", handler: pillarsHandler(snapshots, clock), defaultTtlS: 60 },
    {
      name: "sentiment.fear_greed",
      handler: fearGreedHandler(deps.fearGreed, clock),
      defaultTtlS: 300,
    },
    { name: "system.ping", handler: pingHandler(clock), defaultTtlS: 0 },
  ]);
}
