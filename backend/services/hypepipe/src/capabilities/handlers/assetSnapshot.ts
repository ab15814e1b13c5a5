// backend/services/hypepipe/src/capabilities/handlers/assetSnapshot.ts
import { extractPrice } from "../../../../market/src/snapshots/extract";
import {
  COINGECKO_IDS,
  DatasetKeys,
  type ISnapshotReader,
} from "../../../../market/src/snapshots/types";
import type { Clock } from "../../../../shared/src/utils/clock";
import {
  degraded,
  ok,
  type CapabilityHandler,
  type CapabilityInput,
} from "../types";

function assetOf(input: CapabilityInput): string {
  const raw = input.asset;
  const s =
    typeof raw === "string" || typeof raw === "number"
      ? String(raw).trim().toUpperCase()
      : "";
  return s || "BTC";
}

/** core.asset.snapshot: latest USD price + 24h change; stub when unknown. */
export function assetSnapshotHandler(
  reader: ISnapshotReader,
  clock: Pick<Clock, "now">
): CapabilityHandler {
  return async (input) => {
    const asset = assetOf(input);
    const coinId = Object.prototype.hasOwnProperty.call(COINGECKO_IDS, asset)
      ? COINGECKO_IDS[asset]
      : null;

    const snap = coinId
      ? await reader.getSnapshot(DatasetKeys.price(coinId))
      : null;
    if (!snap) {
      const asof = clock.now().toISOString();
      return degraded({ asset, note: "stub" }, asof, "no snapshot");
    }

    const { price, change24h } = extractPrice(snap.payload);
    const asof = (snap.updatedAt ?? clock.now()).toISOString();
    return ok({ asset, price, change_24h: change24h }, asof);
  };
}
