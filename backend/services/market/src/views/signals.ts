// backend/services/market/src/views/signals.ts
/**
 * Purpose:
 * - Fetch the per-symbol snapshot set both interpretive views use, extract
 *   the scalar signals, and remember the freshest `updated_at` seen.
 */

import {
  extractFearGreed,
  extractFundingPct,
  extractGlobal,
  extractLiquidations,
  extractOpenInterest,
  extractPrice,
  type GlobalSignal,
  type LiquidationSignal,
  type OpenInterestSignal,
  type PriceSignal,
} from "../snapshots/extract";
import {
  COINGECKO_IDS,
  DatasetKeys,
  type ISnapshotReader,
  type Snapshot,
} from "../snapshots/types";

export type SupportedSymbol = "BTC" | "ETH";

export type MarketSignals = {
  symbol: SupportedSymbol;
  price: PriceSignal;
  fundingPct: number | null;
  openInterest: OpenInterestSignal;
  liquidations: LiquidationSignal;
  global: GlobalSignal;
  fearGreed: { value: number | null; label: string | null };
  /** Number of snapshots found (0 → everything below is null). */
  found: number;
  /** Newest updated_at across the snapshots found. */
  latestUpdate: Date | null;
};

/** Unknown or missing symbols fall back to BTC. */
export function normalizeSymbol(raw: unknown): SupportedSymbol {
  const s = typeof raw === "string" ? raw.trim().toUpperCase() : "";
  return s === "ETH" ? "ETH" : "BTC";
}

export async function readMarketSignals(
  reader: ISnapshotReader,
  symbol: SupportedSymbol,
  opts: { includeGlobal?: boolean } = {}
): Promise<MarketSignals> {
  const coinId = COINGECKO_IDS[symbol];
  const [price, funding, oi, liq, glob, fg] = await Promise.all([
    reader.getSnapshot(DatasetKeys.price(coinId)),
    reader.getSnapshot(DatasetKeys.funding(symbol)),
    reader.getSnapshot(DatasetKeys.openInterest(symbol)),
    reader.getSnapshot(DatasetKeys.liquidations(symbol)),
    opts.includeGlobal === false
      ? Promise.resolve(null)
      : reader.getSnapshot(DatasetKeys.global),
    reader.getSnapshot(DatasetKeys.fearGreed),
  ]);

  const present = [price, funding, oi, liq, glob, fg].filter(
    (s): s is Snapshot => s !== null
  );
  const latestUpdate = present.reduce<Date | null>((acc, s) => {
    if (!s.updatedAt) return acc;
    return acc === null || s.updatedAt > acc ? s.updatedAt : acc;
  }, null);

  return {
    symbol,
    price: extractPrice(price?.payload),
    fundingPct: funding ? extractFundingPct(funding.payload) : null,
    openInterest: extractOpenInterest(oi?.payload),
    liquidations: extractLiquidations(liq?.payload),
    global: extractGlobal(glob?.payload),
    fearGreed: extractFearGreed(fg?.payload),
    found: present.length,
    latestUpdate,
  };
}
