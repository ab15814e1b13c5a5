// backend/services/market/src/snapshots/extract.ts
/**
 * Extractors matched to the payload shapes the collectors store.
 * Every field is optional on the wire; anything missing comes back null.
 */

import { asArray, asRecord, num } from "./values";

export type PriceSignal = { price: number | null; change24h: number | null };

export type GlobalSignal = {
  btcDominance: number | null;
  ethDominance: number | null;
  totalMcapUsd: number | null;
  totalVolUsd: number | null;
  mcapChange24h: number | null;
};

export type OpenInterestSignal = {
  oiUsd: number | null;
  oiChange24h: number | null;
};

export type LiquidationSignal = {
  totalUsd: number | null;
  longUsd: number | null;
  shortUsd: number | null;
  longPct: number | null;
  shortPct: number | null;
};

/** coingecko:price_simple:usd:{coin} → {"data": {"price", "change_24h"}} */
export function extractPrice(payload: unknown): PriceSignal {
  const data = asRecord(asRecord(payload).data);
  return { price: num(data.price), change24h: num(data.change_24h) };
}

/** coingecko:global */
export function extractGlobal(payload: unknown): GlobalSignal {
  const data = asRecord(asRecord(payload).data);
  return {
    btcDominance: num(data.btc_dominance),
    ethDominance: num(data.eth_dominance),
    totalMcapUsd: num(data.total_market_cap_usd),
    totalVolUsd: num(data.total_volume_usd),
    mcapChange24h: num(data.market_cap_change_24h_pct),
  };
}

/**
 * coinglass:oi_weighted_funding:{SYM} → {"data": {"rate": 0.001178}}
 * The rate is a fraction; returned as a percentage (0.1178).
 */
export function extractFundingPct(payload: unknown): number | null {
  const rate = num(asRecord(asRecord(payload).data).rate);
  return rate === null ? null : rate * 100;
}

/** coinglass:open_interest:{SYM} */
export function extractOpenInterest(payload: unknown): OpenInterestSignal {
  const data = asRecord(asRecord(payload).data);
  return { oiUsd: num(data.oi_usd), oiChange24h: num(data.oi_change_24h) };
}

const NO_LIQUIDATIONS: LiquidationSignal = {
  totalUsd: null,
  longUsd: null,
  shortUsd: null,
  longPct: null,
  shortPct: null,
};

/**
 * coinglass:liquidations:{SYM} → {"raw": [{"exchange": "All", ...}, ...]}
 * The "All" row carries the totals; otherwise the first row is used.
 */
export function extractLiquidations(payload: unknown): LiquidationSignal {
  const raw = asArray(asRecord(payload).raw);
  const allRow =
    raw.find((r) => asRecord(r).exchange === "All") ?? raw[0] ?? null;
  if (allRow === null) return NO_LIQUIDATIONS;

  const row = asRecord(allRow);
  const totalUsd = num(row.liquidation_usd);
  const longUsd = num(row.longLiquidation_usd);
  const shortUsd = num(row.shortLiquidation_usd);

  return {
    totalUsd,
    longUsd,
    shortUsd,
    longPct: totalUsd && longUsd !== null ? (longUsd / totalUsd) * 100 : null,
    shortPct:
      totalUsd && shortUsd !== null ? (shortUsd / totalUsd) * 100 : null,
  };
}

/** altme:fear_greed → first row's value + classification. */
export function extractFearGreed(payload: unknown): {
  value: number | null;
  label: string | null;
} {
  const first = asArray(asRecord(payload).data)[0];
  if (first === undefined) return { value: null, label: null };
  const row = asRecord(first);
  const value = num(row.value);
  const label = row.value_classification;
  return {
    value: value === null ? null : Math.trunc(value),
    label: typeof label === "string" ? label : null,
  };
}
