// backend/services/market/src/views/regime.ts
/**
 * Regime classifier: heuristic buckets from live BTC snapshots.
 *
 * Output is an explainable label, four axes and three drivers. Only buckets
 * are exposed, never the thresholds behind them.
 */

import { DASH, fmtPct, fmtUsd } from "../snapshots/format";
import type { ISnapshotReader } from "../snapshots/types";
import { readMarketSignals } from "./signals";

export type RegimeLabel = "Risk-Off" | "Trend" | "Risk-On" | "Chop";
export type Confidence = "high" | "medium" | "low";

type TrendBucket = "up" | "down" | "flat";
type VolBucket = "calm" | "chop" | "shock";
type LevBucket = "low" | "neutral" | "high";
type LiqBucket = "loose" | "normal" | "tight";

export type RegimeAxis = { key: string; label: string; value: string };

export type RegimeView = {
  version: string;
  regime: { label: RegimeLabel; confidence: Confidence; since: null };
  axes: RegimeAxis[];
  drivers: string[];
  disclaimer: string;
};

export type RegimeBuild = {
  view: RegimeView;
  /** Snapshots found; 0 means every axis is a placeholder. */
  sources: number;
  latestUpdate: Date | null;
};

export const REGIME_VERSION = "v0.2-live";

export function bucket<L extends string>(
  x: number | null,
  lo: number,
  hi: number,
  labels: readonly [L, L, L]
): L {
  if (x === null) return labels[1];
  if (x <= lo) return labels[0];
  if (x >= hi) return labels[2];
  return labels[1];
}

function confidence(partsOk: number): Confidence {
  if (partsOk >= 4) return "high";
  if (partsOk >= 2) return "medium";
  return "low";
}

function extremeFear(fg: number | null): boolean {
  return fg !== null && fg <= 25;
}

export function regimeLabel(
  trend: TrendBucket,
  vol: VolBucket,
  lev: LevBucket,
  liq: LiqBucket,
  fg: number | null
): RegimeLabel {
  if (trend === "down" && (lev === "high" || liq === "tight" || extremeFear(fg)))
    return "Risk-Off";
  if (trend !== "flat" && vol !== "chop") return "Trend";
  if (trend === "up" && lev !== "high" && !extremeFear(fg)) return "Risk-On";
  return "Chop";
}

function trendOf(chg24: number | null): { bucket: TrendBucket; label: string } {
  if (chg24 === null) return { bucket: "flat", label: DASH };
  if (chg24 >= 1.0) return { bucket: "up", label: "Up" };
  if (chg24 <= -1.0) return { bucket: "down", label: "Down" };
  return { bucket: "flat", label: "Flat" };
}

function liquidityOf(longPct: number | null): LiqBucket {
  if (longPct === null) return "normal";
  if (longPct >= 70) return "tight";
  if (longPct <= 40) return "loose";
  return "normal";
}

const VOL_LABEL: Record<VolBucket, string> = {
  calm: "Calm",
  chop: "Chop",
  shock: "Shock",
};
const LEV_LABEL: Record<LevBucket, string> = {
  low: "Light",
  neutral: "Normal",
  high: "Crowded",
};
const LIQ_LABEL: Record<LiqBucket, string> = {
  loose: "Loose",
  normal: "Normal",
  tight: "Tight",
};

export async function buildRegime(reader: ISnapshotReader): Promise<RegimeBuild> {
  const s = await readMarketSignals(reader, "BTC", { includeGlobal: false });
  const { price, change24h } = s.price;
  const liqTotal = s.liquidations.totalUsd;
  const liqLongPct = s.liquidations.longPct;
  const fg = s.fearGreed.value;

  const partsOk = [
    change24h,
    s.fundingPct,
    s.openInterest.oiChange24h,
    liqTotal,
  ].filter((v) => v !== null).length;

  const trend = trendOf(change24h);
  const vol = bucket(liqTotal, 25_000_000, 120_000_000, [
    "calm",
    "chop",
    "shock",
  ] as const);
  const lev = bucket(s.fundingPct, -0.02, 0.1, [
    "low",
    "neutral",
    "high",
  ] as const);
  const liq = liquidityOf(liqLongPct);

  const drivers: string[] = [];
  if (change24h !== null && price !== null)
    drivers.push(`BTC ${fmtUsd(price)} • ${fmtPct(change24h)} 24h (trend axis)`);
  if (s.fundingPct !== null)
    drivers.push(`Funding ${fmtPct(s.fundingPct, 3)} (crowding proxy)`);
  if (liqTotal !== null && liqLongPct !== null)
    drivers.push(
      `Liqs ${fmtUsd(liqTotal)} • ${fmtPct(liqLongPct, 0, false)} long (fragility proxy)`
    );
  if (fg !== null) drivers.push(`Fear & Greed ${fg} (sentiment context)`);
  while (drivers.length < 3) drivers.push(DASH);

  return {
    view: {
      version: REGIME_VERSION,
      regime: {
        label: regimeLabel(trend.bucket, vol, lev, liq, fg),
        confidence: confidence(partsOk),
        since: null,
      },
      axes: [
        { key: "trend", label: "Trend", value: trend.label },
        { key: "volatility", label: "Volatility", value: VOL_LABEL[vol] },
        { key: "leverage", label: "Leverage", value: LEV_LABEL[lev] },
        { key: "liquidity", label: "Liquidity", value: LIQ_LABEL[liq] },
      ],
      drivers: drivers.slice(0, 3),
      disclaimer:
        "Heuristic regime classifier derived from live snapshots. " +
        "Outputs are buckets and drivers (no model disclosure).",
    },
    sources: s.found,
    latestUpdate: s.latestUpdate,
  };
}
