// backend/services/market/src/views/pillars.ts
/**
 * Pillar scorecard ("SuperCard") for BTC or ETH.
 *
 * Each pillar degrades to "—" on its own when its snapshots are missing;
 * confidence counts how many pillars had something to show.
 */

import { DASH, fmtPct, fmtUsd } from "../snapshots/format";
import type { ISnapshotReader } from "../snapshots/types";
import type { Confidence } from "./regime";
import { bucket } from "./regime";
import { readMarketSignals, type SupportedSymbol } from "./signals";

export type PillarKey =
  | "flow"
  | "leverage"
  | "fragility"
  | "momentum"
  | "sentiment"
  | "risk";

export type PillarStatus = "positive" | "neutral" | "negative";

export type Pillar = {
  key: PillarKey;
  label: string;
  value: string;
  status: PillarStatus;
  hint: string;
};

export type Stance = "cautious" | "crowded-longs" | "risk-on" | "neutral";

export type PillarsView = {
  symbol: SupportedSymbol;
  version: string;
  summary: {
    headline: string;
    stance: Stance;
    confidence: Confidence;
    notes: string[];
  };
  pillars: Pillar[];
  disclaimer: string;
};

export type PillarsBuild = {
  view: PillarsView;
  sources: number;
  latestUpdate: Date | null;
};

type Level = "low" | "neutral" | "high";
const LEVELS = ["low", "neutral", "high"] as const;

const STATUS: Record<Level, PillarStatus> = {
  high: "positive",
  low: "negative",
  neutral: "neutral",
};

function confidence(partsOk: number): Confidence {
  if (partsOk >= 5) return "high";
  if (partsOk >= 3) return "medium";
  return "low";
}

export function stanceOf(
  chg24: number | null,
  fg: number | null,
  fundingPct: number | null,
  longPct: number | null
): Stance {
  if (fg !== null && fg <= 25 && chg24 !== null && chg24 < 0) return "cautious";
  if (fundingPct !== null && fundingPct >= 0.1 && longPct !== null && longPct >= 70)
    return "crowded-longs";
  if (chg24 !== null && chg24 > 1) return "risk-on";
  return "neutral";
}

function sentimentLevel(fg: number | null): Level {
  if (fg === null) return "neutral";
  if (fg <= 25) return "low";
  if (fg >= 60) return "high";
  return "neutral";
}

function pillar(
  key: PillarKey,
  label: string,
  has: boolean,
  value: () => string,
  level: Level,
  hint: string
): Pillar {
  return { key, label, value: has ? value() : DASH, status: STATUS[level], hint };
}

export async function buildPillars(
  reader: ISnapshotReader,
  symbol: SupportedSymbol
): Promise<PillarsBuild> {
  const s = await readMarketSignals(reader, symbol);
  const { price, change24h } = s.price;
  const { oiUsd, oiChange24h } = s.openInterest;
  const liq = s.liquidations;
  const { btcDominance, totalVolUsd } = s.global;
  const fg = s.fearGreed;

  const pillars: Pillar[] = [
    pillar(
      "flow",
      "Flow",
      liq.totalUsd !== null || totalVolUsd !== null,
      () => `${fmtUsd(liq.totalUsd)} liqs / ${fmtUsd(totalVolUsd)} vol`,
      bucket(liq.totalUsd, 25_000_000, 120_000_000, LEVELS),
      "pressure proxy (liqs/volume)"
    ),
    pillar(
      "leverage",
      "Leverage",
      oiUsd !== null || s.fundingPct !== null,
      () => `${fmtUsd(oiUsd)} OI • ${fmtPct(s.fundingPct, 3)} funding`,
      bucket(s.fundingPct, -0.02, 0.1, LEVELS),
      "OI + funding stress"
    ),
    pillar(
      "fragility",
      "Fragility",
      liq.longPct !== null && liq.shortPct !== null,
      () => `${fmtPct(liq.longPct, 0)} long / ${fmtPct(liq.shortPct, 0)} short`,
      bucket(liq.longPct, 40, 70, LEVELS),
      "liq imbalance + spikes"
    ),
    pillar(
      "momentum",
      "Momentum",
      price !== null || change24h !== null,
      () => `${fmtUsd(price)} • ${fmtPct(change24h)} 24h`,
      bucket(change24h, -1, 1, LEVELS),
      "trend + volatility"
    ),
    pillar(
      "sentiment",
      "Sentiment",
      fg.value !== null,
      () => (fg.label ? `${fg.value} — ${fg.label}` : String(fg.value)),
      sentimentLevel(fg.value),
      "fear/greed index"
    ),
    pillar(
      "risk",
      "Risk",
      oiChange24h !== null || btcDominance !== null,
      () => `OI ${fmtPct(oiChange24h)} • BTC dom ${fmtPct(btcDominance, 1)}`,
      bucket(oiChange24h, -2, 2, LEVELS),
      "regime + confidence"
    ),
  ];
  const partsOk = pillars.filter((p) => p.value !== DASH).length;

  const notes: string[] = [];
  if (s.fundingPct !== null)
    notes.push("Funding reflects positioning pressure (crowding proxy).");
  if (liq.totalUsd !== null)
    notes.push("Liquidations help gauge fragility and forced flow.");
  if (fg.value !== null) notes.push("Sentiment adds a behavioral context layer.");
  while (notes.length < 3) notes.push(DASH);

  return {
    view: {
      symbol,
      version: "v0.2-live",
      summary: {
        headline: `${symbol} SuperCard`,
        stance: stanceOf(change24h, fg.value, s.fundingPct, liq.longPct),
        confidence: confidence(partsOk),
        notes: notes.slice(0, 3),
      },
      pillars,
      disclaimer:
        "Interpretation signals derived from live snapshots. " +
        "Values are intentionally high-level (no methodology disclosed).",
    },
    sources: s.found,
    latestUpdate: s.latestUpdate,
  };
}
