// backend/services/market/src/views/fearGreed.ts
/**
 * Purpose:
 * - Fear & Greed index from Alternative.me, kept in the snapshot registry
 *   under `altme:fear_greed`.
 *
 * Fallback order for get(maxAgeS):
 *   fresh snapshot → provider fetch (+ upsert) → stale snapshot → null
 *
 * Notes:
 * - Provider is read at call time through an injected fetcher; tests never
 *   reach the network.
 */

import axios from "axios";
import type { Clock } from "../../../shared/src/utils/clock";
import { componentLogger, errFields } from "../../../shared/src/utils/logger";
import { DatasetKeys, type ISnapshotStore } from "../snapshots/types";
import { asArray, asRecord } from "../snapshots/values";

export const FEAR_GREED_URL =
  "https://api.alternative.me/fng/?limit=30&format=json";

export type FearGreedView = {
  current: { value: number; label: string };
  /** Oldest → newest, at most 7 points. */
  history: Array<{ t: string; v: number }>;
  source: { provider: "alternative.me"; dataset_key: string };
};

export type FearGreedResult = {
  view: FearGreedView;
  /** When the underlying data was captured (ISO-8601). */
  asof: string;
  origin: "snapshot" | "provider" | "stale";
};

/** Returns the provider's raw JSON body. */
export type FearGreedFetcher = () => Promise<unknown>;

export function axiosFearGreedFetcher(
  url: string = FEAR_GREED_URL,
  timeoutMs = 6000
): FearGreedFetcher {
  return async () => {
    const res = await axios.get<unknown>(url, {
      timeout: timeoutMs,
      headers: { Accept: "application/json" },
    });
    return res.data;
  };
}

const MONTHS = [
  "Jan", "Feb", "Mar", "Apr", "May", "Jun",
  "Jul", "Aug", "Sep", "Oct", "Nov", "Dec",
] as const;

function digits(x: unknown): number | null {
  const s = typeof x === "number" ? String(x) : typeof x === "string" ? x : "";
  return /^\d+$/.test(s) ? Number(s) : null;
}

/** "Mar 05" in UTC from an epoch-seconds timestamp. */
function dayLabel(epochS: number): string {
  const d = new Date(epochS * 1000);
  return `${MONTHS[d.getUTCMonth()]} ${String(d.getUTCDate()).padStart(2, "0")}`;
}

export function parseFearGreed(payload: unknown): FearGreedView {
  const rows = asArray(asRecord(payload).data).map(asRecord);
  const current = rows[0] ?? {};
  const label = current.value_classification;

  const history = rows
    .slice(0, 7)
    .reverse()
    .map((row, i) => {
      const ts = digits(row.timestamp);
      return {
        t: ts === null ? `D-${6 - i}` : dayLabel(ts),
        v: digits(row.value) ?? 50,
      };
    });

  return {
    current: {
      value: digits(current.value) ?? 50,
      label: typeof label === "string" && label ? label : "Neutral",
    },
    history,
    source: { provider: "alternative.me", dataset_key: DatasetKeys.fearGreed },
  };
}

export class FearGreedService {
  constructor(
    private readonly store: ISnapshotStore,
    private readonly fetcher: FearGreedFetcher,
    private readonly clock: Pick<Clock, "now">
  ) {}

  public async get(maxAgeS = 300): Promise<FearGreedResult | null> {
    const snap = await this.store.getSnapshot(DatasetKeys.fearGreed);
    const now = this.clock.now();

    if (snap?.updatedAt) {
      const ageS = (now.getTime() - snap.updatedAt.getTime()) / 1000;
      if (ageS <= maxAgeS) {
        return {
          view: parseFearGreed(snap.payload),
          asof: snap.updatedAt.toISOString(),
          origin: "snapshot",
        };
      }
    }

    try {
      const raw = await this.fetcher();
      await this.store.upsert(DatasetKeys.fearGreed, raw);
      return {
        view: parseFearGreed(raw),
        asof: now.toISOString(),
        origin: "provider",
      };
    } catch (err) {
      componentLogger("fear_greed").warn(
        errFields(err),
        "provider fetch failed; falling back to stored snapshot"
      );
    }

    if (!snap) return null;
    return {
      view: parseFearGreed(snap.payload),
      asof: (snap.updatedAt ?? now).toISOString(),
      origin: "stale",
    };
  }
}
