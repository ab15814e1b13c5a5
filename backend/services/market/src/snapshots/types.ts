// backend/services/market/src/snapshots/types.ts

/**
 * One dataset row of the snapshot registry: the last payload fetched from a
 * provider and when it was stored.
 */
export type Snapshot = {
  payload: unknown;
  updatedAt: Date | null;
};

export interface ISnapshotReader {
  /** Absent (null) when the key was never stored or the store is unreachable. */
  getSnapshot(datasetKey: string): Promise<Snapshot | null>;
}

export interface ISnapshotWriter {
  upsert(datasetKey: string, payload: unknown): Promise<void>;
}

export type ISnapshotStore = ISnapshotReader & ISnapshotWriter;

/** Dataset keys as written by the collectors. */
export const DatasetKeys = {
  price: (coinId: string) => `coingecko:price_simple:usd:${coinId}`,
  global: "coingecko:global",
  funding: (sym: string) => `coinglass:oi_weighted_funding:${sym}`,
  openInterest: (sym: string) => `coinglass:open_interest:${sym}`,
  liquidations: (sym: string) => `coinglass:liquidations:${sym}`,
  fearGreed: "altme:fear_greed",
} as const;

export const COINGECKO_IDS: Readonly<Record<string, string>> = {
  BTC: "bitcoin",
  ETH: "ethereum",
};
