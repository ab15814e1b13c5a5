// backend/services/market/src/snapshots/PgSnapshotStore.ts
/**
 * Purpose:
 * - Read/write the shared `edge_dataset_registry` table that the collectors
 *   fill with provider payloads.
 *
 * Invariants:
 * - getSnapshot never rejects. A failed read is logged and reported as absent,
 *   so callers degrade instead of erroring.
 * - upsert does reject; the only writer (fear & greed refresh) decides.
 */

import type { IDbClient } from "../../../shared/src/db/types";
import { componentLogger, errFields } from "../../../shared/src/utils/logger";
import type { ISnapshotStore, Snapshot } from "./types";

function toPayload(raw: unknown): unknown {
  // json columns come back parsed; text columns holding JSON do not
  if (typeof raw !== "string") return raw;
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

function toDate(raw: unknown): Date | null {
  if (raw instanceof Date) return Number.isNaN(raw.getTime()) ? null : raw;
  if (typeof raw === "string") {
    const d = new Date(raw);
    return Number.isNaN(d.getTime()) ? null : d;
  }
  return null;
}

export class PgSnapshotStore implements ISnapshotStore {
  constructor(private readonly db: IDbClient) {}

  public async getSnapshot(datasetKey: string): Promise<Snapshot | null> {
    try {
      const rows = await this.db.query(
        "SELECT payload, updated_at FROM edge_dataset_registry WHERE dataset_key = $1",
        [datasetKey]
      );
      const row = rows[0];
      if (!row) return null;
      return {
        payload: toPayload(row.payload),
        updatedAt: toDate(row.updated_at),
      };
    } catch (err) {
      componentLogger("snapshots").warn(
        { ...errFields(err), datasetKey },
        "getSnapshot failed"
      );
      return null;
    }
  }

  public async upsert(datasetKey: string, payload: unknown): Promise<void> {
    await this.db.query(
      `INSERT INTO edge_dataset_registry (dataset_key, payload, updated_at)
       VALUES ($1, $2, now())
       ON CONFLICT (dataset_key)
       DO UPDATE SET payload = EXCLUDED.payload, updated_at = now()`,
      [datasetKey, JSON.stringify(payload)]
    );
  }
}
