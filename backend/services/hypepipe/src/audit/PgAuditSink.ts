// backend/services/hypepipe/src/audit/PgAuditSink.ts
/**
 * Purpose:
 * - Durable, append-only audit trail in `hypepipe_audit_events`.
 *
 * Schema:
 * - CREATE TABLE IF NOT EXISTS with the v1 columns, then one additive
 *   `ADD COLUMN IF NOT EXISTS` per later column, then the `ts` index.
 *   Runs through the SchemaGate: once per process on success.
 *
 * Invariants:
 * - append() never rejects. Audit loss is logged at warn; the request that
 *   produced the record is not affected.
 * - One connection per operation (withConnection); nothing held.
 */

import { z } from "zod";
import { processSchemaGate, type SchemaGate } from "../../../shared/src/db/SchemaGate";
import type { DbRow, IDbClient } from "../../../shared/src/db/types";
import { componentLogger, errFields } from "../../../shared/src/utils/logger";
import type { AuditEventView, AuditRecord, IAuditSink } from "./types";

export const AUDIT_TABLE = "hypepipe_audit_events";

const CREATE_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS ${AUDIT_TABLE} (
    id              BIGSERIAL PRIMARY KEY,
    ts              TIMESTAMPTZ NOT NULL DEFAULT now(),
    agent_id        TEXT NOT NULL,
    user_id         BIGINT,
    cap             TEXT NOT NULL,
    request_id      TEXT NOT NULL,
    trace_id        TEXT NOT NULL,
    decision        TEXT NOT NULL,
    latency_ms      INTEGER
)`;

const MIGRATIONS: ReadonlyArray<string> = [
  `ALTER TABLE ${AUDIT_TABLE} ADD COLUMN IF NOT EXISTS policy_version TEXT`,
  `ALTER TABLE ${AUDIT_TABLE} ADD COLUMN IF NOT EXISTS deny_reason TEXT`,
  `ALTER TABLE ${AUDIT_TABLE} ADD COLUMN IF NOT EXISTS asof TEXT`,
  `ALTER TABLE ${AUDIT_TABLE} ADD COLUMN IF NOT EXISTS cache_hit BOOLEAN`,
  `CREATE INDEX IF NOT EXISTS ${AUDIT_TABLE}_ts_idx ON ${AUDIT_TABLE} (ts DESC)`,
];

const INSERT_SQL = `INSERT INTO ${AUDIT_TABLE}
  (ts, agent_id, user_id, cap, request_id, trace_id, decision,
   latency_ms, policy_version, deny_reason, asof, cache_hit)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)`;

const RECENT_SQL = `SELECT id, ts, agent_id, user_id, cap, request_id, trace_id,
  decision, latency_ms, policy_version, deny_reason, asof, cache_hit
  FROM ${AUDIT_TABLE} ORDER BY ts DESC, id DESC LIMIT $1`;

// pg returns BIGINT/BIGSERIAL as strings
const intish = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((v) => (v === null || v === undefined ? null : Number(v)));
const textOrNull = z
  .string()
  .nullish()
  .transform((v) => v ?? null);

const AuditRowSchema = z.object({
  id: z.union([z.number(), z.string()]).transform(String),
  ts: z
    .union([z.date(), z.string()])
    .transform((v) => (v instanceof Date ? v : new Date(v)).toISOString()),
  agent_id: z.string(),
  user_id: intish,
  cap: z.string(),
  request_id: z.string(),
  trace_id: z.string(),
  decision: z.string(),
  latency_ms: intish,
  policy_version: textOrNull,
  deny_reason: textOrNull,
  asof: textOrNull,
  cache_hit: z
    .boolean()
    .nullish()
    .transform((v) => v ?? null),
});

export class PgAuditSink implements IAuditSink {
  constructor(
    private readonly db: IDbClient,
    private readonly gate: SchemaGate = processSchemaGate
  ) {}

  public ensureSchema(): Promise<void> {
    return this.gate.ensureOnce(AUDIT_TABLE, () =>
      this.db.withConnection(async (conn) => {
        await conn.query(CREATE_TABLE_SQL);
        for (const stmt of MIGRATIONS) {
          await conn.query(stmt);
        }
      })
    );
  }

  public async append(r: AuditRecord): Promise<void> {
    try {
      await this.ensureSchema();
      await this.db.query(INSERT_SQL, [
        r.ts,
        r.agentId,
        r.userId,
        r.cap,
        r.requestId,
        r.traceId,
        r.decision,
        r.latencyMs,
        r.policyVersion,
        r.denyReason,
        r.asof,
        r.cacheHit,
      ]);
    } catch (err) {
      componentLogger("audit").warn(
        {
          ...errFields(err),
          cap: r.cap,
          traceId: r.traceId,
          decision: r.decision,
        },
        "audit append failed"
      );
    }
  }

  public async recent(limit: number): Promise<AuditEventView[]> {
    await this.ensureSchema();
    const rows = await this.db.query(RECENT_SQL, [limit]);
    return rows.flatMap((row: DbRow) => {
      const parsed = AuditRowSchema.safeParse(row);
      return parsed.success ? [parsed.data] : [];
    });
  }
}
