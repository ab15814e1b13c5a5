// backend/services/hypepipe/src/audit/types.ts

export const AUDIT_DECISIONS = [
  "allow",
  "deny",
  "scope_denied",
  "unknown_cap",
  "error",
] as const;
export type AuditDecision = (typeof AUDIT_DECISIONS)[number];

/** One row per gateway call that reached authentication. Never updated. */
export type AuditRecord = {
  ts: Date;
  agentId: string;
  userId: number | null;
  cap: string;
  requestId: string;
  traceId: string;
  decision: AuditDecision;
  latencyMs: number;
  policyVersion: string | null;
  denyReason: string | null;
  asof: string | null;
  cacheHit: boolean | null;
};

/** Wire shape returned by the audit read-back endpoint. */
export type AuditEventView = {
  id: string;
  ts: string;
  agent_id: string;
  user_id: number | null;
  cap: string;
  request_id: string;
  trace_id: string;
  decision: string;
  latency_ms: number | null;
  policy_version: string | null;
  deny_reason: string | null;
  asof: string | null;
  cache_hit: boolean | null;
};

export interface IAuditSink {
  /** Idempotent; memoized on success, retried after failure. */
  ensureSchema(): Promise<void>;
  /** Never rejects; failures are logged and dropped. */
  append(record: AuditRecord): Promise<void>;
  /** Newest first. */
  recent(limit: number): Promise<AuditEventView[]>;
}
