// backend/services/hypepipe/src/gateway/CapabilityGateway.ts
/**
 * Purpose:
 * - Orchestrate one capability call:
 *     authenticate → authorize → resolve → cache lookup → invoke → store
 *     → audit → envelope
 *
 * Invariants:
 * - Exactly one audit record per call that reaches authentication.
 * - Every non-200 outcome is thrown as GatewayHttpError (status + envelope)
 *   and rendered by the shared error handler.
 * - Handler faults never leak detail to the caller; detail goes to logs.
 * - No single-flight: concurrent misses on one key each invoke the handler;
 *   the last put wins.
 */

import { randomUUID } from "node:crypto";
import { isTruthy, type EnvSource } from "../../../shared/src/env";
import { HttpError } from "../../../shared/src/middleware/problem";
import type { Clock } from "../../../shared/src/utils/clock";
import { componentLogger, errFields } from "../../../shared/src/utils/logger";
import type { AuditDecision, IAuditSink } from "../audit/types";
import type { AuthClaims } from "../auth/claims";
import { ServerMisconfigError } from "../auth/secret";
import type { TokenVerifier, VerifyResult } from "../auth/TokenVerifier";
import { cacheKeyFor } from "../cache/cacheKey";
import { effectiveMaxAge } from "../cache/freshness";
import type { ResultCache } from "../cache/ResultCache";
import type { CapabilityOutcome, ICapabilityRegistry } from "../capabilities/types";
import type { CapEnvelope, CapMeta, CapRequest } from "../contracts/cap.contract";
import { authorize } from "../policy/scopePolicy";

const NO_STORE = { "Cache-Control": "no-store" } as const;

export class GatewayHttpError extends HttpError {
  constructor(status: number, public readonly envelope: CapEnvelope) {
    super(status, envelope, NO_STORE);
    this.name = "GatewayHttpError";
  }
}

export type GatewayDeps = {
  verifier: TokenVerifier;
  registry: ICapabilityRegistry;
  cache: ResultCache;
  audit: IAuditSink;
  clock: Clock;
  /** Read per call for HYPEPIPE_CACHE_DISABLED. */
  env?: EnvSource;
};

export type CapCall = {
  request: CapRequest;
  agentHeader: string | undefined;
  authorization: string | undefined;
};

/** Per-call bookkeeping shared by every exit path. */
type CallState = {
  request: CapRequest;
  traceId: string;
  startedAt: number;
  agentId: string;
  policyVersion: string | null;
};

export class CapabilityGateway {
  private readonly env: EnvSource;

  constructor(private readonly deps: GatewayDeps) {
    this.env = deps.env ?? process.env;
  }

  public cacheDisabled(): boolean {
    return isTruthy(this.env.HYPEPIPE_CACHE_DISABLED);
  }

  /**
   * Authenticate only. Used by routes that sit behind the same token rules
   * without a capability (audit read-back). Throws GatewayHttpError.
   */
  public authenticate(
    agentHeader: string | undefined,
    authorization: string | undefined
  ): AuthClaims {
    let res: VerifyResult;
    try {
      res = this.deps.verifier.verify({ agentHeader, authorization });
    } catch (err) {
      if (err instanceof ServerMisconfigError) {
        componentLogger("gateway").error(errFields(err), "server misconfigured");
        throw new HttpError(500, { ok: false, error: "server_misconfigured" }, NO_STORE);
      }
      throw err;
    }
    if (!res.ok) {
      throw new HttpError(401, { ok: false, error: res.reason }, NO_STORE);
    }
    return res.claims;
  }

  public async dispatch(call: CapCall): Promise<CapEnvelope> {
    const { request } = call;
    const st: CallState = {
      request,
      traceId: randomUUID().replace(/-/g, ""),
      startedAt: this.deps.clock.monotonicMs(),
      agentId: (call.agentHeader ?? "").trim() || "unknown",
      policyVersion: null,
    };
    const log = componentLogger("gateway").child({
      cap: request.cap,
      traceId: st.traceId,
      requestId: request.request_id,
    });

    // 1) authenticate
    let verified: VerifyResult;
    try {
      verified = this.deps.verifier.verify({
        agentHeader: call.agentHeader,
        authorization: call.authorization,
        ctxAgentId: request.ctx.agent_id,
      });
    } catch (err) {
      if (!(err instanceof ServerMisconfigError)) throw err;
      log.error(errFields(err), "server misconfigured");
      await this.record(st, "error", { denyReason: null });
      throw this.fail(st, 500, "server_misconfigured");
    }
    if (!verified.ok) {
      log.warn({ reason: verified.reason }, "auth denied");
      await this.record(st, "deny", { denyReason: verified.reason });
      throw this.fail(st, 401, verified.reason);
    }
    const claims = verified.claims;
    st.agentId = claims.agentId;
    st.policyVersion = claims.policyVersion;

    // 2) authorize
    const authz = authorize(claims, request.cap);
    if (!authz.ok) {
      log.warn({ requiredScope: authz.requiredScope }, "scope denied");
      await this.record(st, "scope_denied", { denyReason: authz.reason });
      throw this.fail(st, 403, authz.reason);
    }

    // 3) resolve
    const entry = this.deps.registry.resolve(request.cap);
    if (!entry) {
      await this.record(st, "unknown_cap", { denyReason: "unknown_cap" });
      throw this.fail(st, 400, `Unknown capability: ${request.cap}`, {
        known_caps: this.deps.registry.names(),
      });
    }

    // 4) cache lookup
    const maxAgeS = this.cacheDisabled()
      ? null
      : effectiveMaxAge(entry.defaultTtlS, request.opts.freshness_s);
    const key = cacheKeyFor(request.cap, request.input);

    if (maxAgeS !== null && maxAgeS > 0) {
      const hit = this.deps.cache.get(key, maxAgeS);
      if (hit) {
        const latencyMs = await this.record(st, "allow", {
          asof: hit.asof,
          cacheHit: true,
        });
        log.info({ latencyMs, cacheHit: true }, "cap served");
        return this.success(st, { ...hit.payload }, hit.asof, true, latencyMs);
      }
    }

    // 5) invoke
    let outcome: CapabilityOutcome;
    try {
      outcome = await entry.handler(request.input);
    } catch (err) {
      outcome = { kind: "fault", reason: err instanceof Error ? err.message : String(err) };
      log.error(errFields(err), "capability handler threw");
    }
    if (outcome.kind === "fault") {
      log.error({ reason: outcome.reason }, "capability handler fault");
      await this.record(st, "error", { denyReason: null });
      throw this.fail(st, 500, "Internal capability error");
    }
    if (outcome.kind === "degraded") {
      log.warn({ note: outcome.note }, "capability degraded");
    }

    const data = { ...outcome.payload, asof: outcome.asof };
    const cacheHit = maxAgeS === null ? null : false;
    if (maxAgeS !== null) this.deps.cache.put(key, data, outcome.asof);

    const latencyMs = await this.record(st, "allow", {
      asof: outcome.asof,
      cacheHit,
    });
    log.info({ latencyMs, cacheHit }, "cap served");
    return this.success(st, data, outcome.asof, cacheHit, latencyMs);
  }

  // ──────────────────────────────────────────────────────────────────────────

  private meta(
    st: CallState,
    asof: string | null,
    cacheHit: boolean | null,
    latencyMs?: number
  ): CapMeta {
    const meta: CapMeta = {
      cap: st.request.cap,
      trace_id: st.traceId,
      asof,
      cache_hit: cacheHit,
    };
    if (st.request.opts.trace === true) {
      meta.request_id = st.request.request_id;
      meta.latency_ms = latencyMs ?? this.elapsed(st);
      meta.policy_version = st.policyVersion;
    }
    return meta;
  }

  private success(
    st: CallState,
    data: Record<string, unknown>,
    asof: string,
    cacheHit: boolean | null,
    latencyMs: number
  ): CapEnvelope {
    return { ok: true, data, meta: this.meta(st, asof, cacheHit, latencyMs) };
  }

  private fail(
    st: CallState,
    status: number,
    error: string,
    extra: { known_caps?: string[] } = {}
  ): GatewayHttpError {
    return new GatewayHttpError(status, {
      ok: false,
      error,
      ...extra,
      meta: this.meta(st, null, null),
    });
  }

  private elapsed(st: CallState): number {
    return Math.max(0, Math.floor(this.deps.clock.monotonicMs() - st.startedAt));
  }

  /** Append the audit row; returns the latency it recorded. */
  private async record(
    st: CallState,
    decision: AuditDecision,
    extra: { denyReason?: string | null; asof?: string | null; cacheHit?: boolean | null }
  ): Promise<number> {
    const latencyMs = this.elapsed(st);
    await this.deps.audit.append({
      ts: this.deps.clock.now(),
      agentId: st.agentId,
      userId: st.request.ctx.user_id ?? null,
      cap: st.request.cap,
      requestId: st.request.request_id,
      traceId: st.traceId,
      decision,
      latencyMs,
      policyVersion: st.policyVersion,
      denyReason: extra.denyReason ?? null,
      asof: extra.asof ?? null,
      cacheHit: extra.cacheHit ?? null,
    });
    return latencyMs;
  }
}
