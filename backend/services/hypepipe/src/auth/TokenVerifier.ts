// backend/services/hypepipe/src/auth/TokenVerifier.ts
/**
 * Purpose:
 * - Turn (X-Agent-Id, Authorization) into verified AuthClaims or a deny code.
 *
 * Check order:
 *   missing_header → missing_token → secret → signature/exp → claim shape
 *   → agent_mismatch
 *
 * Invariants:
 * - Never throws for caller mistakes; the only throw is ServerMisconfigError
 *   when no signing secret is configured.
 * - HS256 only.
 */

import jwt from "jsonwebtoken";
import type { Clock } from "../../../shared/src/utils/clock";
import {
  TokenClaimsSchema,
  toAuthClaims,
  type AuthClaims,
  type DenyReason,
} from "./claims";
import { requireSecret, type ISecretSource } from "./secret";

export type VerifyInput = {
  agentHeader: string | undefined;
  authorization: string | undefined;
  /** Optional body hint; reconciled against the token like the header. */
  ctxAgentId?: string | null;
};

export type VerifyResult =
  | { ok: true; claims: AuthClaims }
  | { ok: false; reason: Exclude<DenyReason, "scope_denied"> };

const BEARER = /^Bearer\s+(.+)$/i;

export function bearerCredential(authorization: string | undefined): string | null {
  const m = BEARER.exec((authorization ?? "").trim());
  if (!m) return null;
  const cred = m[1].trim();
  return cred === "" ? null : cred;
}

export class TokenVerifier {
  constructor(
    private readonly secret: ISecretSource,
    private readonly clock: Pick<Clock, "now">
  ) {}

  public verify(input: VerifyInput): VerifyResult {
    const agentHeader = (input.agentHeader ?? "").trim();
    if (!agentHeader) return { ok: false, reason: "missing_header" };

    const token = bearerCredential(input.authorization);
    if (token === null) return { ok: false, reason: "missing_token" };

    const secret = requireSecret(this.secret);

    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, secret, {
        algorithms: ["HS256"],
        clockTimestamp: Math.floor(this.clock.now().getTime() / 1000),
      });
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) {
        return { ok: false, reason: "expired" };
      }
      return { ok: false, reason: "invalid_token" };
    }
    if (typeof decoded === "string") return { ok: false, reason: "invalid_token" };

    const parsed = TokenClaimsSchema.safeParse(decoded);
    if (!parsed.success) return { ok: false, reason: "invalid_token" };

    const claims = toAuthClaims(parsed.data);
    if (claims.agentId !== agentHeader) {
      return { ok: false, reason: "agent_mismatch" };
    }
    const hint = (input.ctxAgentId ?? "").trim();
    if (hint && hint !== claims.agentId) {
      return { ok: false, reason: "agent_mismatch" };
    }

    return { ok: true, claims };
  }
}
