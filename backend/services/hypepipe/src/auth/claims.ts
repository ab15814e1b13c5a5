// backend/services/hypepipe/src/auth/claims.ts
import { z } from "zod";

export const TIERS = ["readonly", "paper", "orchestrator"] as const;
export type Tier = (typeof TIERS)[number];

/** Why a caller was turned away at authentication. */
export type DenyReason =
  | "missing_header"
  | "missing_token"
  | "invalid_token"
  | "expired"
  | "agent_mismatch"
  | "scope_denied";

/** Verified identity; only TokenVerifier builds these. */
export type AuthClaims = {
  readonly agentId: string;
  readonly scopes: ReadonlySet<string>;
  readonly tier: Tier;
  readonly policyVersion: string | null;
  readonly expiresAt: Date;
};

/**
 * Wire claims after signature check. `exp` is enforced by jsonwebtoken but
 * must also be present; `policy_version` is passed through as text.
 */
export const TokenClaimsSchema = z.object({
  agent_id: z.string().min(1),
  scopes: z.array(z.string()),
  tier: z.enum(TIERS),
  exp: z.number(),
  policy_version: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((v) => (v === null || v === undefined ? null : String(v))),
});

export type TokenClaims = z.infer<typeof TokenClaimsSchema>;

export function toAuthClaims(c: TokenClaims): AuthClaims {
  return {
    agentId: c.agent_id,
    scopes: new Set(c.scopes),
    tier: c.tier,
    policyVersion: c.policy_version,
    expiresAt: new Date(c.exp * 1000),
  };
}
