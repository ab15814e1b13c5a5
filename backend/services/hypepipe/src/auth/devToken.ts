// backend/services/hypepipe/src/auth/devToken.ts
import jwt from "jsonwebtoken";
import type { Tier } from "./claims";

export type DevTokenOptions = {
  agentId: string;
  scopes: string[];
  tier: Tier;
  ttlS: number;
  policyVersion?: string;
};

/** Ops-only helper: sign a caller token with the shared HS256 secret. */
export function signDevToken(
  opts: DevTokenOptions,
  secret: string,
  nowS: number = Math.floor(Date.now() / 1000)
): string {
  return jwt.sign(
    {
      agent_id: opts.agentId,
      scopes: opts.scopes,
      tier: opts.tier,
      exp: nowS + opts.ttlS,
      iat: nowS,
      ...(opts.policyVersion ? { policy_version: opts.policyVersion } : {}),
    },
    secret,
    { algorithm: "HS256" }
  );
}
