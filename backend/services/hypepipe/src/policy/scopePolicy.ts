// backend/services/hypepipe/src/policy/scopePolicy.ts
import type { AuthClaims } from "../auth/claims";

/**
 * Capability → required scope. Capabilities not listed are open to any
 * authenticated caller. Exact, case-sensitive match.
 */
export const SCOPE_BY_CAPABILITY: Readonly<Record<string, string>> = {
  "core.asset.snapshot": "read:core.asset.snapshot",
  "macro.regime": "read:macro.regime",
  "macro.pillars": "read:macro.pillars",
  "sentiment.fear_greed": "read:sentiment.fear_greed",
};

/** Scope for the admin audit read-back; not a capability. */
export const AUDIT_READ_SCOPE = "admin:audit.read";

export type AuthorizeResult =
  | { ok: true }
  | { ok: false; reason: "scope_denied"; requiredScope: string };

export function requiredScopeFor(cap: string): string | null {
  return Object.prototype.hasOwnProperty.call(SCOPE_BY_CAPABILITY, cap)
    ? SCOPE_BY_CAPABILITY[cap]
    : null;
}

export function hasScope(claims: AuthClaims, scope: string): AuthorizeResult {
  return claims.scopes.has(scope)
    ? { ok: true }
    : { ok: false, reason: "scope_denied", requiredScope: scope };
}

export function authorize(claims: AuthClaims, cap: string): AuthorizeResult {
  const required = requiredScopeFor(cap);
  return required === null ? { ok: true } : hasScope(claims, required);
}
