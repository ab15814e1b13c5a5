// backend/services/hypepipe/test/auth.tokenVerifier.spec.ts
import jwt from "jsonwebtoken";
import { describe, it, expect, beforeEach } from "vitest";
import { TestClock } from "../../shared/test/helpers/TestClock";
import { signDevToken } from "../src/auth/devToken";
import { ServerMisconfigError, staticSecret } from "../src/auth/secret";
import { bearerCredential, TokenVerifier } from "../src/auth/TokenVerifier";

const SECRET = "test-secret";
const AGENT = "edgenavigator-v1";

describe("TokenVerifier", () => {
  let clock: TestClock;
  let verifier: TokenVerifier;

  const mint = (over: Partial<Parameters<typeof signDevToken>[0]> = {}, secret = SECRET) =>
    signDevToken(
      {
        agentId: AGENT,
        scopes: ["read:core.asset.snapshot"],
        tier: "readonly",
        ttlS: 60,
        policyVersion: "v1",
        ...over,
      },
      secret,
      clock.nowS()
    );

  /** Sign arbitrary claims, bypassing the dev-token shape. */
  const raw = (claims: Record<string, unknown>, alg: jwt.Algorithm = "HS256") =>
    jwt.sign(claims, SECRET, { algorithm: alg });

  beforeEach(() => {
    clock = new TestClock();
    verifier = new TokenVerifier(staticSecret(SECRET), clock);
  });

  it("returns typed claims for a valid token", () => {
    const res = verifier.verify({ agentHeader: AGENT, authorization: `Bearer ${mint()}` });
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.claims.agentId).toBe(AGENT);
    expect([...res.claims.scopes]).toEqual(["read:core.asset.snapshot"]);
    expect(res.claims.tier).toBe("readonly");
    expect(res.claims.policyVersion).toBe("v1");
    expect(res.claims.expiresAt.toISOString()).toBe("2026-01-15T12:01:00.000Z");
  });

  it("accepts a case-insensitive scheme with extra spaces", () => {
    const res = verifier.verify({ agentHeader: AGENT, authorization: `bearer   ${mint()}` });
    expect(res.ok).toBe(true);
  });

  it("requires the agent header before anything else", () => {
    expect(verifier.verify({ agentHeader: "  ", authorization: undefined })).toEqual({
      ok: false,
      reason: "missing_header",
    });
  });

  it.each([undefined, "", "Basic abc", "Bearer", "Bearer    "])(
    "reports missing_token for authorization %j",
    (authorization) => {
      expect(verifier.verify({ agentHeader: AGENT, authorization })).toEqual({
        ok: false,
        reason: "missing_token",
      });
    }
  );

  it("reports expired once exp has passed", () => {
    const token = mint({ ttlS: 60 });
    clock.advance(61_000);
    expect(verifier.verify({ agentHeader: AGENT, authorization: `Bearer ${token}` })).toEqual({
      ok: false,
      reason: "expired",
    });
  });

  it("rejects a token signed with another secret", () => {
    const token = mint({}, "other-secret");
    expect(verifier.verify({ agentHeader: AGENT, authorization: `Bearer ${token}` })).toEqual({
      ok: false,
      reason: "invalid_token",
    });
  });

  it("rejects algorithms other than HS256", () => {
    const token = raw(
      { agent_id: AGENT, scopes: [], tier: "readonly", exp: clock.nowS() + 60 },
      "HS512"
    );
    const res = verifier.verify({ agentHeader: AGENT, authorization: `Bearer ${token}` });
    expect(res).toEqual({ ok: false, reason: "invalid_token" });
  });

  const badClaims: Array<{ label: string; claims: Record<string, unknown> }> = [
    { label: "scopes missing", claims: { agent_id: AGENT, tier: "readonly" } },
    { label: "tier missing", claims: { agent_id: AGENT, scopes: [] } },
    { label: "unknown tier", claims: { agent_id: AGENT, scopes: [], tier: "admin" } },
    { label: "scopes not strings", claims: { agent_id: AGENT, scopes: [1, 2], tier: "readonly" } },
    { label: "agent_id missing", claims: { scopes: [], tier: "readonly" } },
  ];

  it.each(badClaims)("reports invalid_token when $label", ({ claims }) => {
    const token = raw({ ...claims, exp: clock.nowS() + 60 });
    expect(verifier.verify({ agentHeader: AGENT, authorization: `Bearer ${token}` })).toEqual({
      ok: false,
      reason: "invalid_token",
    });
  });

  it("reports invalid_token when exp is absent", () => {
    const token = raw({ agent_id: AGENT, scopes: [], tier: "readonly" });
    expect(verifier.verify({ agentHeader: AGENT, authorization: `Bearer ${token}` })).toEqual({
      ok: false,
      reason: "invalid_token",
    });
  });

  it("reports agent_mismatch against the header or the body hint", () => {
    const authorization = `Bearer ${mint()}`;
    expect(verifier.verify({ agentHeader: "someone-else", authorization })).toEqual({
      ok: false,
      reason: "agent_mismatch",
    });
    expect(
      verifier.verify({ agentHeader: AGENT, authorization, ctxAgentId: "someone-else" })
    ).toEqual({ ok: false, reason: "agent_mismatch" });
  });

  it("passes policy_version through as text, null when absent", () => {
    const numeric = raw({
      agent_id: AGENT,
      scopes: [],
      tier: "paper",
      exp: clock.nowS() + 60,
      policy_version: 2,
    });
    const absent = mint({ policyVersion: undefined });

    const a = verifier.verify({ agentHeader: AGENT, authorization: `Bearer ${numeric}` });
    const b = verifier.verify({ agentHeader: AGENT, authorization: `Bearer ${absent}` });
    expect(a.ok && a.claims.policyVersion).toBe("2");
    expect(b.ok && b.claims.policyVersion).toBeNull();
  });

  it("throws ServerMisconfigError when no secret is configured", () => {
    const v = new TokenVerifier(staticSecret(null), clock);
    expect(() => v.verify({ agentHeader: AGENT, authorization: `Bearer ${mint()}` })).toThrow(
      ServerMisconfigError
    );
  });

  it("checks caller input before the secret", () => {
    const v = new TokenVerifier(staticSecret(null), clock);
    expect(v.verify({ agentHeader: AGENT, authorization: undefined })).toEqual({
      ok: false,
      reason: "missing_token",
    });
  });
});

describe("bearerCredential", () => {
  it("extracts and trims the credential", () => {
    expect(bearerCredential("Bearer abc.def ")).toBe("abc.def");
    expect(bearerCredential("Token abc")).toBeNull();
  });
});
