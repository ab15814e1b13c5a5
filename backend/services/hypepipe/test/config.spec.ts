// backend/services/hypepipe/test/config.spec.ts
import { describe, it, expect } from "vitest";
import { DEFAULT_SECRET_FILE } from "../src/auth/secret";
import { DEFAULT_API_PREFIX, loadConfig, normalizePrefix } from "../src/config";

describe("loadConfig", () => {
  it("falls back to defaults for an empty env", () => {
    const cfg = loadConfig({});
    expect(cfg.nodeEnv).toBe("dev");
    expect(cfg.port).toBe(8090);
    expect(cfg.apiPrefix).toBe(DEFAULT_API_PREFIX);
    expect(cfg.corsOrigins).toEqual([]);
    expect(cfg.jwtSecretFile).toBe(DEFAULT_SECRET_FILE);
  });

  it("reads overrides", () => {
    const cfg = loadConfig({
      NODE_ENV: "production",
      HYPEPIPE_PORT: "9000",
      HYPEPIPE_API_PREFIX: "gw/",
      HYPEPIPE_CORS_ORIGINS: "http://a.test, http://b.test,",
      HYPEPIPE_JWT_SECRET_FILE: "/run/secrets/hp",
    });
    expect(cfg.nodeEnv).toBe("production");
    expect(cfg.port).toBe(9000);
    expect(cfg.apiPrefix).toBe("/gw");
    expect(cfg.corsOrigins).toEqual(["http://a.test", "http://b.test"]);
    expect(cfg.jwtSecretFile).toBe("/run/secrets/hp");
  });

  it("rejects an unknown NODE_ENV", () => {
    expect(() => loadConfig({ NODE_ENV: "staging" })).toThrow(/Invalid NODE_ENV: staging/);
  });

  it("rejects ports outside 1..65535 or non-numeric", () => {
    expect(() => loadConfig({ HYPEPIPE_PORT: "0" })).toThrow("Invalid HYPEPIPE_PORT: 0");
    expect(() => loadConfig({ HYPEPIPE_PORT: "70000" })).toThrow("Invalid HYPEPIPE_PORT: 70000");
    expect(() => loadConfig({ HYPEPIPE_PORT: "http" })).toThrow(
      "Invalid numeric env var: HYPEPIPE_PORT"
    );
  });
});

describe("normalizePrefix", () => {
  it("adds a leading slash and drops trailing ones", () => {
    expect(normalizePrefix("/api/v1/hypepipe/")).toBe("/api/v1/hypepipe");
    expect(normalizePrefix("api//")).toBe("/api");
    expect(normalizePrefix(" / ")).toBe("");
  });
});
