// backend/services/shared/test/env.spec.ts
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  findRepoRoot,
  getEnv,
  isTruthy,
  loadEnvCascadeForService,
  requireEnum,
  requireNumber,
} from "../src/env";

describe("env accessors", () => {
  it("treats blank values as unset", () => {
    expect(getEnv("X", { X: "  v " })).toBe("v");
    expect(getEnv("X", { X: "   " })).toBeUndefined();
    expect(getEnv("X", {})).toBeUndefined();
  });

  it("parses integers only", () => {
    expect(requireNumber("PORT", "8090")).toBe(8090);
    expect(() => requireNumber("PORT", "80x")).toThrow("Invalid numeric env var: PORT");
  });

  it("restricts to the allowed set", () => {
    expect(requireEnum("NODE_ENV", "dev", ["dev", "production"] as const)).toBe("dev");
    expect(() => requireEnum("NODE_ENV", "staging", ["dev", "production"])).toThrow(
      "Invalid NODE_ENV: staging. Allowed: dev, production"
    );
  });

  it("recognizes ops-style truthy flags", () => {
    for (const v of ["1", "true", "YES", " on "]) expect(isTruthy(v)).toBe(true);
    for (const v of ["0", "false", "", undefined]) expect(isTruthy(v)).toBe(false);
  });
});

describe("loadEnvCascadeForService", () => {
  const KEYS = ["NODE_ENV", "HP_A", "HP_B", "HP_C"];
  let saved: Record<string, string | undefined>;
  let tmp: string;
  let svcRoot: string;

  beforeEach(() => {
    saved = Object.fromEntries(KEYS.map((k) => [k, process.env[k]]));
    for (const k of KEYS.slice(1)) delete process.env[k];

    tmp = fs.mkdtempSync(path.join(os.tmpdir(), "env-cascade-"));
    svcRoot = path.join(tmp, "backend", "services", "demo");
    fs.mkdirSync(svcRoot, { recursive: true });
    fs.writeFileSync(path.join(tmp, "package.json"), "{}");
  });

  afterEach(() => {
    for (const k of KEYS) {
      const v = saved[k];
      if (v === undefined) delete process.env[k];
      else process.env[k] = v;
    }
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it("loads root → family → service, mode file last within a layer", () => {
    fs.writeFileSync(path.join(tmp, ".env"), "HP_A=root\nHP_B=root\n");
    fs.writeFileSync(path.join(tmp, "backend", "services", ".env"), "HP_B=family\n");
    fs.writeFileSync(path.join(svcRoot, ".env"), "HP_C=plain\n");
    fs.writeFileSync(path.join(svcRoot, ".env.dev"), "HP_C=${HP_A}-svc\n");
    process.env.NODE_ENV = "dev";

    const loaded = loadEnvCascadeForService(svcRoot);

    expect(loaded).toEqual([
      path.join(tmp, ".env"),
      path.join(tmp, "backend", "services", ".env"),
      path.join(svcRoot, ".env"),
      path.join(svcRoot, ".env.dev"),
    ]);
    expect(process.env.HP_A).toBe("root");
    expect(process.env.HP_B).toBe("family");
    expect(process.env.HP_C).toBe("root-svc");
  });

  it("finds the deployment root upward from a service directory", () => {
    expect(findRepoRoot(svcRoot)).toBe(tmp);
    expect(findRepoRoot(path.join(svcRoot, "src", "auth"))).toBe(tmp);
  });

  it("fails fast in dev when no file exists", () => {
    process.env.NODE_ENV = "dev";
    expect(() => loadEnvCascadeForService(svcRoot)).toThrow(/No env files found/);
  });

  it("allows injected env in test and production", () => {
    process.env.NODE_ENV = "production";
    expect(loadEnvCascadeForService(svcRoot)).toEqual([]);
    process.env.NODE_ENV = "test";
    expect(loadEnvCascadeForService(svcRoot)).toEqual([]);
  });
});
