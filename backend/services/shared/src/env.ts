// backend/services/shared/src/env.ts
/**
 * Purpose:
 * - Env loading by layer with deterministic precedence:
 *     1) repo root  → project-wide defaults
 *     2) service family dir (backend/services) → shared service defaults
 *     3) service root (e.g. backend/services/hypepipe) → service overrides
 *   Within each layer `.env` loads first, then the mode file (.env.dev), so
 *   the mode file wins. Later loads override earlier ones.
 * - Small fail-fast accessors used by each service's config module.
 *
 * Notes:
 * - In production we prefer injected env; `.env` files are optional there.
 * - dotenv-expand resolves `${VAR}` references across files.
 */

import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import dotenvExpand from "dotenv-expand";

export type EnvSource = Record<string, string | undefined>;

/** Return trimmed env var or undefined (blank counts as unset). */
export function getEnv(
  name: string,
  env: EnvSource = process.env
): string | undefined {
  const v = env[name];
  if (v == null) return undefined;
  const s = String(v).trim();
  return s === "" ? undefined : s;
}

export function requireNumber(name: string, v: string): number {
  if (!/^-?\d+$/.test(v)) throw new Error(`Invalid numeric env var: ${name}`);
  return Number(v);
}

/** Restrict a value to an allowed set. */
export function requireEnum<T extends string>(
  name: string,
  v: string,
  allowed: readonly T[]
): T {
  const hit = allowed.find((a) => a === v);
  if (hit === undefined)
    throw new Error(`Invalid ${name}: ${v}. Allowed: ${allowed.join(", ")}`);
  return hit;
}

/** Ops-style truthiness for flags: 1 | true | yes | on. */
export function isTruthy(v: string | undefined): boolean {
  const s = (v ?? "").trim().toLowerCase();
  return s === "1" || s === "true" || s === "yes" || s === "on";
}

/** Find the first directory upward from `start` that contains any of the markers. */
function findRootWithMarkers(start: string, markers: string[]): string | null {
  let dir = path.resolve(start);
  for (;;) {
    for (const m of markers) {
      if (fs.existsSync(path.join(dir, m))) return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Deployment root for anything under `start`: the nearest directory upward
 * holding `.git` or `package.json`, else three levels above `start`.
 */
export function findRepoRoot(start: string): string {
  return (
    findRootWithMarkers(start, [".git", "package.json"]) ||
    path.resolve(start, "..", "..", "..")
  );
}

/** Load a single env file if it exists; expand vars; return true if loaded. */
function loadIfExists(absPath: string): boolean {
  if (!fs.existsSync(absPath)) return false;
  const parsed = dotenv.config({ path: absPath, override: true });
  if (parsed.error) {
    throw new Error(
      `Failed to load env file: ${absPath} — ${String(parsed.error)}`
    );
  }
  dotenvExpand.expand(parsed);
  return true;
}

/**
 * Cascading loader for a service.
 *
 * Order (always): repoRoot → serviceFamilyDir → serviceRoot.
 *   - dev:    ".env", then ".env.dev"
 *   - docker: ".env", then ".env.docker"
 *   - other:  ".env" only
 */
export function loadEnvCascadeForService(
  serviceRootAbs: string,
  opts: { allowMissingInProd?: boolean } = {}
): string[] {
  const mode = (process.env.NODE_ENV || "").trim();
  if (!mode)
    throw new Error("NODE_ENV is required (dev | docker | production).");

  const serviceRoot = path.resolve(serviceRootAbs);
  const serviceFamilyDir = path.dirname(serviceRoot);
  const repoRoot = findRepoRoot(serviceRoot);

  const layerFiles =
    mode === "dev"
      ? [".env", ".env.dev"]
      : mode === "docker"
      ? [".env", ".env.docker"]
      : [".env"];

  const candidates: string[] = [];
  for (const dir of [repoRoot, serviceFamilyDir, serviceRoot]) {
    for (const name of layerFiles) candidates.push(path.join(dir, name));
  }

  const loaded = candidates.filter((p) => loadIfExists(p));

  const allowMissing =
    mode === "production" && (opts.allowMissingInProd ?? true);
  if (loaded.length === 0 && !allowMissing && mode !== "test") {
    throw new Error(
      `No env files found for mode="${mode}". Looked in:\n` +
        candidates.map((p) => `  - ${p}`).join("\n")
    );
  }
  return loaded;
}
