// backend/services/hypepipe/src/config.ts

/**
 * Why:
 * - Centralize explicit env parsing with hard assertions. Read at call time
 *   (loadConfig), never at import, so tests can pass their own env.
 *
 * Notes:
 * - HYPEPIPE_JWT_SECRET itself is NOT captured here; the secret source reads
 *   it per verification.
 * - HYPEPIPE_CACHE_DISABLED is likewise read per request by the gateway.
 */

import type { IDbConnectionInfo } from "../../shared/src/db/types";
import { pgInfoFromEnv } from "../../shared/src/db/PgDbClient";
import {
  getEnv,
  requireEnum,
  requireNumber,
  type EnvSource,
} from "../../shared/src/env";
import { DEFAULT_SECRET_FILE } from "./auth/secret";
import { FEAR_GREED_URL } from "../../market/src/views/fearGreed";

export const SERVICE_NAME = "hypepipe" as const;

export const NODE_ENVS = ["dev", "docker", "production", "test"] as const;
export type NodeEnv = (typeof NODE_ENVS)[number];

export type HypepipeConfig = {
  nodeEnv: NodeEnv;
  port: number;
  apiPrefix: string;
  /** Empty → CORS disabled. "*" → any origin. */
  corsOrigins: string[];
  db: IDbConnectionInfo;
  jwtSecretFile: string;
  fearGreedUrl: string;
};

export const DEFAULT_PORT = 8090;
export const DEFAULT_API_PREFIX = "/api/v1/hypepipe";

/** "/api/v1/hypepipe/" or "api/v1/hypepipe" → "/api/v1/hypepipe" */
export function normalizePrefix(raw: string): string {
  const trimmed = raw.trim().replace(/\/+$/, "");
  if (!trimmed) return "";
  return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}

function csv(v: string | undefined): string[] {
  return (v ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function loadConfig(env: EnvSource = process.env): HypepipeConfig {
  const nodeEnv = requireEnum("NODE_ENV", getEnv("NODE_ENV", env) ?? "dev", NODE_ENVS);
  const port = requireNumber(
    "HYPEPIPE_PORT",
    getEnv("HYPEPIPE_PORT", env) ?? String(DEFAULT_PORT)
  );
  if (port < 1 || port > 65535) {
    throw new Error(`Invalid HYPEPIPE_PORT: ${port}`);
  }

  return {
    nodeEnv,
    port,
    apiPrefix: normalizePrefix(
      getEnv("HYPEPIPE_API_PREFIX", env) ?? DEFAULT_API_PREFIX
    ),
    corsOrigins: csv(getEnv("HYPEPIPE_CORS_ORIGINS", env)),
    db: pgInfoFromEnv(env),
    jwtSecretFile:
      getEnv("HYPEPIPE_JWT_SECRET_FILE", env) ?? DEFAULT_SECRET_FILE,
    fearGreedUrl: getEnv("HYPEPIPE_FEAR_GREED_URL", env) ?? FEAR_GREED_URL,
  };
}
