// backend/services/hypepipe/src/auth/secret.ts
/**
 * Purpose:
 * - Resolve the shared HS256 signing secret.
 *
 * Order:
 *   1) HYPEPIPE_JWT_SECRET (env)
 *   2) contents of the secret file (trimmed)
 *
 * Notes:
 * - Resolved on every call so an operator can drop the file in without a
 *   restart. An unreadable file counts as absent.
 * - A relative file path is anchored at the deployment root, never the
 *   process cwd.
 */

import fs from "node:fs";
import path from "node:path";
import { findRepoRoot, getEnv, type EnvSource } from "../../../shared/src/env";

export const DEFAULT_SECRET_FILE = ".hypepipe_jwt_secret";

/** Missing secret is a server fault (500), never a caller deny. */
export class ServerMisconfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ServerMisconfigError";
  }
}

export interface ISecretSource {
  /** Current secret, or null when none is configured. */
  current(): string | null;
  /** Human-readable description of where the secret is looked up. */
  describe(): string;
}

export class EnvFileSecretSource implements ISecretSource {
  private readonly filePath: string;

  constructor(
    private readonly env: EnvSource = process.env,
    filePath?: string,
    rootDir: string = findRepoRoot(__dirname)
  ) {
    this.filePath = path.resolve(rootDir, filePath ?? DEFAULT_SECRET_FILE);
  }

  public current(): string | null {
    const fromEnv = getEnv("HYPEPIPE_JWT_SECRET", this.env);
    if (fromEnv) return fromEnv;

    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, "utf8");
    } catch {
      return null;
    }
    const s = raw.trim();
    return s === "" ? null : s;
  }

  public describe(): string {
    return `HYPEPIPE_JWT_SECRET or ${this.filePath}`;
  }
}

/** Fixed secret (tests, dev token tooling). */
export function staticSecret(secret: string | null): ISecretSource {
  return {
    current: () => (secret && secret.trim() ? secret.trim() : null),
    describe: () => "static",
  };
}

export function requireSecret(source: ISecretSource): string {
  const s = source.current();
  if (s === null) {
    throw new ServerMisconfigError(
      `signing secret not configured (${source.describe()})`
    );
  }
  return s;
}
