// backend/services/shared/src/db/PgDbClient.ts
/**
 * Purpose:
 * - Thin wrapper around node-postgres that opens one connection per
 *   operation and always releases it.
 *
 * Notes:
 * - No pool on purpose: request rates are low and the gateway must not hold
 *   a connection across requests.
 */

import type { EventEmitter } from "node:events";
import { Client } from "pg";
import type { Logger } from "pino";
import type { DbRow, IDbClient, IDbConnectionInfo, IQueryable } from "./types";
import { getEnv, requireNumber, type EnvSource } from "../env";
import { componentLogger, errFields } from "../utils/logger";

/**
 * A dropped connection surfaces as an 'error' event on the client; the
 * pending query rejects on its own, so the event is only logged.
 */
export function logClientErrors(
  client: EventEmitter,
  log: Logger = componentLogger("db")
): void {
  client.on("error", (err: unknown) => {
    log.error(errFields(err), "postgres connection error");
  });
}

export class PgDbClient implements IDbClient {
  constructor(
    private readonly info: IDbConnectionInfo,
    private readonly connectTimeoutMs = 5_000
  ) {}

  public async withConnection<T>(
    work: (conn: IQueryable) => Promise<T>
  ): Promise<T> {
    const client = new Client({
      ...this.info,
      connectionTimeoutMillis: this.connectTimeoutMs,
    });
    logClientErrors(client);
    await client.connect();
    try {
      return await work({
        query: async (text, params = []) =>
          (await client.query(text, [...params])).rows,
      });
    } finally {
      await client.end();
    }
  }

  public query(text: string, params?: ReadonlyArray<unknown>): Promise<DbRow[]> {
    return this.withConnection((conn) => conn.query(text, params));
  }
}

/** PG* env → connection info (libpq-compatible names). */
export function pgInfoFromEnv(env: EnvSource = process.env): IDbConnectionInfo {
  return {
    host: getEnv("PGHOST", env) ?? "127.0.0.1",
    port: requireNumber("PGPORT", getEnv("PGPORT", env) ?? "5432"),
    user: getEnv("PGUSER", env) ?? "eventedge_bot",
    password: getEnv("PGPASSWORD", env) ?? "",
    database: getEnv("PGDATABASE", env) ?? "eventedge",
  };
}

/** Readiness probe. Rejects when the database is unreachable. */
export async function pingDb(db: IQueryable): Promise<void> {
  await db.query("SELECT 1");
}
