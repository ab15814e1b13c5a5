// backend/services/shared/src/db/types.ts
/**
 * Purpose:
 * - Interfaces for the relational client so services depend on abstractions
 *   and tests can swap in an in-process fake.
 */

export type DbRow = Record<string, unknown>;

export interface IQueryable {
  /** Run one parameterized statement ($1, $2, …) and return its rows. */
  query(text: string, params?: ReadonlyArray<unknown>): Promise<DbRow[]>;
}

export interface IDbClient extends IQueryable {
  /**
   * Run `work` on one connection, released afterwards whether `work`
   * resolves or rejects. Nothing is held across calls.
   */
  withConnection<T>(work: (conn: IQueryable) => Promise<T>): Promise<T>;
}

export interface IDbConnectionInfo {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}
