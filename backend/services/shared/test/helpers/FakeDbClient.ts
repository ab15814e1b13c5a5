// backend/services/shared/test/helpers/FakeDbClient.ts
/**
 * In-process stand-in for PgDbClient.
 *
 * Understands just the SQL this repo issues:
 * - CREATE TABLE IF NOT EXISTS / ALTER TABLE … ADD COLUMN IF NOT EXISTS
 * - CREATE INDEX IF NOT EXISTS
 * - INSERT … VALUES ($n | now()) [ON CONFLICT (col) DO UPDATE …]
 * - SELECT cols FROM t [WHERE col = $1] [ORDER BY …] [LIMIT $n]
 * - SELECT 1
 *
 * Every statement is recorded (whitespace collapsed). `failWhen` makes
 * matching statements reject like an unreachable server.
 */

import type { DbRow, IDbClient, IQueryable } from "../../src/db/types";

type Table = { columns: string[]; rows: DbRow[]; nextId: number };

function toMs(v: unknown): number {
  if (v instanceof Date) return v.getTime();
  if (typeof v === "string" || typeof v === "number") return new Date(v).getTime();
  return 0;
}

export class FakeDbClient implements IDbClient {
  public readonly statements: string[] = [];
  public readonly tables = new Map<string, Table>();
  public readonly indexes = new Set<string>();
  public connectionsOpened = 0;
  public connectionsReleased = 0;
  public failWhen: RegExp | null = null;

  public createTable(name: string, columns: string[]): void {
    this.tables.set(name, { columns: [...columns], rows: [], nextId: 1 });
  }

  public rowsOf(name: string): DbRow[] {
    return (this.tables.get(name)?.rows ?? []).map((r) => ({ ...r }));
  }

  public count(pattern: RegExp): number {
    return this.statements.filter((s) => pattern.test(s)).length;
  }

  public async withConnection<T>(
    work: (conn: IQueryable) => Promise<T>
  ): Promise<T> {
    this.connectionsOpened++;
    try {
      return await work({ query: (text, params) => this.exec(text, params) });
    } finally {
      this.connectionsReleased++;
    }
  }

  public query(text: string, params?: ReadonlyArray<unknown>): Promise<DbRow[]> {
    return this.withConnection((conn) => conn.query(text, params));
  }

  // ──────────────────────────────────────────────────────────────────────────

  private table(name: string): Table {
    const t = this.tables.get(name);
    if (!t) throw new Error(`relation "${name}" does not exist`);
    return t;
  }

  private async exec(
    text: string,
    params: ReadonlyArray<unknown> = []
  ): Promise<DbRow[]> {
    const sql = text.replace(/\s+/g, " ").trim();
    this.statements.push(sql);
    if (this.failWhen && this.failWhen.test(sql)) {
      throw new Error("connect ECONNREFUSED 127.0.0.1:5432");
    }

    if (sql === "SELECT 1") return [{ "?column?": 1 }];

    let m = /^CREATE TABLE IF NOT EXISTS (\w+) \((.*)\)$/.exec(sql);
    if (m) {
      if (!this.tables.has(m[1])) {
        const cols = m[2].split(",").map((c) => c.trim().split(" ")[0]);
        this.createTable(m[1], cols);
      }
      return [];
    }

    m = /^ALTER TABLE (\w+) ADD COLUMN IF NOT EXISTS (\w+)/.exec(sql);
    if (m) {
      const t = this.table(m[1]);
      if (!t.columns.includes(m[2])) t.columns.push(m[2]);
      return [];
    }

    m = /^CREATE INDEX IF NOT EXISTS (\w+) ON (\w+)/.exec(sql);
    if (m) {
      this.table(m[2]);
      this.indexes.add(m[1]);
      return [];
    }

    m = /^INSERT INTO (\w+) \(([^)]*)\) VALUES \((.*?)\)(?: ON CONFLICT \((\w+)\).*)?$/.exec(sql);
    if (m) {
      const t = this.table(m[1]);
      const cols = m[2].split(",").map((c) => c.trim());
      const vals = m[3].split(",").map((v) => v.trim());
      const row: DbRow = {};
      cols.forEach((col, i) => {
        if (!t.columns.includes(col)) {
          throw new Error(`column "${col}" of relation "${m?.[1]}" does not exist`);
        }
        const ref = /^\$(\d+)$/.exec(vals[i] ?? "");
        row[col] = ref ? params[Number(ref[1]) - 1] : new Date();
      });

      const conflictCol = m[4];
      if (conflictCol) {
        const idx = t.rows.findIndex((r) => r[conflictCol] === row[conflictCol]);
        if (idx >= 0) {
          t.rows[idx] = { ...t.rows[idx], ...row };
          return [];
        }
      }
      if (t.columns.includes("id")) row.id = String(t.nextId++);
      t.rows.push(row);
      return [];
    }

    m = /^SELECT (.+?) FROM (\w+)(?: WHERE (\w+) = \$1)?( ORDER BY .+?)?(?: LIMIT \$(\d+))?$/.exec(sql);
    if (m) {
      const t = this.table(m[2]);
      const cols = m[1].split(",").map((c) => c.trim());
      const whereCol = m[3];
      let rows = whereCol
        ? t.rows.filter((r) => r[whereCol] === params[0])
        : [...t.rows];
      if (m[4]) {
        rows.sort(
          (a, b) => toMs(b.ts) - toMs(a.ts) || Number(b.id) - Number(a.id)
        );
      }
      if (m[5]) rows = rows.slice(0, Number(params[Number(m[5]) - 1]));
      return rows.map((r) => {
        const out: DbRow = {};
        for (const c of cols) out[c] = r[c] ?? null;
        return out;
      });
    }

    throw new Error(`FakeDbClient: unsupported statement: ${sql}`);
  }
}
