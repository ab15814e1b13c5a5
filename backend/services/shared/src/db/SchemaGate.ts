// backend/services/shared/src/db/SchemaGate.ts
/**
 * Purpose:
 * - Process-local memo so schema work (create table / additive column
 *   migrations / indexes) runs once per key per process.
 *
 * Notes:
 * - Memo is set only on success; a failed attempt is forgotten so the next
 *   caller retries.
 * - Concurrent callers during the first attempt share the same promise.
 */

export class SchemaGate {
  private readonly ensured = new Map<string, Promise<void>>();

  public ensureOnce(key: string, work: () => Promise<void>): Promise<void> {
    const k = (key ?? "").trim();
    if (!k) {
      throw new Error(
        "SCHEMAGATE_KEY_EMPTY: ensureOnce(key, work) requires a non-empty key."
      );
    }

    const existing = this.ensured.get(k);
    if (existing) return existing;

    const p = work().catch((err: unknown) => {
      this.ensured.delete(k);
      throw err;
    });

    this.ensured.set(k, p);
    return p;
  }

  public isEnsured(key: string): boolean {
    return this.ensured.has(key.trim());
  }
}

/** Shared for the whole process; tests construct their own. */
export const processSchemaGate = new SchemaGate();
