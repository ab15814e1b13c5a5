// backend/services/shared/test/db.schemaGate.spec.ts
import { describe, it, expect, vi } from "vitest";
import { SchemaGate } from "../src/db/SchemaGate";

describe("SchemaGate", () => {
  it("runs work once per key and shares the in-flight promise", async () => {
    const gate = new SchemaGate();
    const work = vi.fn(async () => undefined);

    await Promise.all([gate.ensureOnce("t", work), gate.ensureOnce(" t ", work)]);
    await gate.ensureOnce("t", work);

    expect(work).toHaveBeenCalledTimes(1);
    expect(gate.isEnsured("t")).toBe(true);
  });

  it("forgets a failed attempt so the next caller retries", async () => {
    const gate = new SchemaGate();
    const work = vi
      .fn<() => Promise<void>>()
      .mockRejectedValueOnce(new Error("db down"))
      .mockResolvedValueOnce(undefined);

    await expect(gate.ensureOnce("t", work)).rejects.toThrow("db down");
    expect(gate.isEnsured("t")).toBe(false);

    await gate.ensureOnce("t", work);
    expect(work).toHaveBeenCalledTimes(2);
    expect(gate.isEnsured("t")).toBe(true);
  });

  it("rejects an empty key", () => {
    expect(() => new SchemaGate().ensureOnce("  ", async () => undefined)).toThrow(
      /SCHEMAGATE_KEY_EMPTY/
    );
  });
});
