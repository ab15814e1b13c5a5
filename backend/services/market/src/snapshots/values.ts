// backend/services/market/src/snapshots/values.ts
import { z } from "zod";

/** Snapshot payloads are provider JSON; nothing about their shape is trusted. */
export type JsonRecord = Record<string, unknown>;

const JsonRecordSchema = z.record(z.unknown());

export function asRecord(x: unknown): JsonRecord {
  const parsed = JsonRecordSchema.safeParse(x);
  return parsed.success ? parsed.data : {};
}

export function asArray(x: unknown): unknown[] {
  return Array.isArray(x) ? x : [];
}

/** Finite number from a number or numeric string, else null. */
export function num(x: unknown): number | null {
  if (typeof x === "number") return Number.isFinite(x) ? x : null;
  if (typeof x === "string" && x.trim() !== "") {
    const n = Number(x);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/** Whole number from an int or digit string ("45"), else null. */
export function int(x: unknown): number | null {
  if (typeof x === "number") return Number.isInteger(x) ? x : null;
  if (typeof x === "string" && /^-?\d+$/.test(x.trim())) return Number(x);
  return null;
}
