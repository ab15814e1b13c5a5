// backend/services/hypepipe/src/capabilities/types.ts
/**
 * Handler contract.
 *
 * - `ok`        → data computed from real snapshots
 * - `degraded`  → data unavailable; a stub is served (still a 200)
 * - `fault`     → handler could not produce anything (500, detail logged only)
 *
 * Handlers may also throw; the gateway treats that like `fault`.
 */

export type CapabilityInput = Readonly<Record<string, unknown>>;
export type CapabilityPayload = Record<string, unknown>;

export type CapabilityOutcome =
  | { kind: "ok"; payload: CapabilityPayload; asof: string }
  | { kind: "degraded"; payload: CapabilityPayload; asof: string; note: string }
  | { kind: "fault"; reason: string };

export type CapabilityHandler = (
  input: CapabilityInput
) => Promise<CapabilityOutcome>;

export type CapabilityEntry = {
  readonly name: string;
  readonly handler: CapabilityHandler;
  /** Seconds; 0 means results are never cached. */
  readonly defaultTtlS: number;
};

export interface ICapabilityRegistry {
  resolve(cap: string): CapabilityEntry | null;
  /** Known capability names, sorted. */
  names(): string[];
}

export function ok(payload: CapabilityPayload, asof: string): CapabilityOutcome {
  return { kind: "ok", payload, asof };
}

export function degraded(
  payload: CapabilityPayload,
  asof: string,
  note: string
): CapabilityOutcome {
  return { kind: "degraded", payload, asof, note };
}
