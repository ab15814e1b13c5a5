// backend/services/hypepipe/src/contracts/cap.contract.ts
/**
 * Wire contract for POST /cap.
 *
 * request_id is caller-supplied and required; the server never invents one.
 */

import { z } from "zod";

const SafeIdSchema = z.number().int().safe();

/** Integer ids, also as decimal strings; must fit a JS number exactly. */
const UserIdSchema = z.union([
  SafeIdSchema,
  z
    .string()
    .trim()
    .regex(/^-?\d+$/)
    .transform(Number)
    .pipe(SafeIdSchema),
]);

export const CapContextSchema = z.object({
  agent_id: z.string().optional(),
  user_id: UserIdSchema.nullish(),
  tier: z.string().optional(),
});

export const CapOptsSchema = z.object({
  freshness_s: z.number().optional(),
  trace: z.boolean().optional(),
});

export const CapRequestSchema = z.object({
  cap: z.string().min(1),
  input: z.record(z.unknown()).default({}),
  ctx: CapContextSchema.default({}),
  opts: CapOptsSchema.default({}),
  request_id: z.string().trim().min(1),
});

export type CapRequest = z.infer<typeof CapRequestSchema>;

export type CapMeta = {
  cap: string;
  trace_id: string;
  asof: string | null;
  cache_hit: boolean | null;
  request_id?: string;
  latency_ms?: number;
  policy_version?: string | null;
};

export type CapEnvelope =
  | { ok: true; data: Record<string, unknown>; meta: CapMeta }
  | { ok: false; error: string; known_caps?: string[]; meta: CapMeta };

export type ParseCapResult =
  | { ok: true; request: CapRequest }
  | { ok: false; error: "request_id required" | "invalid request" };

function rawRequestId(body: unknown): unknown {
  if (typeof body !== "object" || body === null || !("request_id" in body))
    return undefined;
  return body.request_id;
}

export function parseCapRequest(body: unknown): ParseCapResult {
  const rid = rawRequestId(body);
  if (typeof rid !== "string" || rid.trim() === "") {
    return { ok: false, error: "request_id required" };
  }
  const parsed = CapRequestSchema.safeParse(body);
  if (!parsed.success) return { ok: false, error: "invalid request" };
  return { ok: true, request: parsed.data };
}
