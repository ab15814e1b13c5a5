// backend/services/hypepipe/src/routes/audit.routes.ts
/**
 * GET /audit/recent?limit=N  (admin read-back, newest first)
 *
 * Same bearer + X-Agent-Id rules as /cap, plus scope `admin:audit.read`.
 * Reads are not themselves audited.
 */

import { Router } from "express";
import { z } from "zod";
import { HttpError } from "../../../shared/src/middleware/problem";
import { asyncHandler } from "../../../shared/src/middleware/asyncHandler";
import type { IAuditSink } from "../audit/types";
import type { CapabilityGateway } from "../gateway/CapabilityGateway";
import { AUDIT_READ_SCOPE, hasScope } from "../policy/scopePolicy";

export const AUDIT_LIMIT_DEFAULT = 50;
export const AUDIT_LIMIT_MAX = 200;

const LimitSchema = z.coerce
  .number()
  .int()
  .min(1)
  .max(AUDIT_LIMIT_MAX)
  .default(AUDIT_LIMIT_DEFAULT);

export function buildAuditRouter(
  gateway: CapabilityGateway,
  audit: IAuditSink
): Router {
  const r = Router();

  r.get(
    "/audit/recent",
    asyncHandler(async (req, res) => {
      res.set("Cache-Control", "no-store");

      const claims = gateway.authenticate(
        req.get("x-agent-id"),
        req.get("authorization")
      );
      const allowed = hasScope(claims, AUDIT_READ_SCOPE);
      if (!allowed.ok) {
        throw new HttpError(
          403,
          { ok: false, error: allowed.reason },
          { "Cache-Control": "no-store" }
        );
      }

      const limit = LimitSchema.safeParse(req.query.limit);
      if (!limit.success) {
        res.status(400).json({
          ok: false,
          error: `limit must be an integer in [1, ${AUDIT_LIMIT_MAX}]`,
        });
        return;
      }

      const events = await audit.recent(limit.data);
      res.json({ ok: true, data: { events, count: events.length } });
    })
  );

  return r;
}
