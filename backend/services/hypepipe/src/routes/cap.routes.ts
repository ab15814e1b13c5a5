// backend/services/hypepipe/src/routes/cap.routes.ts
/**
 * Why:
 * - Route one-liners. App mounts this under HYPEPIPE_API_PREFIX (do not
 *   repeat the prefix here).
 *
 * Notes:
 * - Shape errors (bad body / missing request_id) are rejected before the
 *   gateway and are not audited.
 * - Every reply is Cache-Control: no-store.
 */

import { Router } from "express";
import { asyncHandler } from "../../../shared/src/middleware/asyncHandler";
import { parseCapRequest } from "../contracts/cap.contract";
import type { CapabilityGateway } from "../gateway/CapabilityGateway";

export function buildCapRouter(gateway: CapabilityGateway): Router {
  const r = Router();

  r.post(
    "/cap",
    asyncHandler(async (req, res) => {
      res.set("Cache-Control", "no-store");

      const parsed = parseCapRequest(req.body);
      if (!parsed.ok) {
        res.status(400).json({ ok: false, error: parsed.error });
        return;
      }

      const envelope = await gateway.dispatch({
        request: parsed.request,
        agentHeader: req.get("x-agent-id"),
        authorization: req.get("authorization"),
      });
      res.status(200).json(envelope);
    })
  );

  return r;
}
