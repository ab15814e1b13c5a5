// backend/services/shared/src/health.ts
import express from "express";

export type ReadinessDetails = Record<string, unknown>;
export type ReadinessFn = () => Promise<ReadinessDetails> | ReadinessDetails;

type Options = {
  service: string;
  readiness?: ReadinessFn;
  now?: () => Date;
};

/**
 * Exposes (relative to where the router is mounted):
 *   GET /health        -> liveness, never touches dependencies
 *   GET /health/ready  -> readiness; 503 when the readiness fn throws
 *
 * Both are `Cache-Control: no-store`.
 */
export function createHealthRouter(opts: Options): express.Router {
  const router = express.Router();
  const now = opts.now ?? (() => new Date());

  router.get("/health", (_req, res) => {
    res
      .set("Cache-Control", "no-store")
      .json({ ok: true, service: opts.service, ts: now().toISOString() });
  });

  router.get("/health/ready", async (_req, res) => {
    res.set("Cache-Control", "no-store");
    try {
      const details = opts.readiness ? await opts.readiness() : {};
      res.json({
        ok: true,
        service: opts.service,
        ts: now().toISOString(),
        ...details,
      });
    } catch (err) {
      res.status(503).json({
        ok: false,
        service: opts.service,
        ts: now().toISOString(),
        error: err instanceof Error ? err.message : String(err),
      });
    }
  });

  return router;
}
