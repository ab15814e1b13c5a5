// backend/services/hypepipe/src/app.ts
/**
 * Purpose:
 * - Build the HypePipe Express app from an already-composed Hypepipe.
 *
 * Order:
 *   cors → requestId → pino-http → json body → routes → 404 → error handler
 *
 * Invariants:
 * - All routes live under config.apiPrefix.
 * - No listen() here; index.ts owns the socket so tests can use supertest.
 */

import cors from "cors";
import express, { type Express } from "express";
import { pingDb } from "../../shared/src/db/PgDbClient";
import { createHealthRouter } from "../../shared/src/health";
import { makeHttpLogger } from "../../shared/src/middleware/httpLogger";
import { errorHandler, notFoundHandler } from "../../shared/src/middleware/problem";
import { requestIdMiddleware } from "../../shared/src/middleware/requestId";
import type { Hypepipe } from "./composition";
import { SERVICE_NAME } from "./config";
import { buildAuditRouter } from "./routes/audit.routes";
import { buildCapRouter } from "./routes/cap.routes";

export function createApp(hp: Hypepipe): Express {
  const app = express();
  app.disable("x-powered-by");

  const origins = hp.config.corsOrigins;
  if (origins.length > 0) {
    app.use(cors({ origin: origins.includes("*") ? true : origins }));
  }

  app.use(requestIdMiddleware());
  app.use(makeHttpLogger(SERVICE_NAME));
  app.use(express.json({ limit: "1mb" }));

  const base = hp.config.apiPrefix || "/";
  app.use(
    base,
    createHealthRouter({
      service: SERVICE_NAME,
      now: () => hp.clock.now(),
      readiness: async () => {
        if (hp.secret.current() === null) {
          throw new Error("signing secret not configured");
        }
        await pingDb(hp.db);
        return { secret: "configured", db: "ok" };
      },
    })
  );
  app.use(base, buildCapRouter(hp.gateway));
  app.use(base, buildAuditRouter(hp.gateway, hp.audit));

  app.use(notFoundHandler());
  app.use(errorHandler());

  return app;
}
