// backend/services/shared/src/middleware/httpLogger.ts
/**
 * Purpose:
 * - Consistent, structured request logs so ops can aggregate by `service`
 *   and correlate by `reqId`.
 * - Telemetry only. Never blocks a request and is not the audit trail.
 *
 * Order:
 * - Mount right after `requestIdMiddleware()` so the id it stamped is reused.
 *
 * Notes:
 * - Severity: 2xx/3xx=info, 4xx=warn, 5xx/error=error.
 * - Health probes are not logged.
 */

import pinoHttp from "pino-http";
import type { IncomingMessage, ServerResponse } from "http";
import { logger as rootLogger } from "../utils/logger";
import { readRequestId } from "./requestId";

const QUIET_SUFFIXES = ["/health", "/health/ready", "/favicon.ico"];

export function makeHttpLogger(serviceName: string) {
  const logger = rootLogger.child({ service: serviceName });

  return pinoHttp({
    logger,

    genReqId: (req: IncomingMessage, res: ServerResponse) => {
      const id = readRequestId(req.headers);
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },

    customProps: () => ({ service: serviceName }),

    autoLogging: {
      ignore: (req: IncomingMessage) => {
        const url = (req.url ?? "").split("?")[0];
        return QUIET_SUFFIXES.some((s) => url.endsWith(s));
      },
    },

    serializers: {
      req(req: { id?: unknown; method?: string; url?: string }) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: { statusCode?: number }) {
        return { statusCode: res.statusCode };
      },
    },
  });
}
