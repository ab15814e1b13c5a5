// backend/services/shared/src/middleware/requestId.ts
import type { RequestHandler } from "express";
import { randomUUID } from "crypto";

/** Header-level correlation id for transport logs (not the capability request_id). */
export function readRequestId(
  headers: Record<string, string | string[] | undefined>
): string {
  const hdr =
    headers["x-request-id"] ||
    headers["x-correlation-id"] ||
    headers["x-amzn-trace-id"];
  return (Array.isArray(hdr) ? hdr[0] : hdr) || randomUUID();
}

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    const id = readRequestId(req.headers);
    req.headers["x-request-id"] = id;
    res.setHeader("x-request-id", id);
    next();
  };
}
