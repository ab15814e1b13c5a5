// backend/services/shared/src/middleware/problem.ts
/**
 * Purpose:
 * - Final 404 + error handlers for every service app.
 * - Errors that already know their response (`HttpError`: status + body)
 *   are rendered verbatim, so a router or orchestrator can throw a finished
 *   4xx/5xx and still get standard HTTP semantics.
 * - Anything else is a generic 500 problem; the detail stays in the logs.
 */

import type { ErrorRequestHandler, RequestHandler } from "express";
import { componentLogger, errFields } from "../utils/logger";

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly body: unknown,
    public readonly headers: Readonly<Record<string, string>> = {}
  ) {
    super(`http ${status}`);
    this.name = "HttpError";
  }
}

/** body-parser / express.json errors carry a numeric 4xx `status` and a `type`. */
function isClientParseError(
  err: unknown
): err is { status: number; type?: unknown; message?: unknown } {
  if (typeof err !== "object" || err === null || !("status" in err))
    return false;
  const status = err.status;
  return typeof status === "number" && status >= 400 && status < 500;
}

function requestIdOf(headers: Record<string, unknown>): string | undefined {
  const h = headers["x-request-id"];
  return typeof h === "string" ? h : undefined;
}

export const notFoundHandler = (): RequestHandler => {
  return (req, res) => {
    res
      .status(404)
      .type("application/problem+json")
      .json({
        type: "about:blank",
        title: "Not Found",
        status: 404,
        detail: "Route not found",
        instance: requestIdOf(req.headers),
      });
  };
};

export const errorHandler = (): ErrorRequestHandler => {
  return (err: unknown, req, res, _next) => {
    if (err instanceof HttpError) {
      res.status(err.status).set(err.headers).json(err.body);
      return;
    }

    if (isClientParseError(err)) {
      res
        .status(err.status)
        .type("application/problem+json")
        .json({
          type: "about:blank",
          title: "Bad Request",
          status: err.status,
          detail:
            typeof err.type === "string" ? err.type : "malformed request",
          instance: requestIdOf(req.headers),
        });
      return;
    }

    componentLogger("problem").error(
      { ...errFields(err), path: req.originalUrl },
      "unhandled request error"
    );
    res
      .status(500)
      .type("application/problem+json")
      .json({
        type: "about:blank",
        title: "Internal Server Error",
        status: 500,
        detail: "internal_error",
        instance: requestIdOf(req.headers),
      });
  };
};
