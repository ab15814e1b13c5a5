// backend/services/shared/src/middleware/asyncHandler.ts
import type { NextFunction, Request, RequestHandler, Response } from "express";

export type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/** Rejections go to `next(err)` and from there to the shared error handler. */
export function asyncHandler(route: AsyncRoute): RequestHandler {
  return (req, res, next) => {
    route(req, res, next).catch(next);
  };
}
