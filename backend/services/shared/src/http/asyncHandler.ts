import type { Request, Response, NextFunction, RequestHandler } from "express";

export type MaybeAsyncHandler = (
  req: Request,
  res: Response,
  next: NextFunction
) => void | Promise<void>;

/**
 * Wrap an Express handler so a rejected promise reaches `next(err)` instead
 * of becoming an unhandled rejection. Synchronous throws are left to Express.
 */
export function asyncHandler(fn: MaybeAsyncHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const out = fn(req, res, next);
    if (out instanceof Promise) out.catch(next);
  };
}
