import type { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Adapt an async handler to Express 4, which ignores returned promises:
 * a rejection is passed to next() so the error handler sees it.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    void fn(req, res, next).catch(next);
  };
}
