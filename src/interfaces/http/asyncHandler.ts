import type { NextFunction, Request, Response } from "express";

/**
 * Express 4 ignores rejected promises from handlers; forward them to the
 * error middleware instead.
 */
export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
