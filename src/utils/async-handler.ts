import type { NextFunction, Request, RequestHandler, Response } from 'express';

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/** Routes a rejected handler to the error middleware, always as an Error. */
export function asyncHandler(fn: AsyncRequestHandler): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch((error: unknown) => {
      next(error instanceof Error ? error : new Error(String(error)));
    });
  };
}
