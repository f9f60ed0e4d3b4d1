import type { NextFunction, Request, RequestHandler, Response } from 'express';

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/**
 * Express 4 ignores rejected handler promises; forward them to the error middleware instead
 */
export function asyncHandler(route: AsyncRoute): RequestHandler {
  return (req, res, next) => {
    route(req, res, next).catch(next);
  };
}

/**
 * Message text for logging a thrown value of unknown type
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
