import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { ExpressHandler } from '../../types/index.js';

/**
 * Forward rejected promises to the express error handler.
 */
export function handle(handler: ExpressHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}
