import { ErrorRequestHandler, NextFunction, Request, Response } from 'express';
import { ArgumentError } from '../../../domain/errors';
import { ILogger } from '../../../domain/interfaces';

/**
 * Turns errors thrown by handlers into JSON responses
 * Bad caller input is a 400, anything else (including daemon replies the
 * client cannot read) a 500.
 */
export function createErrorHandler(logger: ILogger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof ArgumentError) {
      res.status(400).json({ error: err.message });
      return;
    }
    logger.error(`Error handling ${req.method} ${req.path}:`, err);
    res.status(500).json({ error: 'Internal server error' });
  };
}
