/**
 * errorHandler.ts
 *
 * Last handler in the chain. Logs the failure and answers with a generic
 * message so internal error text never reaches clients.
 */

import type { ErrorRequestHandler, Request, Response, NextFunction } from 'express';

export const errorHandler: ErrorRequestHandler = (
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  const message = err instanceof Error ? err.stack || err.message : String(err);
  console.error(`[ERROR] ${req.method} ${req.path}: ${message}`);

  if (res.headersSent) {
    next(err);
    return;
  }
  res.status(500).json({ error: 'Internal server error' });
};
