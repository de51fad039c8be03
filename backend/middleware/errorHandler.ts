import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { logger } from '../logger';

/** Thrown from a route to answer with a specific status. */
export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
  }
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const message = err.message || 'Internal server error';
  const status = err instanceof HttpError ? err.status : res.statusCode >= 400 ? res.statusCode : 500;
  if (res.headersSent) return;

  if (status >= 500) logger.error('Request error', err, { status, path: req.path });
  else logger.warn('Request rejected', { status, path: req.path, error: message });

  res.status(status).json({
    error: config.isProd && status === 500 ? 'Internal server error' : message
  });
}
