import type { NextFunction, Request, Response } from 'express';
import { logger } from '../utils/logger.js';

/**
 * 4xx status carried by an HTTP error (body-parser sets both `status` and `statusCode`).
 */
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null) {
    return null;
  }
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  if (typeof status === 'number' && status >= 400 && status < 500) {
    return status;
  }
  return null;
}

/**
 * Last-resort error middleware.
 * Malformed JSON bodies become 400, other client errors keep their 4xx status,
 * and anything else is logged and answered with 500.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof SyntaxError) {
    logger.warn('Invalid JSON body', { path: req.path, error: err.message });
    res.status(400).json({ error: 'Invalid JSON format' });
    return;
  }

  const status = clientErrorStatus(err);
  if (status !== null) {
    const message = err instanceof Error ? err.message : 'Bad request';
    logger.warn('Rejected request', { path: req.path, status, error: message });
    res.status(status).json({ error: message });
    return;
  }

  logger.error('Unhandled request error', {
    path: req.path,
    error: err instanceof Error ? err.message : String(err),
  });
  res.status(500).json({ error: 'Internal server error' });
}
