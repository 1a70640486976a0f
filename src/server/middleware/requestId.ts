import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { requestContext, logger } from '../utils/logger.js';

/**
 * Middleware to generate and attach request ID to each request
 * Also sets up async context so every log line written during the request carries it
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers['x-request-id'];
  const requestId = typeof header === 'string' && header.length > 0 ? header : randomUUID();

  res.setHeader('X-Request-ID', requestId);

  const context: Record<string, unknown> = {
    requestId,
    method: req.method,
    path: req.path,
  };

  requestContext.run(context, () => {
    logger.info({ ip: req.ip }, 'Incoming request');
    next();
  });
}
