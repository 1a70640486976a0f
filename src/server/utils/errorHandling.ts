/**
 * Error handling utilities for route handlers
 */

import type { Request, Response, NextFunction } from 'express';
import { NotFoundError } from '../types/errors.js';

/**
 * Wraps an async route handler to automatically catch errors and pass them to Express error middleware
 *
 * Usage:
 * ```typescript
 * router.get('/:id', asyncHandler(async (req, res) => {
 *   const session = await sessions.getSession(req.params.id);
 *   res.json(session);
 * }));
 * ```
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Helper to throw NotFoundError if resource is null/undefined
 */
export function throwIfNotFound<T>(
  resource: T | null | undefined,
  resourceName: string,
  identifier?: string
): asserts resource is T {
  if (resource === null || resource === undefined) {
    throw new NotFoundError(resourceName, identifier);
  }
}
