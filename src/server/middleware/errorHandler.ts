import type { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger.js';
import { NotFoundError, toAppError, type ErrorResponse } from '../types/errors.js';

/**
 * Transform error to standardized error response
 */
export function transformErrorToResponse(err: unknown, req: Request, includeStack = false): ErrorResponse {
    const appError = toAppError(err);
    // Non-operational errors carry internals; clients only get a generic message
    const message = appError.isOperational ? appError.message : 'An unexpected error occurred';
    return {
        error: appError.isOperational ? appError.name : 'Internal Server Error',
        code: appError.code,
        message,
        statusCode: appError.statusCode,
        timestamp: new Date().toISOString(),
        path: req.path,
        ...(appError.isOperational && appError.context ? { context: appError.context } : {}),
        ...(includeStack && appError.stack ? { stack: appError.stack } : {}),
    };
}

/**
 * Centralized error handling middleware
 * Must be registered LAST in Express app
 */
export function errorHandler(
    err: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    if (err instanceof NotFoundError) {
        logger.info({ message: err.message, path: req.path, method: req.method }, 'Resource not found');
    } else {
        logger.error({
            error: err,
            message: err instanceof Error ? err.message : String(err),
            path: req.path,
            method: req.method,
        }, 'Request failed');
    }

    const errorResponse = transformErrorToResponse(err, req, process.env.NODE_ENV === 'development');

    if (res.headersSent) {
        logger.debug({ path: req.path }, 'Response already sent; skipping error body');
        return;
    }
    res.status(errorResponse.statusCode).json(errorResponse);
}

/**
 * 404 handler for unknown routes
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
    next(new NotFoundError('Route', `${req.method} ${req.path}`));
}
