import type { Request, Response, NextFunction } from 'express';
import { z, ZodError, type ZodSchema } from 'zod';
import { BadRequestError } from '../types/errors.js';
import { LAW_TYPES, SUPPORTED_COUNTRIES } from '../config/jurisdictions.js';
import { logger } from '../utils/logger.js';

/**
 * Schemas shared by several routes
 */
export const commonSchemas = {
    country: z.enum(SUPPORTED_COUNTRIES, {
        errorMap: () => ({ message: `Country must be one of: ${SUPPORTED_COUNTRIES.join(', ')}` }),
    }),
    lawType: z.enum(LAW_TYPES, {
        errorMap: () => ({ message: `Law type must be one of: ${LAW_TYPES.join(', ')}` }),
    }),
    sessionId: z.string().uuid('Session ID must be a UUID'),
};

type ValidationSchema = {
    body?: ZodSchema;
    query?: ZodSchema;
    params?: ZodSchema;
};

/**
 * Validation middleware factory
 * Validates request body, query, or params against a Zod schema.
 * The parsed body replaces `req.body` so defaults are applied; query and params
 * are only checked, handlers parse them again with the same schema for typed access.
 * Throws BadRequestError if validation fails, ensuring errors go through centralized error handling
 */
export function validate(schema: ValidationSchema) {
    return (req: Request, _res: Response, next: NextFunction) => {
        try {
            if (schema.body) {
                req.body = schema.body.parse(req.body);
            }
            if (schema.query) {
                schema.query.parse(req.query);
            }
            if (schema.params) {
                schema.params.parse(req.params);
            }
            next();
        } catch (error) {
            if (error instanceof ZodError) {
                const details = error.issues.map((e) => ({
                    path: e.path.join('.'),
                    message: e.message,
                }));
                logger.warn({ path: req.path, method: req.method, issues: details }, 'Request validation failed');
                next(new BadRequestError('Validation failed', { details }));
            } else {
                next(error);
            }
        }
    };
}
