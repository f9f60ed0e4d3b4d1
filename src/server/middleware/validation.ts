import { Request, Response, NextFunction } from 'express';
import { z, ZodError } from 'zod';
import { BadRequestError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

type ValidationSchema =
    | { body: z.ZodTypeAny; query?: z.ZodTypeAny }
    | { body?: z.ZodTypeAny; query: z.ZodTypeAny };

/**
 * Validation middleware factory
 * Replaces the request body and/or query with the parsed values; a failure
 * becomes a BadRequestError for the central error handler.
 */
export function validate(schema: ValidationSchema) {
    return (req: Request, _res: Response, next: NextFunction) => {
        try {
            if (schema.body) {
                req.body = schema.body.parse(req.body);
            }
            if (schema.query) {
                req.query = schema.query.parse(req.query);
            }
            next();
        } catch (error) {
            if (error instanceof ZodError) {
                const details = error.issues.map((issue) => ({
                    path: issue.path.join('.'),
                    message: issue.message,
                }));
                logger.warn({ path: req.path, method: req.method, issues: details }, 'Request validation failed');
                next(new BadRequestError('Validation failed', { details }));
            } else {
                next(error);
            }
        }
    };
}

/**
 * Common validation schemas
 */
export const commonSchemas = {
    url: z.string().url('Invalid URL format'),
    nonEmptyString: z.string().trim().min(1, 'String cannot be empty'),
    optionalString: z.string().trim().min(1).optional(),
};
