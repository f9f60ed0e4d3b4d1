import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger.js';
import { ErrorCode, NotFoundError, toAppError, type ErrorResponse } from '../types/errors.js';

/**
 * Centralized error handling middleware
 * Must be registered LAST in Express app
 *
 * Maps every error to the ErrorResponse shape. Operational errors (bad input,
 * missing resources, version conflicts) keep their message and context;
 * anything else is reported as a generic 500.
 */
export function errorHandler(
    err: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
) {
    const appError = toAppError(err);

    // NotFoundError is an expected outcome for lookups, so it is logged at info
    if (err instanceof NotFoundError) {
        logger.info({ message: appError.message, path: req.path, method: req.method }, 'Resource not found');
    } else if (appError.statusCode >= 500) {
        logger.error({
            error: err,
            message: appError.message,
            stack: err instanceof Error ? err.stack : undefined,
            path: req.path,
            method: req.method,
        }, 'Unhandled error');
    } else {
        logger.warn({ code: appError.code, message: appError.message, path: req.path, method: req.method }, 'Request failed');
    }

    const exposeDetails = appError.isOperational;
    const errorResponse: ErrorResponse = {
        error: exposeDetails ? appError.name : 'Internal Server Error',
        code: exposeDetails ? appError.code : ErrorCode.INTERNAL_SERVER_ERROR,
        message: exposeDetails ? appError.message : 'An unexpected error occurred',
        statusCode: appError.statusCode,
        timestamp: new Date().toISOString(),
        path: req.path,
        ...(exposeDetails && appError.context ? { context: appError.context } : {}),
    };

    if (res.headersSent) {
        logger.debug({ path: req.path }, 'Response already sent, error not written');
        return;
    }
    res.status(errorResponse.statusCode).json(errorResponse);
}

/**
 * 404 for routes nothing else matched
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction) {
    next(new NotFoundError('Route', `${req.method} ${req.path}`));
}
