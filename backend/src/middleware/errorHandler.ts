/**
 * Error Handler Middleware
 * 
 * Global error handling with consistent JSON responses.
 * Every error body carries a human-readable `detail` string.
 */

import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger } from '../logger.js';
import { isProduction } from '../config.js';

/**
 * Custom API error class
 */
export class ApiError extends Error {
    statusCode: number;
    code: string;
    details?: unknown;

    constructor(
        message: string,
        statusCode: number = 500,
        code: string = 'INTERNAL_ERROR',
        details?: unknown
    ) {
        super(message);
        this.name = 'ApiError';
        this.statusCode = statusCode;
        this.code = code;
        this.details = details;
    }

    static forbidden(message: string = 'Forbidden') {
        return new ApiError(message, 403, 'FORBIDDEN');
    }

    static notFound(message: string = 'Not found') {
        return new ApiError(message, 404, 'NOT_FOUND');
    }

    static conflict(message: string, details?: unknown) {
        return new ApiError(message, 409, 'CONFLICT', details);
    }
}

// PostgreSQL SQLSTATE codes
const PG_UNIQUE_VIOLATION = '23505';
const PG_FOREIGN_KEY_VIOLATION = '23503';

/**
 * Find the SQLSTATE of a driver error. Drizzle wraps driver errors, so the
 * code may sit anywhere along the `cause` chain.
 */
export function getPgErrorCode(err: unknown): string | undefined {
    let current: unknown = err;
    for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
        if ('code' in current && typeof current.code === 'string' && /^[0-9A-Z]{5}$/.test(current.code)) {
            return current.code;
        }
        current = current.cause;
    }
    return undefined;
}

/**
 * Not found handler for unmatched routes
 */
export function notFoundHandler(
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    res.status(404).json({
        error: 'NOT_FOUND',
        detail: `Route ${req.method} ${req.path} not found`,
    });
}

/**
 * Global error handler
 */
export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    const requestId = req.headers['x-request-id'] || 'unknown';

    if (err instanceof ApiError) {
        if (err.statusCode >= 500) {
            logger.error({ err, requestId, path: req.path }, err.message);
        } else {
            logger.warn({ requestId, path: req.path, code: err.code }, err.message);
        }

        res.status(err.statusCode).json({
            error: err.code,
            detail: err.message,
            ...(err.details !== undefined && { details: err.details }),
        });
        return;
    }

    if (err instanceof ZodError) {
        logger.warn({ requestId, path: req.path, errors: err.errors }, 'Validation error');
        res.status(400).json({
            error: 'VALIDATION_ERROR',
            detail: 'Invalid request data',
            issues: err.errors.map((e) => ({
                path: e.path.join('.'),
                message: e.message,
            })),
        });
        return;
    }

    // body-parser rejects malformed JSON with a SyntaxError carrying status 400
    if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
        logger.warn({ requestId, path: req.path }, 'Malformed JSON body');
        res.status(400).json({
            error: 'BAD_REQUEST',
            detail: 'Malformed JSON body',
        });
        return;
    }

    const pgCode = getPgErrorCode(err);

    if (pgCode === PG_UNIQUE_VIOLATION) {
        logger.warn({ requestId, path: req.path }, 'Unique constraint violation');
        res.status(409).json({
            error: 'CONFLICT',
            detail: 'A record with this value already exists',
        });
        return;
    }

    if (pgCode === PG_FOREIGN_KEY_VIOLATION) {
        logger.warn({ requestId, path: req.path }, 'Foreign key violation');
        res.status(404).json({
            error: 'NOT_FOUND',
            detail: 'Referenced record not found',
        });
        return;
    }

    logger.error({ err, requestId, path: req.path }, 'Unhandled error');

    res.status(500).json({
        error: 'INTERNAL_ERROR',
        detail: isProduction
            ? 'An unexpected error occurred'
            : err.message,
    });
}

/**
 * Async handler wrapper to catch async errors
 */
export function asyncHandler<T>(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
) {
    return (req: Request, res: Response, next: NextFunction): void => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
}
