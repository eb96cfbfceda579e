/**
 * Centralized Error Handler Middleware
 * Handles all errors thrown in async routes and provides consistent error responses
 *
 * Must be added AFTER all routes in Express app:
 * app.use(notFoundHandler);
 * app.use(errorHandler);
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import {
    ValidationError,
    NotFoundError,
    ExternalServiceError,
    RemoteRequestError,
    DatabaseError,
    isCustomError,
    toError,
} from '../utils/errors.js';
import { httpLogger } from '../utils/logger.js';

export interface ErrorResponse {
    status: number;
    body: { error: string; type: string } & Record<string, unknown>;
}

/**
 * Map an error to its HTTP status and JSON body.
 * Internal details (DB messages, stacks) are only exposed when `dev` is set.
 */
export function toErrorResponse(err: Error, dev: boolean): ErrorResponse {
    if (err instanceof ValidationError) {
        return {
            status: 400,
            body: { error: err.message, type: 'ValidationError', details: err.details },
        };
    }

    if (err instanceof NotFoundError) {
        return {
            status: 404,
            body: {
                error: err.message,
                type: 'NotFoundError',
                resourceType: err.resourceType,
                resourceId: err.resourceId,
            },
        };
    }

    if (err instanceof RemoteRequestError) {
        return {
            status: 502,
            body: {
                error: err.message,
                type: 'RemoteRequestError',
                remoteStatus: err.remoteStatus,
                attempts: err.attempts,
                transient: err.transient,
            },
        };
    }

    if (err instanceof ExternalServiceError) {
        return {
            status: 502,
            body: { error: err.message, type: 'ExternalServiceError', service: err.serviceName },
        };
    }

    if (err instanceof DatabaseError) {
        return {
            status: 500,
            body: {
                error: 'Database operation failed',
                type: 'DatabaseError',
                ...(dev && { details: err.message }),
            },
        };
    }

    if (err instanceof ZodError) {
        return {
            status: 400,
            body: {
                error: 'Validation failed',
                type: 'ValidationError',
                details: err.issues.map(issue => ({
                    path: issue.path.join('.'),
                    message: issue.message,
                })),
            },
        };
    }

    // body-parser and other errors carrying a statusCode keep it
    const status = isCustomError(err) ? err.statusCode : 500;
    return {
        status,
        body: {
            error: status >= 500 && !dev ? 'Internal server error' : err.message || 'Internal server error',
            type: err.name || 'Error',
            ...(dev && { stack: err.stack }),
        },
    };
}

/**
 * Catch-all for unmatched routes
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
    next(new NotFoundError(`Route not found: ${req.method} ${req.path}`, 'route', req.path));
}

/**
 * Global error handling middleware
 * Catches all errors and formats consistent responses
 */
export const errorHandler: ErrorRequestHandler = (
    thrown: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
): void => {
    const dev = process.env.NODE_ENV === 'development';
    const err = toError(thrown);
    const { status, body } = toErrorResponse(err, dev);

    const logData = {
        method: req.method,
        path: req.path,
        status,
        error: err.message,
        type: err.name,
        ...(dev && { stack: err.stack }),
    };
    if (status >= 500) {
        httpLogger.error(logData, 'Request failed');
    } else {
        httpLogger.warn(logData, 'Request rejected');
    }

    res.status(status).json(body);
};

export default errorHandler;
