/**
 * Custom error classes for better error handling
 * Use these instead of generic Error for specific error types
 */

/**
 * Base interface for custom errors with HTTP status codes
 */
export interface CustomError extends Error {
    readonly statusCode: number;
}

/**
 * Validation error - thrown when input validation fails
 * Use for request bodies and run preconditions (e.g. batch size)
 *
 * @example
 * throw new ValidationError('batchSize must be a positive integer', { batchSize: 0 });
 */
export class ValidationError extends Error implements CustomError {
    readonly name = 'ValidationError' as const;
    readonly statusCode = 400 as const;
    readonly details: unknown;

    constructor(message: string, details: unknown = null) {
        super(message);
        this.details = details;
        Object.setPrototypeOf(this, ValidationError.prototype);
    }
}

/**
 * Not found error - thrown when a resource is not found
 *
 * @example
 * throw new NotFoundError('Route not found', 'route', '/api/unknown');
 */
export class NotFoundError extends Error implements CustomError {
    readonly name = 'NotFoundError' as const;
    readonly statusCode = 404 as const;
    readonly resourceType: string | null;
    readonly resourceId: string | number | null;

    constructor(
        message: string = 'Resource not found',
        resourceType: string | null = null,
        resourceId: string | number | null = null
    ) {
        super(message);
        this.resourceType = resourceType;
        this.resourceId = resourceId;
        Object.setPrototypeOf(this, NotFoundError.prototype);
    }
}

/**
 * External service error - thrown when an external API call fails outside
 * of a per-item upload (e.g. listing the remote catalog)
 *
 * @example
 * throw new ExternalServiceError('Shopify listing failed', 'shopify', originalError);
 */
export class ExternalServiceError extends Error implements CustomError {
    readonly name = 'ExternalServiceError' as const;
    readonly statusCode = 502 as const;
    readonly serviceName: string | null;
    readonly originalError: Error | null;

    constructor(
        message: string,
        serviceName: string | null = null,
        originalError: Error | null = null
    ) {
        super(message);
        this.serviceName = serviceName;
        this.originalError = originalError;
        Object.setPrototypeOf(this, ExternalServiceError.prototype);
    }
}

/**
 * Remote request error - a single remote call failed for good
 *
 * `transient` is true when retries were exhausted (429/5xx/network),
 * false for permanent rejections (other 4xx) that are never retried.
 *
 * @example
 * throw new RemoteRequestError('Shopify API 422: Handle taken', { status: 422, attempts: 1, transient: false });
 */
export class RemoteRequestError extends Error implements CustomError {
    readonly name = 'RemoteRequestError' as const;
    readonly statusCode = 502 as const;
    /** HTTP status of the last response; null when no response arrived */
    readonly remoteStatus: number | null;
    readonly attempts: number;
    readonly transient: boolean;

    constructor(
        message: string,
        options: { status: number | null; attempts: number; transient: boolean }
    ) {
        super(message);
        this.remoteStatus = options.status;
        this.attempts = options.attempts;
        this.transient = options.transient;
        Object.setPrototypeOf(this, RemoteRequestError.prototype);
    }
}

/**
 * Database error - thrown when reading the source store fails
 * Fatal for the run that triggered it.
 *
 * @example
 * throw new DatabaseError('Failed to read products', originalError);
 */
export class DatabaseError extends Error implements CustomError {
    readonly name = 'DatabaseError' as const;
    readonly statusCode = 500 as const;
    readonly originalError: Error | null;

    constructor(message: string, originalError: Error | null = null) {
        super(message);
        this.originalError = originalError;
        Object.setPrototypeOf(this, DatabaseError.prototype);
    }
}

/**
 * Type guard to check if an error is a custom error with statusCode
 */
export function isCustomError(error: unknown): error is CustomError {
    return (
        error instanceof Error &&
        'statusCode' in error &&
        typeof error.statusCode === 'number'
    );
}

/** Normalise an unknown thrown value into an Error */
export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
