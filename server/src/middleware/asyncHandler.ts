/**
 * Async Handler & Typed Route Middleware
 *
 * asyncHandler - wraps async route handlers to catch errors automatically
 * typedRoute  - combines Zod validation + asyncHandler for type-safe routes
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { z } from 'zod';

// ============================================
// Core types
// ============================================

type AsyncRequestHandler = (
    req: Request,
    res: Response,
    next: NextFunction
) => Promise<void | Response>;

/** Request carrying the parsed input after Zod validation */
export type TypedRequest<TInput> = Request & { validatedBody: TInput };

type TypedHandler<TInput> = (
    req: TypedRequest<TInput>,
    res: Response,
) => Promise<void | Response>;

/** Where typedRoute reads its input from */
export type InputSource = 'body' | 'query';

// ============================================
// asyncHandler - for unvalidated routes
// ============================================

export function asyncHandler(fn: AsyncRequestHandler): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
}

// ============================================
// typedRoute - Zod validation + asyncHandler
// ============================================

function validationResponse(res: Response, error: z.ZodError, fallback: string): void {
    res.status(400).json({
        error: error.issues[0]?.message || fallback,
        type: 'ValidationError',
        details: error.issues.map((issue: z.ZodIssue) => ({
            path: issue.path.join('.'),
            message: issue.message,
        })),
    });
}

/**
 * Validates the request body (or query) and hands the parsed value to the
 * handler as `req.validatedBody`. Returns a RequestHandler[] to spread into
 * router methods.
 *
 * @example
 * router.post('/reconcile', ...typedRoute(reconcileRequestSchema, async (req, res) => {
 *     const { dryRun } = req.validatedBody; // ← fully typed
 *     res.json(await service.reconcile(req.validatedBody));
 * }));
 */
export function typedRoute<TInput>(
    schema: z.ZodType<TInput, z.ZodTypeDef, unknown>,
    handler: TypedHandler<TInput>,
    source: InputSource = 'body',
): RequestHandler[] {
    return [
        asyncHandler(async (req, res) => {
            const result = schema.safeParse(source === 'body' ? req.body : req.query);
            if (!result.success) {
                validationResponse(res, result.error, source === 'body' ? 'Validation failed' : 'Invalid query');
                return;
            }
            await handler(Object.assign(req, { validatedBody: result.data }), res);
        }),
    ];
}

export default asyncHandler;
