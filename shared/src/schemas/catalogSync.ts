/**
 * Catalog Sync Zod Schemas
 *
 * Request bodies and query strings of the catalog sync endpoints.
 * Only shape is checked here; batch size positivity is enforced by the
 * scheduler so a run has exactly one precondition check.
 */

import { z } from 'zod';

// ============================================
// COMMON
// ============================================

export const productIdListSchema = z
    .array(z.string().trim().min(1, 'Product id must not be empty'))
    .min(1, 'At least one product id is required')
    .max(1000, 'At most 1000 product ids per request');

const batchSizeSchema = z.number().int('batchSize must be an integer').optional();

// ============================================
// REQUEST SCHEMAS
// ============================================

export const reconcileRequestSchema = z.object({
    dryRun: z.boolean().default(false),
    batchSize: batchSizeSchema,
    productLimit: z.number().int().positive().optional(),
    includeDeletes: z.boolean().default(false),
});

export type ReconcileRequest = z.infer<typeof reconcileRequestSchema>;

export const syncByIdsRequestSchema = z.object({
    productIds: productIdListSchema,
    dryRun: z.boolean().default(false),
    createIfMissing: z.boolean().default(true),
    batchSize: batchSizeSchema,
});

export type SyncByIdsRequest = z.infer<typeof syncByIdsRequestSchema>;

export const deleteByIdsRequestSchema = z.object({
    productIds: productIdListSchema,
    dryRun: z.boolean().default(false),
    batchSize: batchSizeSchema,
});

export type DeleteByIdsRequest = z.infer<typeof deleteByIdsRequestSchema>;

/** Deletes every listing under the handle prefix; `confirm` must be sent explicitly */
export const deleteAllRequestSchema = z.object({
    confirm: z.literal(true, {
        errorMap: () => ({ message: 'confirm must be true to delete all managed listings' }),
    }),
    dryRun: z.boolean().default(false),
    batchSize: batchSizeSchema,
});

export type DeleteAllRequest = z.infer<typeof deleteAllRequestSchema>;

export const previewQuerySchema = z.object({
    limit: z.coerce.number().int().positive().optional(),
    /** Attach each product's primary image as a data URI */
    includeImages: z.enum(['true', 'false']).transform((value) => value === 'true').optional(),
});

export type PreviewQuery = z.infer<typeof previewQuerySchema>;
