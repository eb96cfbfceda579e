/**
 * Catalog Router
 * Reconciliation runs, selective sync/delete, change-set preview and remote export
 */

import { Router } from 'express';
import {
    deleteAllRequestSchema,
    deleteByIdsRequestSchema,
    previewQuerySchema,
    reconcileRequestSchema,
    syncByIdsRequestSchema,
} from '@catalog-sync/shared';
import { asyncHandler, typedRoute } from '../middleware/asyncHandler.js';
import type { ReconciliationService } from '../services/sync/index.js';

export function createCatalogRouter(service: ReconciliationService): Router {
    const router = Router();

    // ============================================
    // RUNS
    // ============================================

    /**
     * Full reconciliation. Body: { dryRun?, batchSize?, productLimit?, includeDeletes? }
     */
    router.post('/reconcile', ...typedRoute(reconcileRequestSchema, async (req, res) => {
        res.json(await service.reconcile(req.validatedBody));
    }));

    router.post('/sync-by-ids', ...typedRoute(syncByIdsRequestSchema, async (req, res) => {
        res.json(await service.syncByIds(req.validatedBody));
    }));

    router.post('/delete-by-ids', ...typedRoute(deleteByIdsRequestSchema, async (req, res) => {
        res.json(await service.deleteByIds(req.validatedBody));
    }));

    /**
     * Remove every listing carrying the handle prefix. Body: { confirm: true, dryRun?, batchSize? }
     */
    router.post('/delete-all', ...typedRoute(deleteAllRequestSchema, async (req, res) => {
        res.json(await service.deleteAll(req.validatedBody));
    }));

    // ============================================
    // READ-ONLY
    // ============================================

    router.get('/preview', ...typedRoute(previewQuerySchema, async (req, res) => {
        const { limit, includeImages } = req.validatedBody;
        res.json(await service.previewChangeSet({ productLimit: limit, includeImages }));
    }, 'query'));

    router.get('/remote', asyncHandler(async (_req, res) => {
        const listings = await service.exportRemote();
        res.json({ count: listings.length, listings });
    }));

    return router;
}
