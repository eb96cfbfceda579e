/**
 * Health Router
 * Liveness, plus a connection check against the product store and the remote platform
 */

import { Router } from 'express';
import { asyncHandler } from '../middleware/asyncHandler.js';
import type { ReconciliationService } from '../services/sync/index.js';

export function createHealthRouter(service: ReconciliationService): Router {
    const router = Router();

    router.get('/', (_req, res) => {
        res.json({ status: 'ok' });
    });

    /**
     * 200 when both sides answer, 503 otherwise; the body names the failing side
     */
    router.get('/connections', asyncHandler(async (_req, res) => {
        const report = await service.testConnections();
        const healthy = report.database.status === 'connected' && report.shopify.status === 'connected';
        res.status(healthy ? 200 : 503).json({ status: healthy ? 'ok' : 'degraded', connections: report });
    }));

    return router;
}
