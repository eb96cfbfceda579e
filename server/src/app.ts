/**
 * Express application
 *
 * Built from explicit dependencies so tests can mount it over in-memory
 * stand-ins without a database or the remote platform.
 */

import express from 'express';
import type { Express } from 'express';
import { requestLogger } from './utils/logger.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createHealthRouter } from './routes/health.js';
import { createCatalogRouter } from './routes/catalog.js';
import type { ReconciliationService } from './services/sync/index.js';

export interface AppDependencies {
    service: ReconciliationService;
}

export function createApp({ service }: AppDependencies): Express {
    const app = express();

    app.disable('x-powered-by');
    app.use(express.json({ limit: '1mb' }));
    app.use(requestLogger);

    app.use('/api/health', createHealthRouter(service));
    app.use('/api/catalog', createCatalogRouter(service));

    // Must come after all routes
    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
}

export { ReconciliationService } from './services/sync/index.js';
export type { RecordSource } from './services/catalogSource/index.js';
export type { RemoteCatalogClient } from './services/shopify/index.js';
