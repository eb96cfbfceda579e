/**
 * Server entry point
 *
 * env → config → pg pool, Shopify client, service → HTTP listener.
 * SIGINT/SIGTERM close the listener and the pool before exit.
 */

import type { Server } from 'node:http';
import { loadConfig, loadEnvOrExit } from './config/index.js';
import { createKysely } from './db/kysely.js';
import { KyselyRecordSource } from './services/catalogSource/index.js';
import { createShopifyClient } from './services/shopify/index.js';
import { ReconciliationService } from './services/sync/index.js';
import { createApp } from './app.js';
import logger from './utils/logger.js';
import { ShutdownCoordinator } from './utils/shutdownCoordinator.js';

const config = loadConfig(loadEnvOrExit());

const db = createKysely(config.databaseUrl);
const shopify = createShopifyClient(config.shopify);
const service = new ReconciliationService(new KyselyRecordSource(db), shopify, {
    defaultBatchSize: config.sync.defaultBatchSize,
});

const app = createApp({ service });
const server: Server = app.listen(config.port, () => {
    logger.info(
        { port: config.port, env: config.nodeEnv, shop: shopify.getConfig().shopDomain },
        'catalog-sync server listening'
    );
});

const shutdown = new ShutdownCoordinator();
shutdown.register('http', () => new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
}));
shutdown.register('database', () => db.destroy());

function onSignal(signal: NodeJS.Signals): void {
    logger.info({ signal }, 'Shutdown signal received');
    shutdown.shutdown().then(
        (results) => process.exit(results.every((r) => r.success) ? 0 : 1),
        (error: unknown) => {
            logger.error({ error }, 'Shutdown failed');
            process.exit(1);
        }
    );
}

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);
