/**
 * Configuration objects
 *
 * `loadConfig` turns a validated env into the explicit config objects that
 * constructors receive. Nothing here is a mutable singleton.
 *
 * TO FIND A SPECIFIC CONFIGURATION:
 * 1. Environment variables → config/env.ts
 * 2. Shopify API, rate limit and retry defaults → config/sync/shopify.ts
 */

import type { Env } from './env.js';
import type { RetryPolicy } from '../utils/retry.js';
import type { TokenBucketOptions } from '../utils/tokenBucket.js';
import type { ShopifyClientConfig } from '../services/shopify/types.js';
import { DEFAULT_RETRY_POLICY } from './sync/shopify.js';

export { parseEnv, loadEnvOrExit, formatEnvIssues } from './env.js';
export type { Env } from './env.js';
export * from './sync/shopify.js';

// ============================================
// TYPES
// ============================================

export interface ShopifyConfig {
    api: ShopifyClientConfig;
    rateLimit: TokenBucketOptions;
    retry: RetryPolicy;
}

export interface SyncConfig {
    defaultBatchSize: number;
}

export interface AppConfig {
    nodeEnv: Env['NODE_ENV'];
    port: number;
    databaseUrl: string;
    shopify: ShopifyConfig;
    sync: SyncConfig;
}

// ============================================
// BUILD
// ============================================

export function loadConfig(env: Env): AppConfig {
    return {
        nodeEnv: env.NODE_ENV,
        port: env.PORT,
        databaseUrl: env.DATABASE_URL,
        shopify: {
            api: {
                shopDomain: env.SHOPIFY_SHOP_DOMAIN,
                accessToken: env.SHOPIFY_ACCESS_TOKEN,
                apiVersion: env.SHOPIFY_API_VERSION,
            },
            rateLimit: {
                tokensPerSecond: env.SHOPIFY_RATE_LIMIT_PER_SECOND,
                capacity: env.SHOPIFY_RATE_LIMIT_BURST,
            },
            retry: {
                maxRetries: env.SHOPIFY_MAX_RETRIES,
                baseDelayMs: env.SHOPIFY_RETRY_BASE_DELAY_MS,
                maxDelayMs: env.SHOPIFY_RETRY_MAX_DELAY_MS,
                jitterRatio: DEFAULT_RETRY_POLICY.jitterRatio,
            },
        },
        sync: {
            defaultBatchSize: env.SYNC_DEFAULT_BATCH_SIZE,
        },
    };
}
