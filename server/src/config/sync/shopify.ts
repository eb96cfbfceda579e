/**
 * Shopify Sync Configuration
 *
 * Defaults for talking to the Shopify Admin API and for scheduling uploads.
 * Environment variables (config/env.ts) override the tunable ones.
 */

// ============================================
// API SETTINGS
// ============================================

export const SHOPIFY_DEFAULT_API_VERSION = '2024-10';

/**
 * Number of products fetched per GraphQL page when listing the catalog
 */
export const SHOPIFY_PAGE_SIZE = 50;

/**
 * Metafields requested per product when listing
 */
export const SHOPIFY_METAFIELDS_PER_PRODUCT = 25;

/**
 * Images requested per product when listing (only the first is compared)
 */
export const SHOPIFY_IMAGES_PER_PRODUCT = 5;

export const SHOPIFY_REQUEST_TIMEOUT_MS = 30_000;

// ============================================
// RATE LIMIT & RETRY
// ============================================

/**
 * Shopify's REST leaky bucket: 2 requests/second sustained, 40 burst
 */
export const DEFAULT_RATE_LIMIT = {
    tokensPerSecond: 2,
    capacity: 40,
} as const;

/**
 * Retries after the first attempt, i.e. at most maxRetries + 1 requests.
 * Delay = min(maxDelayMs, baseDelayMs × 2^retry) ± jitter.
 */
export const DEFAULT_RETRY_POLICY = {
    maxRetries: 5,
    baseDelayMs: 500,
    maxDelayMs: 30_000,
    jitterRatio: 0.2,
} as const;

// ============================================
// SYNC DEFAULTS
// ============================================

export const SYNC_DEFAULT_BATCH_SIZE = 5;
