/**
 * Centralized Environment Variable Validation
 *
 * All environment variables are validated with Zod before the server starts.
 * `parseEnv` is pure (any source object in, typed env out); `loadEnvOrExit`
 * reads .env via dotenv and fails fast with readable messages.
 *
 * TO ADD A NEW ENV VAR:
 * 1. Add it to the schema below with appropriate validation
 * 2. Add JSDoc comment explaining the variable
 * 3. Map it into the config objects in config/index.ts
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import {
    DEFAULT_RATE_LIMIT,
    DEFAULT_RETRY_POLICY,
    SHOPIFY_DEFAULT_API_VERSION,
    SYNC_DEFAULT_BATCH_SIZE,
} from './sync/shopify.js';

// ============================================
// SCHEMA DEFINITION
// ============================================

const envSchema = z.object({
    // ----------------------------------------
    // REQUIRED - App will not start without these
    // ----------------------------------------

    /** PostgreSQL connection string of the product store */
    DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),

    /** Shopify shop domain (e.g., mystore.myshopify.com or admin.shopify.com/store/mystore) */
    SHOPIFY_SHOP_DOMAIN: z.string().min(1, 'SHOPIFY_SHOP_DOMAIN is required'),

    /** Shopify Admin API access token */
    SHOPIFY_ACCESS_TOKEN: z.string().min(1, 'SHOPIFY_ACCESS_TOKEN is required'),

    // ----------------------------------------
    // OPTIONAL - With sensible defaults
    // ----------------------------------------

    /** Environment mode */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    /** Server port */
    PORT: z.coerce.number().int().positive().default(3001),

    /** Pino level; defaults depend on NODE_ENV */
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

    /** Shopify Admin API version */
    SHOPIFY_API_VERSION: z.string().regex(/^\d{4}-\d{2}$/, 'Expected YYYY-MM').default(SHOPIFY_DEFAULT_API_VERSION),

    // ----------------------------------------
    // SYNC TUNING
    // ----------------------------------------

    /** Batch size used when a request does not name one */
    SYNC_DEFAULT_BATCH_SIZE: z.coerce.number().int().positive().default(SYNC_DEFAULT_BATCH_SIZE),

    /** Sustained request rate towards Shopify */
    SHOPIFY_RATE_LIMIT_PER_SECOND: z.coerce.number().positive().default(DEFAULT_RATE_LIMIT.tokensPerSecond),

    /** Token bucket capacity (burst) */
    SHOPIFY_RATE_LIMIT_BURST: z.coerce.number().int().positive().default(DEFAULT_RATE_LIMIT.capacity),

    /** Retries after the first attempt for 429/5xx/network failures */
    SHOPIFY_MAX_RETRIES: z.coerce.number().int().min(0).default(DEFAULT_RETRY_POLICY.maxRetries),

    /** First backoff delay; doubles per retry */
    SHOPIFY_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_RETRY_POLICY.baseDelayMs),

    /** Upper bound for any single backoff delay */
    SHOPIFY_RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_RETRY_POLICY.maxDelayMs),
});

// ============================================
// TYPE EXPORT
// ============================================

export type Env = z.infer<typeof envSchema>;

// ============================================
// PARSE AND VALIDATE
// ============================================

/**
 * Validate an environment source.
 * @throws z.ZodError naming every variable that failed
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
    return envSchema.parse(source);
}

export function formatEnvIssues(error: z.ZodError): string {
    return error.issues.map(issue => {
        const path = issue.path.join('.');
        return `  - ${path}: ${issue.message}`;
    }).join('\n');
}

/**
 * Load .env into process.env and validate it.
 * Exits the process when validation fails.
 */
export function loadEnvOrExit(): Env {
    dotenv.config();
    try {
        return parseEnv(process.env);
    } catch (error) {
        if (error instanceof z.ZodError) {
            console.error('Environment validation failed:\n' + formatEnvIssues(error));
            process.exit(1);
        }
        throw error;
    }
}
