/**
 * Kysely Query Builder Configuration
 *
 * One pg pool per process, created from the configured connection string
 * and handed to whoever needs it. The product store is only ever read.
 *
 * Usage:
 *   const db = createKysely(config.databaseUrl);
 *   const rows = await db
 *     .selectFrom('products')
 *     .select(['product_id', 'title'])
 *     .where('eol', 'is not', true)
 *     .execute();
 */

import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';
import type { DB } from './types.js';

/**
 * Create a Kysely instance backed by a pg pool
 *
 * @param connectionString - PostgreSQL connection string (DATABASE_URL)
 */
export function createKysely(connectionString: string): Kysely<DB> {
    const pool = new pg.Pool({
        connectionString,
        max: 10,
    });

    return new Kysely<DB>({
        dialect: new PostgresDialect({ pool }),
    });
}

/**
 * Type helper for Kysely instance
 * Use this when typing function parameters that accept a Kysely instance
 */
export type KyselyDB = Kysely<DB>;

/**
 * Re-export table types for convenience
 */
export type { DB } from './types.js';
