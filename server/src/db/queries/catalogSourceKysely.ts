/**
 * Kysely Catalog Source Queries
 *
 * Read-only queries over products, product_images and warranty_options.
 * Query builders are exported separately from their execution so the SQL
 * can be checked without a database.
 */

import type { KyselyDB } from '../kysely.js';
import type { ProductImageRecord, ProductRecord, WarrantyOptionRecord } from '../types.js';

// ============================================
// CONSTANTS
// ============================================

/**
 * Ids per `IN (...)` list. Postgres caps a statement at 65535 bind
 * parameters, so longer id lists are read in several queries.
 */
export const ID_CHUNK_SIZE = 10_000;

// ============================================
// INPUT TYPES
// ============================================

export interface ProductsQueryParams {
    limit?: number;
}

// ============================================
// QUERY BUILDERS
// ============================================

/** Active (non-EOL) products, ordered by id */
export function activeProductsQuery(db: KyselyDB, params: ProductsQueryParams = {}) {
    let query = db
        .selectFrom('products')
        .selectAll()
        .where((eb) => eb.or([eb('eol', 'is', null), eb('eol', '=', false)]))
        .orderBy('product_id');

    if (params.limit !== undefined) {
        query = query.limit(params.limit);
    }
    return query;
}

/** Products by id regardless of EOL; explicit requests win over the filter */
export function productsByIdsQuery(db: KyselyDB, productIds: readonly string[]) {
    return db
        .selectFrom('products')
        .selectAll()
        .where('product_id', 'in', [...productIds])
        .orderBy('product_id');
}

export function productImagesQuery(db: KyselyDB, productIds?: readonly string[]) {
    let query = db
        .selectFrom('product_images')
        .select(['id', 'supplier_aid', 'filename', 'image_data', 'is_primary'])
        .orderBy('supplier_aid')
        .orderBy('id');

    if (productIds) {
        query = query.where('supplier_aid', 'in', [...productIds]);
    }
    return query;
}

export function warrantyOptionsQuery(db: KyselyDB, groups?: readonly number[]) {
    let query = db
        .selectFrom('warranty_options')
        .selectAll()
        .orderBy('warranty_group')
        .orderBy('id');

    if (groups) {
        query = query.where('warranty_group', 'in', [...groups]);
    }
    return query;
}

/** Smallest read that proves the connection and the products table */
export function connectionCheckQuery(db: KyselyDB) {
    return db
        .selectFrom('products')
        .select('product_id')
        .limit(1);
}

// ============================================
// EXECUTION
// ============================================

export async function fetchActiveProductsKysely(db: KyselyDB, params: ProductsQueryParams = {}): Promise<ProductRecord[]> {
    return activeProductsQuery(db, params).execute();
}

function chunkIds(ids: readonly string[], size: number = ID_CHUNK_SIZE): string[][] {
    const sorted = [...ids].sort();
    const chunks: string[][] = [];
    for (let i = 0; i < sorted.length; i += size) {
        chunks.push(sorted.slice(i, i + size));
    }
    return chunks;
}

/** Chunks run one after another on the same pool */
async function executeChunked<T>(ids: readonly string[], run: (chunk: string[]) => Promise<T[]>): Promise<T[]> {
    const rows: T[] = [];
    for (const chunk of chunkIds(ids)) {
        rows.push(...await run(chunk));
    }
    return rows;
}

export async function fetchProductsByIdsKysely(db: KyselyDB, productIds: readonly string[]): Promise<ProductRecord[]> {
    return executeChunked(productIds, (chunk) => productsByIdsQuery(db, chunk).execute());
}

export async function fetchProductImagesKysely(db: KyselyDB, productIds?: readonly string[]): Promise<ProductImageRecord[]> {
    if (!productIds) return productImagesQuery(db).execute();
    return executeChunked(productIds, (chunk) => productImagesQuery(db, chunk).execute());
}

export async function fetchWarrantyOptionsKysely(db: KyselyDB, groups?: readonly number[]): Promise<WarrantyOptionRecord[]> {
    if (groups && groups.length === 0) return [];
    return warrantyOptionsQuery(db, groups).execute();
}

export async function checkConnectionKysely(db: KyselyDB): Promise<Array<{ product_id: string }>> {
    return connectionCheckQuery(db).execute();
}
