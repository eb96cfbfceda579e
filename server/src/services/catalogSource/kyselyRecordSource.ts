import type { ImageRow, ProductRow, WarrantyRuleRow } from '@catalog-sync/shared';
import type { KyselyDB } from '../../db/kysely.js';
import {
    checkConnectionKysely,
    fetchActiveProductsKysely,
    fetchProductImagesKysely,
    fetchProductsByIdsKysely,
    fetchWarrantyOptionsKysely,
} from '../../db/queries/index.js';
import { DatabaseError, toError } from '../../utils/errors.js';
import { sourceLogger } from '../../utils/logger.js';
import { toImageRow, toProductRow, toWarrantyRuleRow } from './mappers.js';
import type { FetchProductsOptions, RecordSource } from './types.js';

/**
 * RecordSource over the PostgreSQL product store
 */
export class KyselyRecordSource implements RecordSource {
    constructor(private readonly db: KyselyDB) {}

    async fetchProducts(options: FetchProductsOptions = {}): Promise<ProductRow[]> {
        const records = await this.read('products', () => fetchActiveProductsKysely(this.db, options));
        return records.map(toProductRow);
    }

    async fetchProductsByIds(productIds: readonly string[]): Promise<ProductRow[]> {
        const records = await this.read('products by id', () => fetchProductsByIdsKysely(this.db, productIds));
        return records.map(toProductRow);
    }

    async fetchImages(productIds?: readonly string[]): Promise<ImageRow[]> {
        const records = await this.read('product images', () => fetchProductImagesKysely(this.db, productIds));
        return records.map(toImageRow);
    }

    async fetchWarrantyRules(groups?: readonly number[]): Promise<WarrantyRuleRow[]> {
        const records = await this.read('warranty options', () => fetchWarrantyOptionsKysely(this.db, groups));
        return records.map(toWarrantyRuleRow);
    }

    async ping(): Promise<void> {
        await this.read('connection check', () => checkConnectionKysely(this.db));
    }

    private async read<T>(what: string, query: () => Promise<T[]>): Promise<T[]> {
        const start = Date.now();
        try {
            const rows = await query();
            sourceLogger.debug({ what, rows: rows.length, durationMs: Date.now() - start }, 'Source read');
            return rows;
        } catch (error: unknown) {
            const cause = toError(error);
            sourceLogger.error({ what, error: cause.message }, 'Source read failed');
            throw new DatabaseError(`Failed to read ${what}: ${cause.message}`, cause);
        }
    }
}
