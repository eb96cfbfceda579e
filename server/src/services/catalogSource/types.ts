import type { ImageRow, ProductRow, WarrantyRuleRow } from '@catalog-sync/shared';

export interface FetchProductsOptions {
    limit?: number;
}

/**
 * Read access to the canonical product store.
 * Implementations throw DatabaseError on any driver failure.
 */
export interface RecordSource {
    /** Active (non-EOL) products, ordered by identifier */
    fetchProducts(options?: FetchProductsOptions): Promise<ProductRow[]>;
    /** Requested products, EOL or not; unknown ids are simply absent */
    fetchProductsByIds(productIds: readonly string[]): Promise<ProductRow[]>;
    /** All images, or only those of the given products */
    fetchImages(productIds?: readonly string[]): Promise<ImageRow[]>;
    /** Warranty rules with `percentage` as a fraction (0.05 = 5 %) */
    fetchWarrantyRules(groups?: readonly number[]): Promise<WarrantyRuleRow[]>;
    /** Cheapest read that proves the store is reachable */
    ping(): Promise<void>;
}
