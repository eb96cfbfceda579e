import { z } from 'zod';
import type { Product, RemoteListing } from '@catalog-sync/shared';
import { shopifyLogger } from '../../utils/logger.js';
import { SHOPIFY_PAGE_SIZE } from '../../config/sync/shopify.js';
import { LIST_PRODUCTS_QUERY, productsPageSchema, type ProductsPage } from './graphql.js';
import { parseListingNode } from './listing.js';
import { buildProductPayload } from './payload.js';
import type { PayloadOptions, RemoteMutationResult, ShopifyClientContext } from './types.js';

const productResponseSchema = z.object({
    product: z.object({
        id: z.union([z.number(), z.string()]),
        handle: z.string(),
    }),
});

function toMutationResult(data: unknown): RemoteMutationResult {
    const { product } = productResponseSchema.parse(data);
    return { remoteId: String(product.id), handle: product.handle };
}

/**
 * Fetch ALL products via GraphQL cursor pagination.
 * Listings are keyed by remote id, so a page served twice (or out of order)
 * does not produce duplicates.
 */
export async function listAllProducts(
    ctx: ShopifyClientContext,
    pageSize: number = SHOPIFY_PAGE_SIZE
): Promise<RemoteListing[]> {
    const byRemoteId = new Map<string, RemoteListing>();
    let after: string | null = null;
    let pages = 0;

    for (;;) {
        const page: ProductsPage = await ctx.executeGraphQL(
            LIST_PRODUCTS_QUERY,
            { first: pageSize, after },
            productsPageSchema,
        );
        pages++;

        for (const node of page.products.nodes) {
            const listing = parseListingNode(node);
            byRemoteId.set(listing.remoteId, listing);
        }

        const { hasNextPage, endCursor } = page.products.pageInfo;
        if (!hasNextPage || !endCursor || endCursor === after) break;
        after = endCursor;
    }

    shopifyLogger.info({ pages, products: byRemoteId.size }, 'Fetched remote catalog');
    return [...byRemoteId.values()];
}

export async function createProduct(ctx: ShopifyClientContext, product: Product): Promise<RemoteMutationResult> {
    const payload = buildProductPayload(product, { includeImages: true });
    const response = await ctx.executeWithRetry<unknown>(
        () => ctx.client.post('/products.json', { product: payload })
    );
    const result = toMutationResult(response.data);
    shopifyLogger.debug({ handle: result.handle, remoteId: result.remoteId }, 'Created product');
    return result;
}

export async function updateProduct(
    ctx: ShopifyClientContext,
    remoteId: string,
    product: Product,
    options: PayloadOptions
): Promise<RemoteMutationResult> {
    const payload = { ...buildProductPayload(product, options), id: Number(remoteId) };
    const response = await ctx.executeWithRetry<unknown>(
        () => ctx.client.put(`/products/${remoteId}.json`, { product: payload })
    );
    const result = toMutationResult(response.data);
    shopifyLogger.debug({ handle: result.handle, remoteId, withImages: options.includeImages }, 'Updated product');
    return result;
}

export async function deleteProduct(ctx: ShopifyClientContext, remoteId: string): Promise<void> {
    await ctx.executeWithRetry<unknown>(
        () => ctx.client.delete(`/products/${remoteId}.json`)
    );
    shopifyLogger.debug({ remoteId }, 'Deleted product');
}
