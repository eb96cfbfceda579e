/**
 * GraphQL documents and response schemas for catalog listing
 *
 * Responses are validated with Zod so a schema drift on the remote side
 * fails loudly instead of producing half-empty listings.
 */

import { z } from 'zod';
import {
    SHOPIFY_IMAGES_PER_PRODUCT,
    SHOPIFY_METAFIELDS_PER_PRODUCT,
} from '../../config/sync/shopify.js';

export const LIST_PRODUCTS_QUERY = `
    query ListCatalogProducts($first: Int!, $after: String) {
        products(first: $first, after: $after, sortKey: ID) {
            pageInfo {
                hasNextPage
                endCursor
            }
            nodes {
                id
                handle
                title
                descriptionHtml
                tags
                images(first: ${SHOPIFY_IMAGES_PER_PRODUCT}) {
                    nodes {
                        url
                        altText
                    }
                }
                variants(first: 1) {
                    nodes {
                        price
                        inventoryQuantity
                    }
                }
                metafields(first: ${SHOPIFY_METAFIELDS_PER_PRODUCT}, namespace: "custom") {
                    nodes {
                        key
                        value
                    }
                }
            }
        }
    }
`;

// ============================================
// RESPONSE SCHEMAS
// ============================================

export const listingNodeSchema = z.object({
    id: z.string(),
    handle: z.string(),
    title: z.string().nullable(),
    descriptionHtml: z.string().nullable().optional(),
    tags: z.array(z.string()).default([]),
    images: z.object({
        nodes: z.array(z.object({ url: z.string(), altText: z.string().nullable() })),
    }).optional(),
    variants: z.object({
        nodes: z.array(z.object({
            price: z.union([z.string(), z.number()]).nullable(),
            inventoryQuantity: z.number().int().nullable(),
        })),
    }).optional(),
    metafields: z.object({
        nodes: z.array(z.object({ key: z.string(), value: z.string() })),
    }).optional(),
});

export type ListingNode = z.infer<typeof listingNodeSchema>;

export const productsPageSchema = z.object({
    products: z.object({
        pageInfo: z.object({
            hasNextPage: z.boolean(),
            endCursor: z.string().nullable(),
        }),
        nodes: z.array(listingNodeSchema),
    }),
});

export type ProductsPage = z.infer<typeof productsPageSchema>;

/**
 * GraphQL envelope. `errors` may accompany partial data; THROTTLED is
 * reported here with a 200 status.
 */
export const graphQLEnvelopeSchema = z.object({
    data: z.unknown().optional(),
    errors: z.array(z.object({
        message: z.string(),
        extensions: z.object({ code: z.string().optional() }).passthrough().optional(),
    })).optional(),
});

// ============================================
// SHOP
// ============================================

export const SHOP_QUERY = `
    query ShopName {
        shop {
            name
        }
    }
`;

export const shopSchema = z.object({
    shop: z.object({ name: z.string() }),
});
