/**
 * GraphQL product node → RemoteListing
 */

import type { Decimal } from 'decimal.js';
import { InvalidNumberError, toDecimal } from '@catalog-sync/shared';
import type { RemoteListing } from '@catalog-sync/shared';
import type { ListingNode } from './graphql.js';

const GID_PATTERN = /^gid:\/\/shopify\/Product\/(\d+)$/;

/** Numeric id from `gid://shopify/Product/123`; other ids pass through */
export function remoteIdFromGid(gid: string): string {
    return GID_PATTERN.exec(gid)?.[1] ?? gid;
}

export function parseListingNode(node: ListingNode): RemoteListing {
    const variant = node.variants?.nodes[0];
    const metafields: Record<string, string> = {};
    for (const field of node.metafields?.nodes ?? []) {
        metafields[field.key] = field.value;
    }

    return {
        remoteId: remoteIdFromGid(node.id),
        handle: node.handle,
        title: node.title,
        bodyHtml: node.descriptionHtml ?? null,
        // Unreadable prices surface as null and show up as a price delta
        price: variant?.price == null ? null : safeDecimal(variant.price),
        stock: variant?.inventoryQuantity ?? null,
        images: (node.images?.nodes ?? []).map((image) => ({ src: image.url, alt: image.altText })),
        tags: node.tags,
        metafields,
    };
}

function safeDecimal(value: string | number): Decimal | null {
    try {
        return toDecimal(value);
    } catch (error) {
        if (error instanceof InvalidNumberError) return null;
        throw error;
    }
}
