/**
 * Product → Shopify REST payload
 *
 * Built from the listing projection so that what we upload is exactly what
 * the differencer later compares against.
 */

import {
    METAFIELD_NAMESPACE,
    METAFIELD_TYPES,
    WARRANTY_OPTION_NAME,
    imageExtension,
    projectListing,
} from '@catalog-sync/shared';
import type { MetafieldKey, Product, ProductImage } from '@catalog-sync/shared';
import type {
    PayloadOptions,
    ShopifyImageInput,
    ShopifyMetafieldInput,
    ShopifyProductInput,
    ShopifyVariantInput,
} from './types.js';

function isMetafieldKey(key: string): key is MetafieldKey {
    return key in METAFIELD_TYPES;
}

/** Images without a source filename are named after the handle and sniffed type */
function toImages(handle: string, primary: ProductImage | null, additional: ProductImage[]): ShopifyImageInput[] {
    const ordered = primary ? [primary, ...additional] : additional;
    return ordered.map((image, index) => ({
        attachment: image.base64,
        filename: image.sourceRef ?? `${handle}-${index + 1}.${imageExtension(image.base64)}`,
        ...(image.sourceRef ? { alt: image.sourceRef } : {}),
        position: index + 1,
    }));
}

export function buildProductPayload(product: Product, options: PayloadOptions = { includeImages: true }): ShopifyProductInput {
    const listing = projectListing(product);

    const variants = listing.variants.map((variant): ShopifyVariantInput => ({
        option1: variant.label,
        price: variant.price,
        sku: variant.sku,
        inventory_management: 'shopify',
        inventory_policy: 'deny',
        ...(variant.inventoryQuantity !== null ? { inventory_quantity: variant.inventoryQuantity } : {}),
        ...(listing.weightKg !== null ? { weight: listing.weightKg } : {}),
        weight_unit: 'kg',
    }));

    const metafields: ShopifyMetafieldInput[] = [];
    for (const [key, value] of Object.entries(listing.metafields)) {
        if (value === undefined || !isMetafieldKey(key)) continue;
        metafields.push({ namespace: METAFIELD_NAMESPACE, key, value, type: METAFIELD_TYPES[key] });
    }

    const payload: ShopifyProductInput = {
        title: listing.title,
        handle: listing.handle,
        body_html: listing.bodyHtml,
        tags: listing.tags.join(', '),
        options: [{ name: WARRANTY_OPTION_NAME, values: [...new Set(variants.map((v) => v.option1))] }],
        variants,
        metafields,
    };
    if (listing.vendor) payload.vendor = listing.vendor;
    if (listing.productType) payload.product_type = listing.productType;

    const images = toImages(listing.handle, listing.primaryImage, listing.additionalImages);
    if (options.includeImages && images.length > 0) payload.images = images;

    return payload;
}
