/**
 * Row factories for domain tests. Every column defaults to null.
 */

import { mergeProducts } from '../catalog/productMerger.js';
import type { ImageRow, Product, ProductRow, RemoteListing, WarrantyRuleRow } from '../../types/index.js';

export function productRow(overrides: Partial<ProductRow> = {}): ProductRow {
    return {
        productId: 'A',
        title: null,
        descriptionShort: null,
        longDescription: null,
        manufacturer: null,
        category: null,
        categoryPath: null,
        warranty: null,
        priceB2cInclVat: null,
        priceB2bRegular: null,
        priceB2bDiscounted: null,
        currency: null,
        vatRate: null,
        stock: null,
        stockNextDelivery: null,
        grossWeight: null,
        netWeight: null,
        nonReturnable: null,
        eol: null,
        promotion: null,
        warrantyGroup: null,
        accessoryProducts: null,
        ...overrides,
    };
}

export function imageRow(overrides: Partial<ImageRow> = {}): ImageRow {
    return { productId: 'A', filename: null, payload: null, isPrimary: null, ...overrides };
}

export function ruleRow(overrides: Partial<WarrantyRuleRow> = {}): WarrantyRuleRow {
    return {
        id: 1,
        name: 'Garantie',
        durationMonths: 12,
        percentage: '0.05',
        minimum: '20',
        warrantyGroup: 1,
        ...overrides,
    };
}

/** Single merged product */
export function makeProduct(
    overrides: Partial<ProductRow> = {},
    images: ImageRow[] = [],
    rules: WarrantyRuleRow[] = [],
): Product {
    const { products } = mergeProducts([productRow(overrides)], images, rules);
    return products[0];
}

export function remoteListing(overrides: Partial<RemoteListing> = {}): RemoteListing {
    return {
        remoteId: '1001',
        handle: 'prod-A',
        title: null,
        bodyHtml: null,
        price: null,
        stock: null,
        images: [],
        tags: [],
        metafields: {},
        ...overrides,
    };
}
