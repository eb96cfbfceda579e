/**
 * Listing projection
 *
 * What a Product looks like once it is on the remote platform. The upload
 * payload is built from this view and the differencer compares remote
 * listings against it, so both always agree on what "in sync" means.
 */

import type { Decimal } from 'decimal.js';
import { formatMoney } from './money.js';
import { toHandle } from './handle.js';
import { tierLabel, tierVariantPrice } from './warranty.js';
import type { Product, ProductImage, ProductPricing } from '../../types/index.js';

// ============================================
// CONSTANTS
// ============================================

export const DEFAULT_TITLE = 'Untitled Product';
export const STANDARD_VARIANT_LABEL = 'Standard';
export const WARRANTY_OPTION_NAME = 'Garantie';
export const METAFIELD_NAMESPACE = 'custom';

/** Metafield keys under the `custom` namespace */
export const METAFIELD_KEYS = {
    warranty: 'warranty',
    stock: 'Inventarbestand',
    stockNextDelivery: 'StockNextDelivery',
    priceB2bRegular: 'Price_B2B_Regular',
    priceB2bDiscounted: 'Price_B2B_Discounted',
    descriptionShort: 'description_short',
    accessories: 'verwandte_produkte',
} as const;

export type MetafieldKey = (typeof METAFIELD_KEYS)[keyof typeof METAFIELD_KEYS];

export type MetafieldType =
    | 'single_line_text_field'
    | 'multi_line_text_field'
    | 'number_integer'
    | 'number_decimal'
    | 'json';

export const METAFIELD_TYPES: Record<MetafieldKey, MetafieldType> = {
    warranty: 'single_line_text_field',
    Inventarbestand: 'number_integer',
    StockNextDelivery: 'single_line_text_field',
    Price_B2B_Regular: 'number_decimal',
    Price_B2B_Discounted: 'number_decimal',
    description_short: 'multi_line_text_field',
    verwandte_produkte: 'json',
};

// ============================================
// TYPES
// ============================================

export interface ProjectedVariant {
    sku: string;
    /** Value of the "Garantie" option */
    label: string;
    price: string;
    /** Warranty rule behind this variant; null for the standard variant */
    ruleId: number | null;
    inventoryQuantity: number | null;
}

export interface ProjectedListing {
    handle: string;
    title: string;
    bodyHtml: string;
    vendor: string | null;
    productType: string | null;
    tags: string[];
    /** Price of the first variant */
    price: string;
    stock: number | null;
    variants: ProjectedVariant[];
    /** Only keys with a value are present */
    metafields: Partial<Record<MetafieldKey, string>>;
    primaryImage: ProductImage | null;
    additionalImages: ProductImage[];
    /** Alt text the primary image carries remotely */
    primaryImageRef: string | null;
    weightKg: number | null;
}

// ============================================
// PROJECTION
// ============================================

/** B2C gross price; falls back to the B2B list price for trade-only items */
export function basePrice(pricing: ProductPricing): Decimal | null {
    return pricing.b2cGross ?? pricing.b2bRegular;
}

function buildVariants(product: Product): ProjectedVariant[] {
    const base = basePrice(product.pricing);
    const { tiers, label } = product.warranty;

    if (tiers.length === 0) {
        return [{
            sku: product.identifier,
            label: label ?? STANDARD_VARIANT_LABEL,
            price: formatMoney(base) ?? '0.00',
            ruleId: null,
            inventoryQuantity: product.stock,
        }];
    }

    return tiers.map((tier) => ({
        sku: `${product.identifier}-G${tier.ruleId}`,
        label: tierLabel(tier),
        price: tierVariantPrice(base, tier).toFixed(2),
        ruleId: tier.ruleId,
        inventoryQuantity: product.stock,
    }));
}

function buildMetafields(product: Product): Partial<Record<MetafieldKey, string>> {
    const fields: Partial<Record<MetafieldKey, string>> = {};
    const set = (key: MetafieldKey, value: string | null): void => {
        if (value !== null && value !== '') fields[key] = value;
    };

    set(METAFIELD_KEYS.warranty, product.warranty.label);
    set(METAFIELD_KEYS.stock, product.stock === null ? null : String(product.stock));
    set(METAFIELD_KEYS.stockNextDelivery, product.stockNextDelivery);
    set(METAFIELD_KEYS.priceB2bRegular, formatMoney(product.pricing.b2bRegular));
    set(METAFIELD_KEYS.priceB2bDiscounted, formatMoney(product.pricing.b2bDiscounted));
    set(METAFIELD_KEYS.descriptionShort, product.descriptionShort);
    if (product.accessories.length > 0) {
        set(METAFIELD_KEYS.accessories, JSON.stringify(product.accessories.map(toHandle)));
    }
    return fields;
}

export function projectListing(product: Product): ProjectedListing {
    const variants = buildVariants(product);
    const weight = product.weight.gross ?? product.weight.net;

    return {
        handle: product.handle,
        title: product.title ?? DEFAULT_TITLE,
        bodyHtml: product.longDescription ?? product.descriptionShort ?? '',
        vendor: product.manufacturer,
        productType: product.category,
        tags: [...product.categoryPath],
        price: variants[0].price,
        stock: product.stock,
        variants,
        metafields: buildMetafields(product),
        primaryImage: product.images.primary,
        additionalImages: product.images.additional,
        primaryImageRef: product.images.primary?.sourceRef ?? null,
        weightKg: weight === null ? null : weight.toNumber(),
    };
}
