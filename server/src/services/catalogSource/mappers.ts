/**
 * Store records → source rows
 */

import { InvalidNumberError, toDecimal } from '@catalog-sync/shared';
import type { ImageRow, NumericInput, ProductRow, WarrantyRuleRow } from '@catalog-sync/shared';
import type { ProductImageRecord, ProductRecord, WarrantyOptionRecord } from '../../db/types.js';

export function toProductRow(record: ProductRecord): ProductRow {
    return {
        productId: record.product_id,
        title: record.title,
        descriptionShort: record.description_short,
        longDescription: record.long_description,
        manufacturer: record.manufacturer,
        category: record.category,
        categoryPath: record.category_path,
        warranty: record.warranty,
        priceB2cInclVat: record.price_b2c_incl_vat,
        priceB2bRegular: record.price_b2b_regular,
        priceB2bDiscounted: record.price_b2b_discounted,
        currency: record.currency,
        vatRate: record.vat_rate,
        stock: record.stock,
        stockNextDelivery: record.stock_next_delivery,
        grossWeight: record.gross_weight,
        netWeight: record.net_weight,
        nonReturnable: record.non_returnable,
        eol: record.eol,
        promotion: record.promotion,
        warrantyGroup: record.warranty_group,
        accessoryProducts: record.accessory_products,
    };
}

export function toImageRow(record: ProductImageRecord): ImageRow {
    return {
        productId: record.supplier_aid,
        filename: record.filename,
        payload: record.image_data,
        isPrimary: record.is_primary,
    };
}

/**
 * Stored percent → fraction. Unreadable values pass through unchanged so
 * the merger reports them as invalid numbers.
 */
export function percentToFraction(value: NumericInput | null): NumericInput | null {
    try {
        const percent = toDecimal(value);
        return percent === null ? null : percent.div(100).toString();
    } catch (error) {
        if (error instanceof InvalidNumberError) return value;
        throw error;
    }
}

export function toWarrantyRuleRow(record: WarrantyOptionRecord): WarrantyRuleRow {
    return {
        id: record.id,
        name: record.name,
        durationMonths: record.duration_months,
        percentage: percentToFraction(record.percentage),
        minimum: record.minimum,
        warrantyGroup: record.warranty_group,
    };
}
