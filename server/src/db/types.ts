/**
 * Kysely table types for the product store
 *
 * Mirrors db/schema.sql. NUMERIC columns arrive from pg as strings and are
 * parsed into decimals by the domain layer, never into floats.
 */

import type { ColumnType, Generated, Selectable } from 'kysely';

/** pg returns NUMERIC as string */
type Numeric = ColumnType<string, string | number, string | number>;

export interface ProductsTable {
    product_id: string;
    title: string | null;
    description_short: string | null;
    long_description: string | null;
    manufacturer: string | null;
    category: string | null;
    category_path: string | null;
    warranty: string | null;
    price_b2b_regular: Numeric | null;
    price_b2b_discounted: Numeric | null;
    price_b2c_incl_vat: Numeric | null;
    currency: string | null;
    vat_rate: Numeric | null;
    stock: number | null;
    stock_next_delivery: string | null;
    gross_weight: Numeric | null;
    net_weight: Numeric | null;
    non_returnable: boolean | null;
    eol: boolean | null;
    promotion: boolean | null;
    warranty_group: number | null;
    accessory_products: string | null;
}

export interface ProductImagesTable {
    id: Generated<number>;
    /** Supplier article id = products.product_id */
    supplier_aid: string | null;
    filename: string | null;
    /** bytea, or hex/base64 text in legacy rows */
    image_data: Buffer | string | null;
    is_primary: boolean | null;
}

export interface WarrantyOptionsTable {
    id: number;
    name: string;
    duration_months: number | null;
    /** Stored as percent: 5 means 5 % */
    percentage: Numeric | null;
    minimum: Numeric | null;
    warranty_group: number | null;
}

export interface DB {
    products: ProductsTable;
    product_images: ProductImagesTable;
    warranty_options: WarrantyOptionsTable;
}

export type ProductRecord = Selectable<ProductsTable>;
export type ProductImageRecord = Selectable<ProductImagesTable>;
export type WarrantyOptionRecord = Selectable<WarrantyOptionsTable>;
