/**
 * Product Merger - Pure Functions
 *
 * Joins product, image and warranty-rule rows into one canonical Product per
 * identifier. Images and rules are indexed by key first, so the merge is
 * linear in the number of rows.
 *
 * Per-item problems (bad image, unknown warranty group, unreadable number)
 * are collected as issues; they never abort the merge.
 */

import type { Decimal } from 'decimal.js';
import { DecodeError, InvalidNumberError } from '../../errors/catalog.js';
import { toHandle } from './handle.js';
import { encodeImage } from './imageCodec.js';
import { toDecimal } from './money.js';
import { basePrice } from './projection.js';
import { computeWarrantyTiers, groupWarrantyRules } from './warranty.js';
import type {
    ImageRow,
    MergeIssue,
    MergeIssueCode,
    NumericInput,
    Product,
    ProductImage,
    ProductRow,
    WarrantyDescriptor,
    WarrantyRule,
    WarrantyRuleRow,
} from '../../types/index.js';

// ============================================
// TYPES
// ============================================

export interface MergeOptions {
    /** Only the first `limit` product rows are considered (staging/test runs) */
    limit?: number;
}

export interface MergeResult {
    products: Product[];
    issues: MergeIssue[];
}

/** Collects issues for one product while it is being built */
class IssueLog {
    readonly issues: MergeIssue[] = [];

    add(identifier: string | null, code: MergeIssueCode, message: string): void {
        this.issues.push({ identifier, code, message });
    }
}

// ============================================
// FIELD PARSING
// ============================================

function text(value: string | null): string | null {
    if (value === null) return null;
    const trimmed = value.trim();
    return trimmed === '' ? null : trimmed;
}

function splitList(value: string | null): string[] {
    if (value === null) return [];
    return value.split('|').map((part) => part.trim()).filter((part) => part !== '');
}

function decimalField(
    log: IssueLog,
    identifier: string | null,
    field: string,
    value: NumericInput | null,
): Decimal | null {
    try {
        return toDecimal(value);
    } catch (error) {
        if (error instanceof InvalidNumberError) {
            log.add(identifier, 'invalid_number', `${field}: ${error.message}`);
            return null;
        }
        throw error;
    }
}

function stockField(log: IssueLog, identifier: string, value: NumericInput | null): number | null {
    if (value === null) return null;
    if (typeof value === 'string' && value.trim() === '') return null;
    const parsed = typeof value === 'number' ? value : Number(value.trim());
    if (!Number.isInteger(parsed) || parsed < 0) {
        log.add(identifier, 'invalid_number', `stock: expected a non-negative integer, got "${value}"`);
        return null;
    }
    return parsed;
}

// ============================================
// RULES & IMAGES
// ============================================

/**
 * Convert rule rows into domain rules. Rows without a group, or with a
 * percentage/minimum that is not numeric, are dropped with an issue.
 */
export function toWarrantyRules(rows: readonly WarrantyRuleRow[], log: IssueLog = new IssueLog()): WarrantyRule[] {
    const rules: WarrantyRule[] = [];
    for (const row of rows) {
        if (row.warrantyGroup === null) continue;
        try {
            rules.push({
                id: row.id,
                name: row.name,
                durationMonths: row.durationMonths,
                percentage: toDecimal(row.percentage),
                minimum: toDecimal(row.minimum),
                groupId: row.warrantyGroup,
            });
        } catch (error) {
            if (!(error instanceof InvalidNumberError)) throw error;
            log.add(null, 'invalid_number', `warranty rule ${row.id}: ${error.message}`);
        }
    }
    return rules;
}

function indexImages(rows: readonly ImageRow[]): Map<string, ImageRow[]> {
    const byProduct = new Map<string, ImageRow[]>();
    for (const row of rows) {
        const key = row.productId?.trim();
        if (!key) continue;
        const list = byProduct.get(key);
        if (list) {
            list.push(row);
        } else {
            byProduct.set(key, [row]);
        }
    }
    return byProduct;
}

/**
 * Primary = first row flagged primary; when none is flagged the first
 * decodable image wins. Identical payloads are kept once.
 */
function resolveImages(
    log: IssueLog,
    identifier: string,
    rows: readonly ImageRow[],
): { primary: ProductImage | null; additional: ProductImage[] } {
    const decoded: Array<ProductImage & { flagged: boolean }> = [];
    const seen = new Set<string>();

    for (const row of rows) {
        if (row.payload === null) continue;
        let base64: string;
        try {
            base64 = encodeImage(row.payload);
        } catch (error) {
            if (!(error instanceof DecodeError)) throw error;
            log.add(identifier, 'image_decode_failed', `${row.filename ?? 'image'}: ${error.message}`);
            continue;
        }
        if (seen.has(base64)) continue;
        seen.add(base64);
        decoded.push({ base64, sourceRef: text(row.filename), flagged: row.isPrimary === true });
    }

    const primaryIndex = Math.max(0, decoded.findIndex((image) => image.flagged));
    const strip = ({ base64, sourceRef }: ProductImage): ProductImage => ({ base64, sourceRef });

    if (decoded.length === 0) return { primary: null, additional: [] };
    return {
        primary: strip(decoded[primaryIndex]),
        additional: decoded.filter((_, index) => index !== primaryIndex).map(strip),
    };
}

function resolveWarranty(
    log: IssueLog,
    identifier: string,
    row: ProductRow,
    base: Decimal | null,
    rulesByGroup: Map<number, WarrantyRule[]>,
): WarrantyDescriptor {
    const label = text(row.warranty);
    const groupId = row.warrantyGroup;

    if (groupId === null || groupId === 0) {
        return { groupId: null, label, tiers: [], resolved: true };
    }

    const rules = rulesByGroup.get(groupId);
    if (!rules) {
        log.add(identifier, 'unknown_warranty_group', `warranty group ${groupId} has no rules`);
        return { groupId, label, tiers: [], resolved: false };
    }

    return { groupId, label, tiers: computeWarrantyTiers(base, rules), resolved: true };
}

// ============================================
// MERGE
// ============================================

function buildProduct(
    log: IssueLog,
    identifier: string,
    row: ProductRow,
    imageRows: readonly ImageRow[],
    rulesByGroup: Map<number, WarrantyRule[]>,
): Product {
    const pricing = {
        b2cGross: decimalField(log, identifier, 'priceB2cInclVat', row.priceB2cInclVat),
        b2bRegular: decimalField(log, identifier, 'priceB2bRegular', row.priceB2bRegular),
        b2bDiscounted: decimalField(log, identifier, 'priceB2bDiscounted', row.priceB2bDiscounted),
    };
    return {
        identifier,
        handle: toHandle(identifier),
        title: text(row.title),
        descriptionShort: text(row.descriptionShort),
        longDescription: text(row.longDescription),
        manufacturer: text(row.manufacturer),
        category: text(row.category),
        categoryPath: splitList(row.categoryPath),
        pricing,
        currency: text(row.currency),
        vatRate: decimalField(log, identifier, 'vatRate', row.vatRate),
        stock: stockField(log, identifier, row.stock),
        stockNextDelivery: text(row.stockNextDelivery),
        weight: {
            gross: decimalField(log, identifier, 'grossWeight', row.grossWeight),
            net: decimalField(log, identifier, 'netWeight', row.netWeight),
        },
        warranty: resolveWarranty(log, identifier, row, basePrice(pricing), rulesByGroup),
        images: resolveImages(log, identifier, imageRows),
        flags: {
            endOfLife: row.eol,
            nonReturnable: row.nonReturnable,
            promotion: row.promotion,
        },
        accessories: splitList(row.accessoryProducts),
    };
}

/**
 * Merge source rows into canonical products, one per identifier.
 * Output keeps the order of the product rows.
 */
export function mergeProducts(
    productRows: readonly ProductRow[],
    imageRows: readonly ImageRow[],
    ruleRows: readonly WarrantyRuleRow[],
    options: MergeOptions = {},
): MergeResult {
    const log = new IssueLog();
    const considered = options.limit === undefined
        ? productRows
        : productRows.slice(0, Math.max(0, Math.floor(options.limit)));

    const imagesByProduct = indexImages(imageRows);
    const rulesByGroup = groupWarrantyRules(toWarrantyRules(ruleRows, log));

    const products: Product[] = [];
    const seen = new Set<string>();

    for (const row of considered) {
        const identifier = row.productId?.trim();
        if (!identifier) {
            log.add(null, 'missing_identifier', `product row without identifier (title: ${row.title ?? 'n/a'})`);
            continue;
        }
        if (seen.has(identifier)) {
            log.add(identifier, 'duplicate_identifier', 'duplicate product row ignored; first row wins');
            continue;
        }
        seen.add(identifier);

        products.push(buildProduct(log, identifier, row, imagesByProduct.get(identifier) ?? [], rulesByGroup));
    }

    return { products, issues: log.issues };
}

export { IssueLog };
