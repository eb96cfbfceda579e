/**
 * Differencer - Pure Functions
 *
 * Classifies every local product and every remote listing into exactly one
 * change-set entry. Remote listings are indexed by handle; a local product
 * and a listing belong together when the listing carries `prod-<identifier>`.
 *
 * Compared fields: title, first-variant price, B2B prices, stock, short
 * description and primary image reference. Strings are trimmed, absent and
 * empty are equal, prices compare at 2 decimals.
 */

import { InvalidNumberError } from '../../errors/catalog.js';
import { fromHandle } from './handle.js';
import { formatMoney, toDecimal } from './money.js';
import { METAFIELD_KEYS, projectListing } from './projection.js';
import type { MetafieldKey, ProjectedListing } from './projection.js';
import type {
    ChangeCounts,
    ChangeSet,
    ChangeSetEntry,
    ComparedField,
    FieldDelta,
    Product,
    RemoteListing,
} from '../../types/index.js';

// ============================================
// NORMALIZATION
// ============================================

function normText(value: string | null | undefined): string {
    return (value ?? '').trim();
}

/** Money as a 2-place string; values that are not numeric compare as text */
function normMoney(value: string | null | undefined): string {
    const text = normText(value);
    if (text === '') return '';
    try {
        return formatMoney(toDecimal(text)) ?? '';
    } catch (error) {
        if (error instanceof InvalidNumberError) return text;
        throw error;
    }
}

function compareCodePoints(a: string, b: string): number {
    if (a === b) return 0;
    return a < b ? -1 : 1;
}

// ============================================
// FIELD COMPARISON
// ============================================

type FieldReader = (projected: ProjectedListing, listing: RemoteListing) => {
    local: string | null;
    remote: string | null;
    equal: boolean;
} | null;

function textField(local: string | null, remote: string | null) {
    return { local, remote, equal: normText(local) === normText(remote) };
}

function moneyField(local: string | null, remote: string | null) {
    return { local, remote, equal: normMoney(local) === normMoney(remote) };
}

function metafieldMoney(key: MetafieldKey): FieldReader {
    return (projected, listing) => moneyField(projected.metafields[key] ?? null, listing.metafields[key] ?? null);
}

const FIELD_READERS: ReadonlyArray<[ComparedField, FieldReader]> = [
    ['title', (p, l) => textField(p.title, l.title)],
    ['price', (p, l) => moneyField(p.price, formatMoney(l.price))],
    ['priceB2bRegular', metafieldMoney(METAFIELD_KEYS.priceB2bRegular)],
    ['priceB2bDiscounted', metafieldMoney(METAFIELD_KEYS.priceB2bDiscounted)],
    // Unknown local stock is never pushed, so it never differs
    ['stock', (p, l) => p.stock === null
        ? null
        : textField(String(p.stock), l.stock === null ? null : String(l.stock))],
    ['descriptionShort', (p, l) => textField(
        p.metafields[METAFIELD_KEYS.descriptionShort] ?? null,
        l.metafields[METAFIELD_KEYS.descriptionShort] ?? null,
    )],
    ['primaryImage', (p, l) => textField(p.primaryImageRef, l.images[0]?.alt ?? null)],
];

/** Field deltas between a product and its remote listing; empty when in sync */
export function compareListing(product: Product, listing: RemoteListing): FieldDelta[] {
    const projected = projectListing(product);
    const deltas: FieldDelta[] = [];

    for (const [field, read] of FIELD_READERS) {
        const result = read(projected, listing);
        if (result && !result.equal) {
            deltas.push({ field, local: result.local, remote: result.remote });
        }
    }
    return deltas;
}

// ============================================
// DIFF
// ============================================

/** Listing order for reports: handle, then remote id, both by code point */
export function byHandleThenRemoteId(a: RemoteListing, b: RemoteListing): number {
    return compareCodePoints(a.handle, b.handle) || compareCodePoints(a.remoteId, b.remoteId);
}

/**
 * Compute the change set. Local entries come first ordered by identifier,
 * then remote-only entries ordered by handle. Deterministic for equal input.
 *
 * The first listing per handle is the one matched against the product; any
 * further listing with the same handle is reported as remote_only.
 */
export function diffCatalog(products: readonly Product[], listings: readonly RemoteListing[]): ChangeSet {
    const remoteByHandle = new Map<string, RemoteListing>();
    const duplicates: RemoteListing[] = [];
    for (const listing of listings) {
        if (remoteByHandle.has(listing.handle)) {
            duplicates.push(listing);
        } else {
            remoteByHandle.set(listing.handle, listing);
        }
    }

    const local: ChangeSetEntry[] = [];
    const matched = new Set<string>();

    const ordered = [...products].sort((a, b) => compareCodePoints(a.identifier, b.identifier));
    for (const product of ordered) {
        const { identifier, handle } = product;
        const listing = remoteByHandle.get(handle);

        if (!listing) {
            local.push({ kind: 'create', identifier, handle, product });
            continue;
        }

        matched.add(handle);
        const deltas = compareListing(product, listing);
        local.push(deltas.length > 0
            ? { kind: 'update', identifier, handle, product, listing, deltas }
            : { kind: 'unchanged', identifier, handle, product, listing });
    }

    const remoteOnly: ChangeSetEntry[] = [...remoteByHandle.values()]
        .filter((listing) => !matched.has(listing.handle))
        .concat(duplicates)
        .sort(byHandleThenRemoteId)
        .map((listing) => ({
            kind: 'remote_only' as const,
            identifier: fromHandle(listing.handle),
            handle: listing.handle,
            listing,
        }));

    return { entries: [...local, ...remoteOnly] };
}

export function emptyChangeCounts(): ChangeCounts {
    return { create: 0, update: 0, unchanged: 0, remote_only: 0, delete: 0 };
}

export function countChangeSet(changeSet: ChangeSet): ChangeCounts {
    const counts = emptyChangeCounts();
    for (const entry of changeSet.entries) {
        counts[entry.kind] += 1;
    }
    return counts;
}
