/**
 * Handle convention
 *
 * The remote platform knows our products only by handle: `prod-<identifier>`.
 * Listings whose handle does not carry the prefix are not ours to map back.
 */

export const HANDLE_PREFIX = 'prod-';

export function toHandle(identifier: string): string {
    return `${HANDLE_PREFIX}${identifier}`;
}

/** Identifier encoded in a handle, or null for foreign handles */
export function fromHandle(handle: string): string | null {
    if (!handle.startsWith(HANDLE_PREFIX)) return null;
    const identifier = handle.slice(HANDLE_PREFIX.length);
    return identifier === '' ? null : identifier;
}

/**
 * Callers may pass "eu1009805" or "prod-eu1009805"; both mean the same product.
 */
export function normalizeProductId(input: string): string {
    const trimmed = input.trim();
    return fromHandle(trimmed) ?? trimmed;
}
