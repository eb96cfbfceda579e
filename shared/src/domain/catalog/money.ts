/**
 * Money helpers - fixed-point decimals only
 *
 * Prices travel through the pipeline as decimal.js values and leave it as
 * 2-place strings. Floats are never used for money.
 */

import { Decimal } from 'decimal.js';
import { InvalidNumberError } from '../../errors/catalog.js';
import type { NumericInput } from '../../types/index.js';

/** Currency precision of the remote platform */
export const CURRENCY_SCALE = 2;

/**
 * Parse a source value into a Decimal.
 * null, undefined and blank strings are absent (null). German decimal
 * commas ("12,50") are accepted.
 *
 * @throws InvalidNumberError when the value is present but not numeric
 */
export function toDecimal(value: NumericInput | null | undefined): Decimal | null {
    if (value === null || value === undefined) return null;

    if (typeof value === 'number') {
        if (!Number.isFinite(value)) throw new InvalidNumberError(String(value));
        return new Decimal(value);
    }

    const text = value.trim().replace(',', '.');
    if (text === '') return null;
    if (!/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(text)) {
        throw new InvalidNumberError(value);
    }
    return new Decimal(text);
}

/** Round half-up to currency precision */
export function roundMoney(amount: Decimal): Decimal {
    return amount.toDecimalPlaces(CURRENCY_SCALE, Decimal.ROUND_HALF_UP);
}

/** "12.50" style string, or null when absent */
export function formatMoney(amount: Decimal | null): string | null {
    if (amount === null) return null;
    return roundMoney(amount).toFixed(CURRENCY_SCALE, Decimal.ROUND_HALF_UP);
}
