import { Decimal } from 'decimal.js';
import { formatMoney, roundMoney, toDecimal } from '../catalog/money.js';
import { fromHandle, normalizeProductId, toHandle } from '../catalog/handle.js';
import { InvalidNumberError } from '../../errors/catalog.js';

describe('toDecimal', () => {
    it('treats null, undefined and blank strings as absent', () => {
        expect(toDecimal(null)).toBeNull();
        expect(toDecimal(undefined)).toBeNull();
        expect(toDecimal('  ')).toBeNull();
    });

    it('parses numbers, strings and decimal commas', () => {
        expect(toDecimal(12.5)?.toString()).toBe('12.5');
        expect(toDecimal(' 0.05 ')?.toString()).toBe('0.05');
        expect(toDecimal('1499,99')?.toString()).toBe('1499.99');
    });

    it('rejects non-numeric values', () => {
        expect(() => toDecimal('12 EUR')).toThrow(InvalidNumberError);
        expect(() => toDecimal(Number.NaN)).toThrow(InvalidNumberError);
    });
});

describe('money formatting', () => {
    it('rounds half-up to cents', () => {
        expect(roundMoney(new Decimal('2.675')).toFixed(2)).toBe('2.68');
        expect(formatMoney(new Decimal('10'))).toBe('10.00');
        expect(formatMoney(null)).toBeNull();
    });
});

describe('handles', () => {
    it('maps identifiers to prefixed handles and back', () => {
        expect(toHandle('eu1009805')).toBe('prod-eu1009805');
        expect(fromHandle('prod-eu1009805')).toBe('eu1009805');
        expect(fromHandle('other-product')).toBeNull();
        expect(fromHandle('prod-')).toBeNull();
    });

    it('accepts ids with or without the prefix', () => {
        expect(normalizeProductId(' prod-eu1009805 ')).toBe('eu1009805');
        expect(normalizeProductId('eu1009805')).toBe('eu1009805');
    });
});
