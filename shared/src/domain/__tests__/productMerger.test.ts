/**
 * Unit tests for the product merger
 */

import { mergeProducts } from '../catalog/productMerger.js';
import { imageRow, productRow, ruleRow } from './fixtures.js';

describe('mergeProducts', () => {
    describe('joins', () => {
        it('attaches images and warranty tiers to their product', () => {
            const { products, issues } = mergeProducts(
                [productRow({ productId: 'A', priceB2cInclVat: '1000.00', warrantyGroup: 7 })],
                [
                    imageRow({ productId: 'A', filename: 'a.jpg', payload: '89504e47' }),
                    imageRow({ productId: 'A', filename: 'b.jpg', payload: 'ffd8ffe0', isPrimary: true }),
                    imageRow({ productId: 'Z', filename: 'z.jpg', payload: '00010203' }),
                ],
                [ruleRow({ id: 3, warrantyGroup: 7 })],
            );

            expect(issues).toEqual([]);
            expect(products).toHaveLength(1);
            const [product] = products;
            expect(product.handle).toBe('prod-A');
            expect(product.images.primary?.sourceRef).toBe('b.jpg');
            expect(product.images.primary?.base64).toBe('/9j/4A==');
            expect(product.images.additional.map((image) => image.sourceRef)).toEqual(['a.jpg']);
            expect(product.warranty.resolved).toBe(true);
            expect(product.warranty.groupId).toBe(7);
            expect(product.warranty.tiers.map((tier) => [tier.ruleId, tier.addOnPrice.toFixed(2)])).toEqual([
                [3, '50.00'],
            ]);
        });

        it('falls back to the first decodable image when none is flagged', () => {
            const { products, issues } = mergeProducts(
                [productRow({ productId: 'A' })],
                [
                    imageRow({ filename: 'broken.jpg', payload: '!!!' }),
                    imageRow({ filename: 'first.png', payload: '89504e47' }),
                    imageRow({ filename: 'second.png', payload: '00010203' }),
                ],
                [],
            );

            expect(products[0].images.primary?.sourceRef).toBe('first.png');
            expect(products[0].images.additional.map((image) => image.sourceRef)).toEqual(['second.png']);
            expect(issues).toHaveLength(1);
            expect(issues[0].code).toBe('image_decode_failed');
            expect(issues[0].identifier).toBe('A');
        });

        it('drops images whose payload repeats in another encoding', () => {
            const { products } = mergeProducts(
                [productRow()],
                [
                    imageRow({ filename: 'hex.png', payload: '89504e47' }),
                    imageRow({ filename: 'b64.png', payload: 'iVBORw==' }),
                ],
                [],
            );

            expect(products[0].images.primary?.sourceRef).toBe('hex.png');
            expect(products[0].images.additional).toEqual([]);
        });

        it('leaves a product without images with no primary', () => {
            const { products } = mergeProducts([productRow()], [], []);
            expect(products[0].images).toEqual({ primary: null, additional: [] });
        });
    });

    describe('warranty groups', () => {
        it('treats group 0 as no warranty group', () => {
            const { products, issues } = mergeProducts([productRow({ warrantyGroup: 0, warranty: '24 Monate' })], [], []);
            expect(products[0].warranty).toEqual({ groupId: null, label: '24 Monate', tiers: [], resolved: true });
            expect(issues).toEqual([]);
        });

        it('flags a group missing from the rule set without aborting', () => {
            const { products, issues } = mergeProducts(
                [productRow({ productId: 'A', warrantyGroup: 99 }), productRow({ productId: 'B' })],
                [],
                [ruleRow({ warrantyGroup: 1 })],
            );

            expect(products).toHaveLength(2);
            expect(products[0].warranty).toEqual({ groupId: 99, label: null, tiers: [], resolved: false });
            expect(issues.map((issue) => [issue.identifier, issue.code])).toEqual([['A', 'unknown_warranty_group']]);
        });
    });

    describe('identifiers', () => {
        it('skips rows without an identifier and keeps the first duplicate', () => {
            const { products, issues } = mergeProducts(
                [
                    productRow({ productId: null, title: 'orphan' }),
                    productRow({ productId: 'A', title: 'first' }),
                    productRow({ productId: ' A ', title: 'second' }),
                ],
                [],
                [],
            );

            expect(products.map((p) => [p.identifier, p.title])).toEqual([['A', 'first']]);
            expect(issues.map((issue) => issue.code)).toEqual(['missing_identifier', 'duplicate_identifier']);
        });

        it('keeps input order and honours the limit', () => {
            const rows = ['C', 'A', 'B'].map((productId) => productRow({ productId }));
            expect(mergeProducts(rows, [], []).products.map((p) => p.identifier)).toEqual(['C', 'A', 'B']);
            expect(mergeProducts(rows, [], [], { limit: 2 }).products.map((p) => p.identifier)).toEqual(['C', 'A']);
        });
    });

    describe('fields', () => {
        it('keeps absent values null', () => {
            const [product] = mergeProducts([productRow({ title: '  ' })], [], []).products;
            expect(product.title).toBeNull();
            expect(product.stock).toBeNull();
            expect(product.pricing).toEqual({ b2cGross: null, b2bRegular: null, b2bDiscounted: null });
            expect(product.categoryPath).toEqual([]);
            expect(product.accessories).toEqual([]);
        });

        it('parses decimals, stock and pipe-separated lists', () => {
            const [product] = mergeProducts(
                [productRow({
                    priceB2cInclVat: '12,50',
                    priceB2bRegular: 10,
                    stock: '7',
                    categoryPath: 'Hardware| Notebooks |',
                    accessoryProducts: 'B|C',
                })],
                [],
                [],
            ).products;

            expect(product.pricing.b2cGross?.toFixed(2)).toBe('12.50');
            expect(product.pricing.b2bRegular?.toFixed(2)).toBe('10.00');
            expect(product.stock).toBe(7);
            expect(product.categoryPath).toEqual(['Hardware', 'Notebooks']);
            expect(product.accessories).toEqual(['B', 'C']);
        });

        it('reports unreadable numbers and keeps the product', () => {
            const { products, issues } = mergeProducts(
                [productRow({ priceB2cInclVat: 'abc', stock: '-3' })],
                [],
                [],
            );

            expect(products[0].pricing.b2cGross).toBeNull();
            expect(products[0].stock).toBeNull();
            expect(issues.map((issue) => issue.code)).toEqual(['invalid_number', 'invalid_number']);
        });
    });
});
