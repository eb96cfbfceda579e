/**
 * Unit tests for the listing projection
 */

import { projectListing } from '../catalog/projection.js';
import { makeProduct, ruleRow } from './fixtures.js';

describe('projectListing', () => {
    it('builds a single standard variant without warranty tiers', () => {
        const listing = projectListing(makeProduct({ productId: 'A', priceB2cInclVat: '19.9', stock: 3 }));

        expect(listing.title).toBe('Untitled Product');
        expect(listing.bodyHtml).toBe('');
        expect(listing.price).toBe('19.90');
        expect(listing.variants).toEqual([
            { sku: 'A', label: 'Standard', price: '19.90', ruleId: null, inventoryQuantity: 3 },
        ]);
    });

    it('labels the standard variant with the warranty text', () => {
        const listing = projectListing(makeProduct({ warranty: '24 Monate Bring-In' }));
        expect(listing.variants[0].label).toBe('24 Monate Bring-In');
        expect(listing.variants[0].price).toBe('0.00');
    });

    it('builds one variant per warranty tier', () => {
        const product = makeProduct(
            { productId: 'A', priceB2cInclVat: '1000', warrantyGroup: 4, stock: 1 },
            [],
            [
                ruleRow({ id: 11, name: 'Vor-Ort', durationMonths: 36, percentage: '0.08', warrantyGroup: 4 }),
                ruleRow({ id: 10, name: 'Bring-In', durationMonths: 24, percentage: '0.01', warrantyGroup: 4 }),
            ],
        );

        const listing = projectListing(product);
        expect(listing.variants).toEqual([
            { sku: 'A-G10', label: 'Bring-In 24 Monate', price: '1020.00', ruleId: 10, inventoryQuantity: 1 },
            { sku: 'A-G11', label: 'Vor-Ort 36 Monate', price: '1080.00', ruleId: 11, inventoryQuantity: 1 },
        ]);
        expect(listing.price).toBe('1020.00');
    });

    it('writes metafields only for present values', () => {
        const listing = projectListing(makeProduct({
            priceB2bRegular: '80',
            descriptionShort: 'Kurz',
            stock: 0,
            accessoryProducts: 'B|C',
        }));

        expect(listing.metafields).toEqual({
            Inventarbestand: '0',
            Price_B2B_Regular: '80.00',
            description_short: 'Kurz',
            verwandte_produkte: '["prod-B","prod-C"]',
        });
    });

    it('prefers the long description for the body and falls back to B2B price', () => {
        const listing = projectListing(makeProduct({
            longDescription: '<p>Lang</p>',
            descriptionShort: 'Kurz',
            priceB2bRegular: '80',
            categoryPath: 'Hardware|Monitore',
            grossWeight: '2.5',
        }));

        expect(listing.bodyHtml).toBe('<p>Lang</p>');
        expect(listing.price).toBe('80.00');
        expect(listing.tags).toEqual(['Hardware', 'Monitore']);
        expect(listing.weightKg).toBe(2.5);
    });
});
