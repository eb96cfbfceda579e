/**
 * End-to-end tests for the reconciliation service over in-memory stand-ins
 */

import { z } from 'zod';
import type { RemoteListing } from '@catalog-sync/shared';
import { ReconciliationService } from '../reconciliationService.js';
import { DatabaseError, ExternalServiceError, RemoteRequestError, ValidationError } from '../../../utils/errors.js';
import {
    FakeClock,
    FakeRemoteCatalog,
    InMemoryRecordSource,
    listingFor,
    makeProduct,
    productRow,
} from '../../../__tests__/fakes.js';

const rowA = { productId: 'A', title: 'Alpha', priceB2cInclVat: '10.00', stock: 5 };
const rowB = { productId: 'B', title: 'Beta', priceB2cInclVat: '20.00', stock: 2 };

/**
 * Source holds A and B; remote holds A (in sync) and C (unknown to the source)
 */
function setup(): { source: InMemoryRecordSource; remote: FakeRemoteCatalog; service: ReconciliationService } {
    const source = new InMemoryRecordSource({ products: [productRow(rowA), productRow(rowB)] });
    const remote = new FakeRemoteCatalog([
        listingFor(makeProduct(rowA), '1001'),
        listingFor(makeProduct({ productId: 'C', title: 'Gamma' }), '1003'),
    ]);
    const service = new ReconciliationService(source, remote, { defaultBatchSize: 5, clock: new FakeClock() });
    return { source, remote, service };
}

describe('ReconciliationService', () => {
    describe('reconcile', () => {
        it('creates what is missing, leaves A alone and keeps C', async () => {
            const { remote, service } = setup();
            const summary = await service.reconcile({ dryRun: false, includeDeletes: false });

            expect(summary.change_counts).toEqual({ create: 1, update: 0, unchanged: 1, remote_only: 1, delete: 0 });
            expect(remote.mutations).toEqual([{ action: 'create', handle: 'prod-B' }]);
            expect(summary.total_products).toBe(2);
            expect(summary.successful_uploads).toBe(1);
            expect(summary.failed_uploads).toBe(0);
            expect(summary.message).toBe('Sync completed: 1 successful, 0 failed, 0 skipped');
            expect(remote.listings.map((l) => l.handle)).toEqual(['prod-A', 'prod-C', 'prod-B']);
        });

        it('is idempotent over an unchanged source', async () => {
            const { remote, service } = setup();
            await service.reconcile({ dryRun: false, includeDeletes: false });
            const second = await service.reconcile({ dryRun: false, includeDeletes: false });

            expect(second.change_counts).toEqual({ create: 0, update: 0, unchanged: 2, remote_only: 1, delete: 0 });
            expect(second.per_item_results).toEqual([]);
            expect(remote.mutations).toHaveLength(1);
        });

        it('pushes a changed price as an update', async () => {
            const { source, remote, service } = setup();
            source.products[0] = productRow({ ...rowA, priceB2cInclVat: '12.50' });

            const summary = await service.reconcile({ dryRun: false, includeDeletes: false });

            expect(summary.change_counts.update).toBe(1);
            expect(summary.per_item_results[0].deltas).toEqual([{ field: 'price', local: '12.50', remote: '10.00' }]);
            expect(remote.mutations[0]).toEqual({ action: 'update', remoteId: '1001', handle: 'prod-A', includeImages: false });
        });

        it('produces the same dry run twice without touching the remote', async () => {
            const { remote, service } = setup();
            const first = await service.reconcile({ dryRun: true, includeDeletes: false });
            const second = await service.reconcile({ dryRun: true, includeDeletes: false });

            expect(second).toEqual(first);
            expect(first.message).toBe('Dry run: 0 successful, 0 failed, 1 planned, 0 skipped of 2 products');
            expect(remote.mutations).toEqual([]);
        });

        it('deletes remote-only listings only with includeDeletes', async () => {
            const { remote, service } = setup();
            const summary = await service.reconcile({ dryRun: false, includeDeletes: true });

            expect(remote.mutations).toEqual([
                { action: 'create', handle: 'prod-B' },
                { action: 'delete', remoteId: '1003' },
            ]);
            expect(summary.successful_uploads).toBe(2);
        });

        it('honours productLimit and skips end-of-life products', async () => {
            const source = new InMemoryRecordSource({
                products: [productRow(rowB), productRow({ productId: 'E', title: 'Old', eol: true }), productRow(rowA)],
            });
            const service = new ReconciliationService(source, new FakeRemoteCatalog(), { defaultBatchSize: 5, clock: new FakeClock() });

            const all = await service.reconcile({ dryRun: true, includeDeletes: false });
            const limited = await service.reconcile({ dryRun: true, includeDeletes: false, productLimit: 1 });

            expect(all.total_products).toBe(2);
            expect(limited.total_products).toBe(1);
            expect(limited.per_item_results.map((r) => r.handle)).toEqual(['prod-A']);
        });

        it('refuses includeDeletes together with productLimit before reading anything', async () => {
            const { remote, service } = setup();

            const error = await service
                .reconcile({ dryRun: false, includeDeletes: true, productLimit: 1 })
                .catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ValidationError);
            expect(error).toMatchObject({
                message: 'includeDeletes cannot be combined with productLimit',
                details: { productLimit: 1 },
            });
            expect(remote.calls).toEqual([]);
            expect(remote.listings.map((l) => l.handle)).toEqual(['prod-A', 'prod-C']);
        });

        it('never deletes listings of other origin', async () => {
            const { remote, service } = setup();
            remote.listings.push({ ...listingFor(makeProduct({ productId: 'G' }), '1009'), handle: 'gift-card' });

            const summary = await service.reconcile({ dryRun: false, includeDeletes: true });

            expect(remote.mutations).toEqual([
                { action: 'create', handle: 'prod-B' },
                { action: 'delete', remoteId: '1003' },
            ]);
            expect(remote.listings.map((l) => l.handle)).toContain('gift-card');
            expect(summary.per_item_results.find((r) => r.handle === 'gift-card')).toMatchObject({
                outcome: 'skipped',
                reason: 'Handle is not managed by catalog sync (no prod- prefix)',
            });
        });

        it('reports merge issues in the summary', async () => {
            const { source, service } = setup();
            source.products.push(productRow({ productId: 'D', title: 'Delta', priceB2bRegular: 'n/a' }));

            const summary = await service.reconcile({ dryRun: true, includeDeletes: false });

            expect(summary.merge_issues).toEqual([
                { identifier: 'D', code: 'invalid_number', message: expect.stringContaining('priceB2bRegular') },
            ]);
            expect(summary.total_products).toBe(3);
        });

        it('fails before reading anything when batchSize is not positive', async () => {
            const { remote, service } = setup();

            await expect(service.reconcile({ dryRun: false, includeDeletes: false, batchSize: 0 }))
                .rejects.toBeInstanceOf(ValidationError);
            expect(remote.calls).toEqual([]);
        });

        it('aborts on a source read failure', async () => {
            const { source, remote, service } = setup();
            source.failWith = new DatabaseError('Failed to read products: connection refused');

            await expect(service.reconcile({ dryRun: false, includeDeletes: false })).rejects.toBeInstanceOf(DatabaseError);
            expect(remote.calls).toEqual([]);
        });

        it('aborts when the remote catalog cannot be listed', async () => {
            class UnreachableRemote extends FakeRemoteCatalog {
                override async listAll(): Promise<RemoteListing[]> {
                    throw new RemoteRequestError('Shopify API 503 (gave up after 6 attempts)', { status: 503, attempts: 6, transient: true });
                }
            }
            const source = new InMemoryRecordSource({ products: [productRow(rowA)] });
            const service = new ReconciliationService(source, new UnreachableRemote(), { defaultBatchSize: 5 });

            await expect(service.reconcile({ dryRun: false, includeDeletes: false })).rejects.toThrow(ExternalServiceError);
        });

        it('reports a malformed remote listing response as a remote failure', async () => {
            class DriftedRemote extends FakeRemoteCatalog {
                override async listAll(): Promise<RemoteListing[]> {
                    const parsed = z.object({ products: z.object({ nodes: z.array(z.unknown()) }) }).safeParse({ items: [] });
                    if (parsed.success) return [];
                    throw parsed.error;
                }
            }
            const source = new InMemoryRecordSource({ products: [productRow(rowA)] });
            const service = new ReconciliationService(source, new DriftedRemote(), { defaultBatchSize: 5 });

            const error = await service.reconcile({ dryRun: true, includeDeletes: false }).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ExternalServiceError);
            expect(error).toMatchObject({
                message: 'Failed to list remote catalog: unexpected response shape',
                serviceName: 'shopify',
                statusCode: 502,
            });
        });
    });

    describe('syncByIds', () => {
        it('syncs only the requested products and reports unknown ids', async () => {
            const { remote, service } = setup();
            const summary = await service.syncByIds({
                productIds: ['prod-B', 'A', 'Z'],
                dryRun: false,
                createIfMissing: true,
            });

            expect(summary.missing_from_source).toEqual(['Z']);
            expect(summary.total_products).toBe(2);
            expect(summary.change_counts).toEqual({ create: 1, update: 0, unchanged: 1, remote_only: 0, delete: 0 });
            expect(remote.mutations).toEqual([{ action: 'create', handle: 'prod-B' }]);
        });

        it('collapses duplicate ids', async () => {
            const { service } = setup();
            const summary = await service.syncByIds({
                productIds: ['B', 'prod-B', ' B '],
                dryRun: true,
                createIfMissing: true,
            });

            expect(summary.per_item_results.map((r) => r.handle)).toEqual(['prod-B']);
        });

        it('skips products that are not on the remote when createIfMissing is false', async () => {
            const { remote, service } = setup();
            const summary = await service.syncByIds({ productIds: ['B'], dryRun: false, createIfMissing: false });

            expect(remote.mutations).toEqual([]);
            expect(summary.per_item_results[0]).toMatchObject({ handle: 'prod-B', outcome: 'skipped' });
            expect(summary.message).toBe('Sync completed: 0 successful, 0 failed, 1 skipped');
        });

        it('syncs an end-of-life product when asked for it by id', async () => {
            const { source, remote, service } = setup();
            source.products.push(productRow({ productId: 'E', title: 'Old', eol: true }));

            await service.syncByIds({ productIds: ['E'], dryRun: false, createIfMissing: true });

            expect(remote.mutations).toEqual([{ action: 'create', handle: 'prod-E' }]);
        });
    });

    describe('deleteByIds', () => {
        it('deletes matching listings and skips ids without one', async () => {
            const { remote, service } = setup();
            const summary = await service.deleteByIds({ productIds: ['C', 'prod-X'], dryRun: false });

            expect(remote.mutations).toEqual([{ action: 'delete', remoteId: '1003' }]);
            expect(remote.listings.map((l) => l.handle)).toEqual(['prod-A']);
            expect(summary.per_item_results).toEqual([
                { identifier: 'C', handle: 'prod-C', action: 'delete', outcome: 'succeeded', remoteId: '1003', error: null },
                {
                    identifier: 'X',
                    handle: 'prod-X',
                    action: 'delete',
                    outcome: 'skipped',
                    remoteId: null,
                    error: null,
                    reason: 'No remote listing with this handle',
                },
            ]);
            expect(summary.message).toBe('Sync completed: 1 successful, 0 failed, 1 skipped');
        });

        it('plans deletions in a dry run', async () => {
            const { remote, service } = setup();
            const summary = await service.deleteByIds({ productIds: ['C', 'X'], dryRun: true });

            expect(remote.mutations).toEqual([]);
            expect(summary.message).toBe('Dry run: 0 successful, 0 failed, 1 planned, 1 skipped of 2 products');
        });
    });

    describe('deleteAll', () => {
        it('deletes every managed listing in handle order and leaves the rest', async () => {
            const { remote, service } = setup();
            remote.listings.push({ ...listingFor(makeProduct({ productId: 'G' }), '1009'), handle: 'gift-card' });

            const summary = await service.deleteAll({ confirm: true, dryRun: false });

            expect(remote.mutations).toEqual([
                { action: 'delete', remoteId: '1001' },
                { action: 'delete', remoteId: '1003' },
            ]);
            expect(remote.listings.map((l) => l.handle)).toEqual(['gift-card']);
            expect(summary.total_products).toBe(2);
            expect(summary.message).toBe('Sync completed: 2 successful, 0 failed, 0 skipped');
        });

        it('plans the deletions in a dry run', async () => {
            const { remote, service } = setup();
            const summary = await service.deleteAll({ confirm: true, dryRun: true });

            expect(remote.mutations).toEqual([]);
            expect(summary.per_item_results.map((r) => [r.handle, r.action, r.outcome])).toEqual([
                ['prod-A', 'delete', 'planned'],
                ['prod-C', 'delete', 'planned'],
            ]);
        });
    });

    describe('testConnections', () => {
        it('reports both sides connected', async () => {
            const { service } = setup();

            await expect(service.testConnections()).resolves.toEqual({
                database: { status: 'connected' },
                shopify: { status: 'connected', detail: 'Test Shop' },
            });
        });

        it('reports a failing side without throwing', async () => {
            const { source, service } = setup();
            source.failWith = new DatabaseError('Failed to read connection check: connection refused');

            await expect(service.testConnections()).resolves.toEqual({
                database: { status: 'error', error: 'Failed to read connection check: connection refused' },
                shopify: { status: 'connected', detail: 'Test Shop' },
            });
        });
    });

    describe('read-only views', () => {
        it('previews the change set', async () => {
            const { remote, service } = setup();
            const preview = await service.previewChangeSet();

            expect(remote.mutations).toEqual([]);
            expect(preview.total_products).toBe(2);
            expect(preview.entries).toEqual([
                { kind: 'unchanged', identifier: 'A', handle: 'prod-A', remoteId: '1001', deltas: [] },
                { kind: 'create', identifier: 'B', handle: 'prod-B', remoteId: null, deltas: [] },
                { kind: 'remote_only', identifier: 'C', handle: 'prod-C', remoteId: '1003', deltas: [] },
            ]);
        });

        it('attaches primary images as data URIs on request', async () => {
            const source = new InMemoryRecordSource({
                products: [productRow(rowA), productRow(rowB)],
                images: [{ productId: 'B', filename: 'b.jpg', payload: 'ffd8ff', isPrimary: true }],
            });
            const remote = new FakeRemoteCatalog([listingFor(makeProduct(rowA), '1001')]);
            const service = new ReconciliationService(source, remote, { defaultBatchSize: 5 });

            const preview = await service.previewChangeSet({ includeImages: true });

            expect(preview.entries.map((entry) => [entry.handle, entry.primaryImage])).toEqual([
                ['prod-A', null],
                ['prod-B', 'data:image/jpeg;base64,/9j/'],
            ]);
        });

        it('exports remote listings as plain JSON', async () => {
            const { service } = setup();
            const listings = await service.exportRemote();

            expect(listings[0]).toEqual({
                remoteId: '1001',
                handle: 'prod-A',
                title: 'Alpha',
                price: '10.00',
                stock: 5,
                tags: [],
                images: [],
                metafields: { Inventarbestand: '5' },
            });
        });
    });
});
