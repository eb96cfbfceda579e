/**
 * Reconciliation Service
 *
 * Orchestrates one run: read the source store, merge into canonical products,
 * list the remote catalog, diff, and hand the change set to the scheduler.
 *
 * Source reads and precondition failures abort the run. Everything that goes
 * wrong for a single product ends up in the RunSummary instead.
 */

import { ZodError } from 'zod';
import {
    byHandleThenRemoteId,
    countChangeSet,
    diffCatalog,
    fromHandle,
    mergeProducts,
    normalizeProductId,
    toDataUri,
    toHandle,
} from '@catalog-sync/shared';
import type {
    ChangeCounts,
    ChangeKind,
    ChangeSet,
    ChangeSetEntry,
    DeleteAllRequest,
    DeleteByIdsRequest,
    FieldDelta,
    ItemResult,
    MergeIssue,
    Product,
    ProductRow,
    ReconcileRequest,
    RemoteListing,
    RunSummary,
    SyncByIdsRequest,
} from '@catalog-sync/shared';
import { ExternalServiceError, ValidationError, toError } from '../../utils/errors.js';
import { syncLogger } from '../../utils/logger.js';
import type { Clock } from '../../utils/clock.js';
import type { RecordSource } from '../catalogSource/types.js';
import type { RemoteCatalogClient } from '../shopify/types.js';
import { BatchScheduler, assertBatchSize } from './batchScheduler.js';

// ============================================
// TYPES
// ============================================

export interface ReconciliationServiceOptions {
    defaultBatchSize: number;
    clock?: Clock;
}

export interface PreviewOptions {
    productLimit?: number;
    /** Attach the local primary image of each entry as a data URI */
    includeImages?: boolean;
}

/** One change-set entry without the product payload */
export interface ChangeSetPreviewEntry {
    kind: ChangeKind;
    identifier: string | null;
    handle: string;
    remoteId: string | null;
    deltas: FieldDelta[];
    /** Only with includeImages; null when the entry has no local image */
    primaryImage?: string | null;
}

export interface ChangeSetPreview {
    total_products: number;
    change_counts: ChangeCounts;
    merge_issues: MergeIssue[];
    entries: ChangeSetPreviewEntry[];
}

/** Remote listing as plain JSON */
export interface RemoteListingExport {
    remoteId: string;
    handle: string;
    title: string | null;
    price: string | null;
    stock: number | null;
    tags: string[];
    images: Array<{ src: string; alt: string | null }>;
    metafields: Record<string, string>;
}

export type ConnectionStatus =
    | { status: 'connected'; detail?: string }
    | { status: 'error'; error: string };

export interface ConnectionReport {
    database: ConnectionStatus;
    shopify: ConnectionStatus;
}

interface LoadedCatalog {
    products: Product[];
    issues: MergeIssue[];
}

// ============================================
// HELPERS
// ============================================

function uniqueIds(productIds: readonly string[]): string[] {
    return [...new Set(productIds.map(normalizeProductId).filter((id) => id !== ''))];
}

function toPreviewEntry(entry: ChangeSetEntry, includeImages: boolean): ChangeSetPreviewEntry {
    const preview: ChangeSetPreviewEntry = {
        kind: entry.kind,
        identifier: entry.identifier,
        handle: entry.handle,
        remoteId: 'listing' in entry ? entry.listing.remoteId : null,
        deltas: entry.kind === 'update' ? entry.deltas : [],
    };
    if (!includeImages) return preview;

    const primary = 'product' in entry ? entry.product.images.primary : null;
    return { ...preview, primaryImage: primary ? toDataUri(primary.base64) : null };
}

async function checkConnection(name: string, check: () => Promise<string | undefined>): Promise<ConnectionStatus> {
    try {
        const detail = await check();
        return detail === undefined ? { status: 'connected' } : { status: 'connected', detail };
    } catch (error: unknown) {
        const message = toError(error).message;
        syncLogger.warn({ connection: name, error: message }, 'Connection check failed');
        return { status: 'error', error: message };
    }
}

function toListingExport(listing: RemoteListing): RemoteListingExport {
    return {
        remoteId: listing.remoteId,
        handle: listing.handle,
        title: listing.title,
        price: listing.price === null ? null : listing.price.toFixed(2),
        stock: listing.stock,
        tags: [...listing.tags],
        images: listing.images.map(({ src, alt }) => ({ src, alt })),
        metafields: { ...listing.metafields },
    };
}

// ============================================
// SERVICE
// ============================================

export class ReconciliationService {
    private readonly scheduler: BatchScheduler;
    private readonly defaultBatchSize: number;

    constructor(
        private readonly source: RecordSource,
        private readonly remote: RemoteCatalogClient,
        options: ReconciliationServiceOptions,
    ) {
        this.scheduler = new BatchScheduler(remote, options.clock);
        this.defaultBatchSize = options.defaultBatchSize;
    }

    /**
     * Full reconciliation of active source products against the remote catalog.
     * Remote-only listings are deleted only when includeDeletes is set.
     *
     * @throws ValidationError when includeDeletes is combined with productLimit:
     * products past the limit would look remote-only and be deleted
     */
    async reconcile(request: ReconcileRequest): Promise<RunSummary> {
        const batchSize = request.batchSize ?? this.defaultBatchSize;
        assertBatchSize(batchSize);
        if (request.includeDeletes && request.productLimit !== undefined) {
            throw new ValidationError('includeDeletes cannot be combined with productLimit', {
                productLimit: request.productLimit,
            });
        }

        syncLogger.info({ dryRun: request.dryRun, batchSize, productLimit: request.productLimit }, 'Reconcile started');

        const rows = await this.source.fetchProducts({ limit: request.productLimit });
        const { products, issues } = await this.loadCatalog(rows);
        const changeSet = diffCatalog(products, await this.listRemote());

        return this.scheduler.run(
            changeSet,
            { batchSize, dryRun: request.dryRun, includeDeletes: request.includeDeletes },
            { totalProducts: products.length, mergeIssues: issues },
        );
    }

    /**
     * Sync selected products. Ids may carry the handle prefix; ids the source
     * does not know are reported in missing_from_source.
     */
    async syncByIds(request: SyncByIdsRequest): Promise<RunSummary> {
        const batchSize = request.batchSize ?? this.defaultBatchSize;
        assertBatchSize(batchSize);

        const ids = uniqueIds(request.productIds);
        syncLogger.info({ ids: ids.length, dryRun: request.dryRun, createIfMissing: request.createIfMissing }, 'Sync by ids started');

        const { products, issues } = await this.loadCatalog(await this.source.fetchProductsByIds(ids));
        const found = new Set(products.map((product) => product.identifier));
        const missing = ids.filter((id) => !found.has(id));
        if (missing.length > 0) {
            syncLogger.warn({ missing }, 'Requested products not found in source');
        }

        const requestedHandles = new Set(ids.map(toHandle));
        const listings = (await this.listRemote()).filter((listing) => requestedHandles.has(listing.handle));
        const changeSet: ChangeSet = {
            entries: diffCatalog(products, listings).entries.filter((entry) => entry.kind !== 'remote_only'),
        };

        return this.scheduler.run(
            changeSet,
            { batchSize, dryRun: request.dryRun, createIfMissing: request.createIfMissing },
            { totalProducts: products.length, missingFromSource: missing, mergeIssues: issues },
        );
    }

    /**
     * Delete the listings of the given products. Ids without a listing are
     * recorded as skipped.
     */
    async deleteByIds(request: DeleteByIdsRequest): Promise<RunSummary> {
        const batchSize = request.batchSize ?? this.defaultBatchSize;
        assertBatchSize(batchSize);

        const ids = uniqueIds(request.productIds);
        const byHandle = new Map<string, RemoteListing>();
        for (const listing of await this.listRemote()) {
            if (!byHandle.has(listing.handle)) byHandle.set(listing.handle, listing);
        }

        const entries: ChangeSetEntry[] = [];
        const skipped: ItemResult[] = [];
        for (const identifier of ids) {
            const handle = toHandle(identifier);
            const listing = byHandle.get(handle);
            if (listing) {
                entries.push({ kind: 'delete', identifier, handle, listing });
            } else {
                skipped.push({
                    identifier,
                    handle,
                    action: 'delete',
                    outcome: 'skipped',
                    remoteId: null,
                    error: null,
                    reason: 'No remote listing with this handle',
                });
            }
        }

        syncLogger.info({ requested: ids.length, deletable: entries.length, dryRun: request.dryRun }, 'Delete by ids started');

        return this.scheduler.run(
            { entries },
            { batchSize, dryRun: request.dryRun },
            { totalProducts: ids.length, presetResults: skipped },
        );
    }

    /**
     * Delete every listing whose handle carries the prefix. Listings of
     * other origin are left alone and not reported.
     */
    async deleteAll(request: DeleteAllRequest): Promise<RunSummary> {
        const batchSize = request.batchSize ?? this.defaultBatchSize;
        assertBatchSize(batchSize);

        const listings = await this.listRemote();
        const entries: ChangeSetEntry[] = [];
        for (const listing of [...listings].sort(byHandleThenRemoteId)) {
            const identifier = fromHandle(listing.handle);
            if (identifier !== null) {
                entries.push({ kind: 'delete', identifier, handle: listing.handle, listing });
            }
        }

        syncLogger.info(
            { listings: listings.length, managed: entries.length, dryRun: request.dryRun },
            'Delete all started'
        );

        return this.scheduler.run(
            { entries },
            { batchSize, dryRun: request.dryRun },
            { totalProducts: entries.length },
        );
    }

    /** The change set a reconcile would act on, without scheduling anything */
    async previewChangeSet(options: PreviewOptions = {}): Promise<ChangeSetPreview> {
        const rows = await this.source.fetchProducts({ limit: options.productLimit });
        const { products, issues } = await this.loadCatalog(rows);
        const changeSet = diffCatalog(products, await this.listRemote());

        return {
            total_products: products.length,
            change_counts: countChangeSet(changeSet),
            merge_issues: issues,
            entries: changeSet.entries.map((entry) => toPreviewEntry(entry, options.includeImages ?? false)),
        };
    }

    async exportRemote(): Promise<RemoteListingExport[]> {
        const listings = await this.listRemote();
        return listings.map(toListingExport);
    }

    /** Reachability of the product store and the remote platform; never throws */
    async testConnections(): Promise<ConnectionReport> {
        const [database, shopify] = await Promise.all([
            checkConnection('database', async () => {
                await this.source.ping();
                return undefined;
            }),
            checkConnection('shopify', () => this.remote.ping()),
        ]);
        return { database, shopify };
    }

    // ============================================
    // INTERNALS
    // ============================================

    private async loadCatalog(rows: readonly ProductRow[]): Promise<LoadedCatalog> {
        const productIds = rows.flatMap((row) => {
            const id = row.productId?.trim();
            return id ? [id] : [];
        });
        const [images, rules] = await Promise.all([
            productIds.length > 0 ? this.source.fetchImages(productIds) : Promise.resolve([]),
            this.source.fetchWarrantyRules(),
        ]);

        const result = mergeProducts(rows, images, rules);
        if (result.issues.length > 0) {
            syncLogger.warn({ issues: result.issues.length }, 'Merge reported issues');
        }
        syncLogger.debug({ rows: rows.length, products: result.products.length, images: images.length }, 'Catalog merged');
        return result;
    }

    /**
     * @throws ExternalServiceError for any listing failure, including a
     * response of unexpected shape
     */
    private async listRemote(): Promise<RemoteListing[]> {
        try {
            return await this.remote.listAll();
        } catch (error: unknown) {
            const cause = toError(error);
            const detail = error instanceof ZodError ? 'unexpected response shape' : cause.message;
            throw new ExternalServiceError(`Failed to list remote catalog: ${detail}`, 'shopify', cause);
        }
    }
}
