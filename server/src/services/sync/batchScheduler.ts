/**
 * Batch Scheduler
 *
 * Pushes the actionable entries of a change set to the remote catalog in
 * fixed-size batches. Items of one batch are started in change-set order and
 * awaited together; the client's token bucket is the only throttle.
 *
 * Each item walks pending → in_flight → succeeded | failed. A failed item is
 * recorded and never aborts its batch or the run.
 */

import { ZodError } from 'zod';
import {
    HANDLE_PREFIX,
    buildRunSummary,
    countChangeSet,
    transitionItem,
} from '@catalog-sync/shared';
import type {
    ChangeSet,
    ChangeSetEntry,
    ItemAction,
    ItemError,
    ItemResult,
    ItemState,
    MergeIssue,
    Product,
    RunSummary,
} from '@catalog-sync/shared';
import { RemoteRequestError, ValidationError, toError } from '../../utils/errors.js';
import { syncLogger } from '../../utils/logger.js';
import { systemClock } from '../../utils/clock.js';
import type { Clock } from '../../utils/clock.js';
import type { RemoteCatalogClient } from '../shopify/types.js';

// ============================================
// TYPES
// ============================================

export interface ScheduleOptions {
    batchSize: number;
    dryRun: boolean;
    /** Treat remote_only entries as deletions */
    includeDeletes?: boolean;
    /** false: create entries are skipped instead of uploaded */
    createIfMissing?: boolean;
}

/** Extra facts the caller knows about the run */
export interface ScheduleContext {
    totalProducts?: number;
    missingFromSource?: readonly string[];
    mergeIssues?: readonly MergeIssue[];
    /** Results decided before scheduling (e.g. ids with nothing to act on), appended after the scheduled ones */
    presetResults?: readonly ItemResult[];
}

type WorkItem =
    | { action: 'create'; entry: ChangeSetEntry; product: Product }
    | { action: 'update'; entry: ChangeSetEntry; product: Product; remoteId: string; includeImages: boolean }
    | { action: 'delete'; entry: ChangeSetEntry; remoteId: string };

type Planned =
    | { kind: 'work'; item: WorkItem }
    | { kind: 'skip'; result: ItemResult };

// ============================================
// PLANNING
// ============================================

function baseResult(entry: ChangeSetEntry, action: ItemAction): ItemResult {
    return {
        identifier: entry.identifier,
        handle: entry.handle,
        action,
        outcome: 'skipped',
        remoteId: null,
        error: null,
    };
}

function plan(entry: ChangeSetEntry, options: ScheduleOptions): Planned | null {
    switch (entry.kind) {
        case 'create':
            if (options.createIfMissing === false) {
                return {
                    kind: 'skip',
                    result: { ...baseResult(entry, 'create'), reason: 'Not on remote and createIfMissing is false' },
                };
            }
            return { kind: 'work', item: { action: 'create', entry, product: entry.product } };
        case 'update':
            return {
                kind: 'work',
                item: {
                    action: 'update',
                    entry,
                    product: entry.product,
                    remoteId: entry.listing.remoteId,
                    includeImages: entry.deltas.some((delta) => delta.field === 'primaryImage'),
                },
            };
        case 'delete':
            return planDelete(entry);
        case 'remote_only':
            return options.includeDeletes ? planDelete(entry) : null;
        case 'unchanged':
            return null;
    }
}

/** Listings without the handle prefix belong to someone else and are never deleted */
function planDelete(entry: Extract<ChangeSetEntry, { kind: 'delete' | 'remote_only' }>): Planned {
    if (entry.identifier === null) {
        return {
            kind: 'skip',
            result: { ...baseResult(entry, 'delete'), reason: `Handle is not managed by catalog sync (no ${HANDLE_PREFIX} prefix)` },
        };
    }
    return { kind: 'work', item: { action: 'delete', entry, remoteId: entry.listing.remoteId } };
}

function toItemError(error: unknown): ItemError {
    if (error instanceof RemoteRequestError) {
        return {
            message: error.message,
            kind: error.transient ? 'transient' : 'permanent',
            remoteStatus: error.remoteStatus,
            attempts: error.attempts,
        };
    }
    if (error instanceof ZodError) {
        return { message: `Unexpected remote response: ${error.message}`, kind: 'validation', remoteStatus: null, attempts: null };
    }
    return { message: toError(error).message, kind: 'unknown', remoteStatus: null, attempts: null };
}

/**
 * The one hard precondition of a run.
 * @throws ValidationError when batchSize is not a positive integer
 */
export function assertBatchSize(batchSize: number): void {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
        throw new ValidationError('batchSize must be a positive integer', { batchSize });
    }
}

// ============================================
// SCHEDULER
// ============================================

export class BatchScheduler {
    constructor(
        private readonly remote: RemoteCatalogClient,
        private readonly clock: Clock = systemClock,
    ) {}

    /**
     * Execute a change set.
     * @throws ValidationError when batchSize is not a positive integer (before any remote call)
     */
    async run(changeSet: ChangeSet, options: ScheduleOptions, context: ScheduleContext = {}): Promise<RunSummary> {
        const { batchSize, dryRun } = options;
        assertBatchSize(batchSize);

        const start = this.clock.now();
        const results: ItemResult[] = [];
        const work: Array<{ index: number; item: WorkItem }> = [];

        for (const entry of changeSet.entries) {
            const planned = plan(entry, options);
            if (!planned) continue;
            if (planned.kind === 'skip') {
                results.push(planned.result);
            } else if (dryRun) {
                results.push({ ...baseResult(planned.item.entry, planned.item.action), outcome: 'planned', ...deltasOf(planned.item.entry) });
            } else {
                work.push({ index: results.length, item: planned.item });
                results.push(baseResult(planned.item.entry, planned.item.action));
            }
        }

        const batchCount = Math.ceil(work.length / batchSize);
        syncLogger.info({ items: work.length, batchSize, batches: batchCount, dryRun }, 'Scheduling change set');

        for (let i = 0; i < work.length; i += batchSize) {
            const batch = work.slice(i, i + batchSize);
            syncLogger.debug({ batch: i / batchSize + 1, of: batchCount, size: batch.length }, 'Dispatching batch');

            const settled = await Promise.all(batch.map(({ item }) => this.execute(item)));
            settled.forEach((result, offset) => {
                results[batch[offset].index] = result;
            });
        }

        const summary = buildRunSummary({
            results: [...results, ...(context.presetResults ?? [])],
            totalProducts: context.totalProducts ?? countLocal(changeSet),
            changeCounts: countChangeSet(changeSet),
            dryRun,
            elapsedMs: this.clock.now() - start,
            missingFromSource: context.missingFromSource,
            mergeIssues: context.mergeIssues,
        });

        syncLogger.info(
            {
                status: summary.status,
                successful: summary.successful_uploads,
                failed: summary.failed_uploads,
                skipped: summary.skipped,
                executionTime: summary.execution_time,
            },
            summary.message
        );
        return summary;
    }

    private async execute(item: WorkItem): Promise<ItemResult> {
        const result = { ...baseResult(item.entry, item.action), ...deltasOf(item.entry) };
        const state: ItemState = transitionItem('pending', 'in_flight');
        try {
            const remoteId = await this.dispatch(item);
            return { ...result, outcome: transitionItem(state, 'succeeded'), remoteId };
        } catch (error: unknown) {
            const outcome = transitionItem(state, 'failed');
            const itemError = toItemError(error);
            syncLogger.warn(
                { handle: item.entry.handle, action: item.action, error: itemError.message, kind: itemError.kind },
                'Item failed'
            );
            return { ...result, outcome, remoteId: 'remoteId' in item ? item.remoteId : null, error: itemError };
        }
    }

    private async dispatch(item: WorkItem): Promise<string> {
        switch (item.action) {
            case 'create':
                return (await this.remote.create(item.product)).remoteId;
            case 'update':
                await this.remote.update(item.remoteId, item.product, { includeImages: item.includeImages });
                return item.remoteId;
            case 'delete':
                await this.remote.delete(item.remoteId);
                return item.remoteId;
        }
    }
}

function deltasOf(entry: ChangeSetEntry): Pick<ItemResult, 'deltas'> {
    return entry.kind === 'update' ? { deltas: entry.deltas } : {};
}

function countLocal(changeSet: ChangeSet): number {
    return changeSet.entries.filter((entry) => 'product' in entry).length;
}
