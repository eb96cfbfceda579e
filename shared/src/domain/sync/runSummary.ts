/**
 * Run Summary - Pure Domain Logic
 *
 * Folds per-item results into the summary returned by every sync operation.
 * The summary is deep-frozen once built.
 */

import type {
    ChangeCounts,
    ItemOutcome,
    ItemResult,
    MergeIssue,
    RunStatus,
    RunSummary,
} from '../../types/index.js';

export interface RunSummaryInput {
    results: readonly ItemResult[];
    /** Local products considered by the run */
    totalProducts: number;
    changeCounts: ChangeCounts;
    dryRun: boolean;
    elapsedMs: number;
    missingFromSource?: readonly string[];
    mergeIssues?: readonly MergeIssue[];
}

// ============================================
// HELPERS
// ============================================

export function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        const children: unknown[] = Object.values(value);
        for (const child of children) deepFreeze(child);
    }
    return value;
}

export function countOutcomes(results: readonly ItemResult[]): Record<ItemOutcome, number> {
    const counts: Record<ItemOutcome, number> = { succeeded: 0, failed: 0, skipped: 0, planned: 0 };
    for (const result of results) counts[result.outcome] += 1;
    return counts;
}

function resolveStatus(dryRun: boolean, failed: number): RunStatus {
    if (dryRun) return 'dry_run';
    return failed > 0 ? 'completed_with_errors' : 'completed';
}

// ============================================
// BUILD
// ============================================

export function buildRunSummary(input: RunSummaryInput): RunSummary {
    const counts = countOutcomes(input.results);
    const status = resolveStatus(input.dryRun, counts.failed);

    const message = input.dryRun
        ? `Dry run: ${counts.succeeded} successful, ${counts.failed} failed, ${counts.planned} planned, ${counts.skipped} skipped of ${input.totalProducts} products`
        : `Sync completed: ${counts.succeeded} successful, ${counts.failed} failed, ${counts.skipped} skipped`;

    return deepFreeze({
        status,
        message,
        total_products: input.totalProducts,
        successful_uploads: counts.succeeded,
        failed_uploads: counts.failed,
        skipped: counts.skipped,
        execution_time: Math.round(input.elapsedMs) / 1000,
        dry_run: input.dryRun,
        change_counts: { ...input.changeCounts },
        missing_from_source: [...(input.missingFromSource ?? [])],
        merge_issues: (input.mergeIssues ?? []).map((issue) => ({ ...issue })),
        per_item_results: input.results.map((result) => ({ ...result })),
    });
}
