/**
 * Sync Item State Machine - Pure Domain Logic
 * Lifecycle of one change-set entry inside a scheduler run.
 *
 * STATE FLOW:
 * pending → in_flight → succeeded
 *                ↓
 *             failed
 *
 * succeeded and failed are terminal. A failed item is not re-queued within
 * the same run; transient errors are already retried by the remote client.
 */

import { InvalidItemTransitionError } from '../../errors/catalog.js';
import type { ItemState } from '../../types/index.js';

// ============================================
// STATE MACHINE DEFINITION
// ============================================

export const ITEM_STATES: readonly ItemState[] = ['pending', 'in_flight', 'succeeded', 'failed'];

export const ITEM_STATE_TRANSITIONS: Record<ItemState, readonly ItemState[]> = {
    pending: ['in_flight'],
    in_flight: ['succeeded', 'failed'],
    succeeded: [],
    failed: [],
};

// ============================================
// HELPER FUNCTIONS
// ============================================

export function isValidItemTransition(from: ItemState, to: ItemState): boolean {
    return ITEM_STATE_TRANSITIONS[from].includes(to);
}

export function isTerminalItemState(state: ItemState): boolean {
    return ITEM_STATE_TRANSITIONS[state].length === 0;
}

/**
 * Move an item to its next state. Returns `to`, narrowed to the literal passed.
 * @throws InvalidItemTransitionError for transitions not in the table
 */
export function transitionItem<T extends ItemState>(from: ItemState, to: T): T {
    if (!isValidItemTransition(from, to)) {
        throw new InvalidItemTransitionError(from, to);
    }
    return to;
}
