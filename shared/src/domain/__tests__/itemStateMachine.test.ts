/**
 * Unit tests for the sync item state machine
 */

import {
    ITEM_STATES,
    isTerminalItemState,
    isValidItemTransition,
    transitionItem,
} from '../sync/itemStateMachine.js';
import { InvalidItemTransitionError } from '../../errors/catalog.js';

describe('item state machine', () => {
    it('allows the forward path only', () => {
        expect(isValidItemTransition('pending', 'in_flight')).toBe(true);
        expect(isValidItemTransition('in_flight', 'succeeded')).toBe(true);
        expect(isValidItemTransition('in_flight', 'failed')).toBe(true);

        expect(isValidItemTransition('pending', 'succeeded')).toBe(false);
        expect(isValidItemTransition('failed', 'pending')).toBe(false);
        expect(isValidItemTransition('succeeded', 'in_flight')).toBe(false);
    });

    it('has succeeded and failed as the only terminal states', () => {
        expect(ITEM_STATES.filter(isTerminalItemState)).toEqual(['succeeded', 'failed']);
    });

    it('returns the target state for valid transitions', () => {
        expect(transitionItem('pending', 'in_flight')).toBe('in_flight');
    });

    it('throws on invalid transitions', () => {
        expect(() => transitionItem('failed', 'in_flight')).toThrow(InvalidItemTransitionError);
        expect(() => transitionItem('pending', 'failed')).toThrow('Invalid item transition: pending → failed');
    });
});
