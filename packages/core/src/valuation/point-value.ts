/**
 * Point valuation: cents per point or mile for a reward program.
 */

import type { CardProduct, RewardProgram } from '../types/index.js';
import { REWARD_DEFAULTS } from '../types/index.js';
import type { ReferenceTables } from '../reference/types.js';

/**
 * Cents per point for a program.
 *
 * Lookup order: reference table (by upper-cased program id), then the
 * program's own base value, then the reference default when there is no program.
 */
export function pointValueCents(
    program: RewardProgram | undefined,
    reference: ReferenceTables
): number {
    if (!program) {
        return reference.defaultPointValueCents;
    }
    return reference.pointValues.get(program.id.toUpperCase()) ?? program.base_point_value_cents;
}

/**
 * What a card earns on spend no bonus rule covers.
 * Cashback cards earn 1%; point and mile cards earn one point at the program's value.
 */
export function baseRateFor(card: CardProduct, reference: ReferenceTables): number {
    if (card.reward_type === 'cashback_percent') {
        return REWARD_DEFAULTS.CASHBACK_BASE_RATE;
    }
    return pointValueCents(card.reward_program, reference);
}
