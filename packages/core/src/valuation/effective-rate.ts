import type { EarningRule, RewardProgram } from '../types/index.js';
import type { ReferenceTables } from '../reference/types.js';
import { pointValueCents } from './point-value.js';

/**
 * Convert a rule's multiplier to cents earned per dollar spent.
 *
 * Cashback multipliers are already percentages. Points, miles and hybrid
 * rewards are multiplied by the program's point value.
 *
 * @param rule - Earning rule
 * @param program - Reward program of the rule's card, if any
 * @param reference - Reference tables (point value overrides)
 */
export function effectiveRate(
    rule: EarningRule,
    program: RewardProgram | undefined,
    reference: ReferenceTables
): number {
    switch (rule.reward_type) {
        case 'cashback_percent':
            return rule.multiplier;
        case 'points_per_dollar':
        case 'miles_per_dollar':
        case 'hybrid':
            return rule.multiplier * pointValueCents(program, reference);
        default: {
            const exhaustive: never = rule.reward_type;
            throw new Error(`Unknown reward type: ${String(exhaustive)}`);
        }
    }
}
