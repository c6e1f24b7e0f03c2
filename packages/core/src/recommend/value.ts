import type { CardProduct, EarningRule } from '../types/index.js';
import type { ReferenceTables } from '../reference/types.js';
import { applyAnnualFeePenalty, applyCap, baseRateFor, effectiveRate } from '../valuation/index.js';
import type { RateAdjustment } from '../valuation/index.js';

export interface ValuationOptions {
    spendingAmount: number;
    annualFeeWeight: number;
}

/**
 * Value one matched rule: effective rate, then cap blend, then fee penalty.
 */
export function valueMatch(
    card: CardProduct,
    rule: EarningRule,
    reference: ReferenceTables,
    options: ValuationOptions
): RateAdjustment {
    const rate = effectiveRate(rule, card.reward_program, reference);
    const capped = applyCap(rate, rule.caps, options.spendingAmount, baseRateFor(card, reference));
    const fee = applyAnnualFeePenalty(capped.adjustedRate, card.annual_fee, options.annualFeeWeight);

    return {
        adjustedRate: fee.adjustedRate,
        notes: [...capped.notes, ...fee.notes],
    };
}
