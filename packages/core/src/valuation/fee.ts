import { Decimal } from 'decimal.js';
import { formatDollars, formatRate } from '../utils/format.js';
import type { RateAdjustment } from './types.js';

/**
 * Deduct an annual-fee penalty from a rate.
 *
 * Penalty is `weight * annualFee / 100` percentage points, clamped so the
 * rate never goes below 0. Weight 0 or a fee-free card leaves the rate alone.
 */
export function applyAnnualFeePenalty(
    rate: number,
    annualFee: number,
    weight: number
): RateAdjustment {
    if (weight <= 0 || annualFee <= 0) {
        return { adjustedRate: rate, notes: [] };
    }

    const penalty = new Decimal(weight).times(annualFee).dividedBy(100);
    const adjusted = Decimal.max(new Decimal(rate).minus(penalty), 0).toNumber();

    return {
        adjustedRate: adjusted,
        notes: [`Annual fee of ${formatDollars(annualFee)} reduces the effective rate by ${formatRate(penalty.toNumber())} points`],
    };
}
