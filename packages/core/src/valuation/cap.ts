/**
 * Spending cap blending.
 *
 * A capped bonus earns its rate up to the cap and the card's base rate above it.
 * Only the first cap of a rule is applied.
 */

import { Decimal } from 'decimal.js';
import type { Cap } from '../types/index.js';
import { formatDollars, formatRate } from '../utils/format.js';
import type { RateAdjustment } from './types.js';

function describeCap(cap: Cap): string {
    return `${formatDollars(cap.amount_dollars)}/${cap.period}`;
}

/**
 * Apply the first spending cap to an effective rate.
 *
 * - No spending hint (0): assumes spend exceeds the cap, rate is the
 *   midpoint of the bonus and base rates.
 * - Spend above the cap: dollar-weighted blend of bonus and base rates.
 * - Spend at or below the cap: rate unchanged.
 *
 * @param rate - Effective rate before the cap, cents per dollar
 * @param caps - Rule caps, in order
 * @param spendingAmount - Expected spend in dollars, 0 when unknown
 * @param baseRate - Rate earned above the cap
 */
export function applyCap(
    rate: number,
    caps: readonly Cap[],
    spendingAmount = 0,
    baseRate = 1.0
): RateAdjustment {
    const cap = caps[0];
    if (!cap) {
        return { adjustedRate: rate, notes: [] };
    }

    const capLabel = describeCap(cap);

    if (spendingAmount === 0) {
        const blended = new Decimal(rate).plus(baseRate).dividedBy(2).toNumber();
        return {
            adjustedRate: blended,
            notes: [`Spending cap: ${capLabel}. Blended rate: ${formatRate(blended)}% (assumes spending exceeds cap)`],
        };
    }

    if (spendingAmount > cap.amount_dollars) {
        const capDollars = new Decimal(cap.amount_dollars);
        const spend = new Decimal(spendingAmount);
        const blended = capDollars.times(rate)
            .plus(spend.minus(capDollars).times(baseRate))
            .dividedBy(spend)
            .toNumber();
        return {
            adjustedRate: blended,
            notes: [`Spending cap of ${capLabel} exceeded. Blended rate: ${formatRate(blended)}%`],
        };
    }

    return {
        adjustedRate: rate,
        notes: [`Spending cap: ${capLabel} (within limit)`],
    };
}
