/**
 * Valuation module: rules to cents earned per dollar.
 */

export { pointValueCents, baseRateFor } from './point-value.js';
export { effectiveRate } from './effective-rate.js';
export { applyCap } from './cap.js';
export { applyAnnualFeePenalty } from './fee.js';
export type { RateAdjustment } from './types.js';
