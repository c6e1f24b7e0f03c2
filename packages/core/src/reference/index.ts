/**
 * Reference module: validated point-value, category, MCC and merchant tables.
 */

export { buildReferenceTables } from './build.js';
export type { ReferenceTables, MerchantEntry } from './types.js';
