/**
 * Normalizer module: free-text query resolution.
 */

export {
    normalizeQuery,
    identifyMerchant,
    matchCanonicalCategory,
    normalizeCategoryName,
    categoriesForMcc,
} from './normalize-query.js';
export type { NormalizeOptions } from './types.js';
