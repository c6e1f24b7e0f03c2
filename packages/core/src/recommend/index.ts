/**
 * Recommendation module: resolve() and compareCards().
 */

export { resolve } from './resolve.js';
export { compareCards } from './compare.js';
export { valueMatch } from './value.js';
export type { ValuationOptions } from './value.js';
export { parseResolveOptions, assertCatalogShape } from './options.js';
