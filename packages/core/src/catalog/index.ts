/**
 * Catalog module: ingestion, snapshots, statistics.
 */

export { validateCatalog } from './validate.js';
export { createSnapshot, catalogFingerprint, CatalogStore } from './snapshot.js';
export type { CatalogLoader, RefreshResult } from './snapshot.js';
export { catalogStats, rulesPerCard } from './stats.js';
export type { CatalogView, CatalogSnapshot, CatalogValidationResult } from './types.js';
