import type { CardProduct, EarningRule } from '../types/index.js';

/**
 * Read-only view of the (cards, rules) pair.
 * Core functions accept this so that frozen snapshots and plain catalogs both fit.
 */
export interface CatalogView {
    readonly cards: readonly CardProduct[];
    readonly rules: readonly EarningRule[];
}

/**
 * Immutable catalog snapshot. Replaced wholesale, never mutated.
 */
export interface CatalogSnapshot extends CatalogView {
    /** Short content hash of the pair. */
    readonly fingerprint: string;
    /** ISO timestamp of when the snapshot was created. */
    readonly loaded_at: string;
}

/**
 * Result of catalog ingestion.
 */
export interface CatalogValidationResult {
    catalog: {
        cards: CardProduct[];
        rules: EarningRule[];
    };
    warnings: string[];
}
