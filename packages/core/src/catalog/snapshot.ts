/**
 * Immutable catalog snapshots.
 *
 * The (cards, rules) pair is always replaced together. Readers hold a
 * snapshot reference for the duration of a call and never see a half-updated
 * catalog.
 */

import { sha256 } from 'js-sha256';
import { CATALOG_LIMITS } from '../types/index.js';
import type { CatalogSnapshot, CatalogView } from './types.js';
import { validateCatalog } from './validate.js';

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        Object.values(value).forEach((child: unknown) => deepFreeze(child));
    }
    return value;
}

/**
 * Fingerprint of a catalog's content: first 16 hex chars of SHA-256 over
 * its JSON form.
 */
export function catalogFingerprint(catalog: CatalogView): string {
    const payload = JSON.stringify({ cards: catalog.cards, rules: catalog.rules });
    return sha256(payload).slice(0, CATALOG_LIMITS.FINGERPRINT_LENGTH);
}

/**
 * Copy and deep-freeze a catalog.
 *
 * @param catalog - Validated catalog
 * @param loadedAt - Snapshot timestamp (defaults to now)
 */
export function createSnapshot(catalog: CatalogView, loadedAt: Date = new Date()): CatalogSnapshot {
    const cards = deepFreeze(structuredClone([...catalog.cards]));
    const rules = deepFreeze(structuredClone([...catalog.rules]));
    return Object.freeze({
        cards,
        rules,
        fingerprint: catalogFingerprint({ cards, rules }),
        loaded_at: loadedAt.toISOString(),
    });
}

export type CatalogLoader = () => unknown;

export interface RefreshResult {
    snapshot: CatalogSnapshot;
    warnings: string[];
}

/**
 * Holder of the current catalog snapshot.
 */
export class CatalogStore {
    private snapshot: CatalogSnapshot;
    private generation = 0;

    constructor(initial: CatalogView) {
        this.snapshot = createSnapshot(initial);
    }

    current(): CatalogSnapshot {
        return this.snapshot;
    }

    /**
     * Load, validate and swap in a new catalog.
     *
     * The loader may be sync or async. If it throws or its data fails
     * validation, the current snapshot stays in place and the error propagates.
     *
     * Overlapping refreshes: the most recently started one wins. A refresh
     * that settles after a newer one started does not replace the store's
     * snapshot; its own snapshot is still returned to the caller.
     */
    async refresh(loader: CatalogLoader): Promise<RefreshResult> {
        const generation = ++this.generation;
        const raw: unknown = await loader();
        const { catalog, warnings } = validateCatalog(raw);
        const next = createSnapshot(catalog);
        if (generation === this.generation) {
            this.snapshot = next;
        }
        return { snapshot: next, warnings };
    }
}
