import { compareCards, type CardComparison } from '@cardwise/core';
import { formatComparison } from '../format/recommendation.js';
import { fail, log } from '../utils/console.js';
import { loadSession, toResolveOptions } from './session.js';
import type { QueryOptions } from '../types.js';

export function compare(query: string, options: QueryOptions): void {
    const session = loadSession(options);

    let rows: CardComparison[];
    try {
        rows = compareCards(
            query,
            session.store.current(),
            session.reference,
            toResolveOptions(options, session.settings)
        );
    } catch (err) {
        fail(err instanceof Error ? err.message : String(err));
    }

    if (options.json) {
        log(JSON.stringify(rows, null, 2));
        return;
    }
    for (const line of formatComparison(query, rows)) {
        log(line);
    }
}
