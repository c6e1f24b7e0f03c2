import { resolve, type ComputedRecommendation } from '@cardwise/core';
import { formatRecommendation } from '../format/recommendation.js';
import { fail, log } from '../utils/console.js';
import { loadSession, toResolveOptions } from './session.js';
import type { QueryOptions } from '../types.js';

export function recommend(query: string, options: QueryOptions): void {
    const session = loadSession(options);

    let result: ComputedRecommendation;
    try {
        result = resolve(
            query,
            session.store.current(),
            session.reference,
            toResolveOptions(options, session.settings)
        );
    } catch (err) {
        fail(err instanceof Error ? err.message : String(err));
    }

    if (options.json) {
        log(JSON.stringify(result, null, 2));
        return;
    }
    for (const line of formatRecommendation(result)) {
        log(line);
    }
}
