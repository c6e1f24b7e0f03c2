/**
 * Recommendation pipeline: query -> ranked card scores.
 *
 * Normalizer -> Matcher (global) -> Valuation -> Ranker.
 * Pure and synchronous: same arguments, same result.
 */

import type { ComputedRecommendation, ResolveOptionsInput } from '../types/index.js';
import type { CatalogView } from '../catalog/types.js';
import type { ReferenceTables } from '../reference/types.js';
import { normalizeQuery } from '../normalizer/index.js';
import { matchAll } from '../matcher/index.js';
import { rank } from '../ranker/index.js';
import type { RankCandidate } from '../ranker/index.js';
import { assertCatalogShape, parseResolveOptions } from './options.js';
import { valueMatch } from './value.js';

/**
 * Recommend cards for a free-text merchant or category query.
 *
 * Every matching (card, rule) pair is a candidate, so one card can appear
 * more than once.
 *
 * @param query - Merchant or category text ("Whole Foods", "gas")
 * @param catalog - Cards and earning rules
 * @param reference - Built reference tables
 * @param options - maxResults, includeBusiness, spendingAmount, annualFeeWeight, wordBoundary
 * @returns Ranked recommendation
 * @throws Error if the catalog is structurally invalid or options fail validation
 */
export function resolve(
    query: string,
    catalog: CatalogView,
    reference: ReferenceTables,
    options: ResolveOptionsInput = {}
): ComputedRecommendation {
    assertCatalogShape(catalog);
    const opts = parseResolveOptions(options);

    const resolution = normalizeQuery(query, reference, { wordBoundary: opts.wordBoundary });
    const matches = matchAll(resolution, catalog, { includeBusiness: opts.includeBusiness });

    const candidates: RankCandidate[] = matches.map(({ card, rule }) => {
        const valued = valueMatch(card, rule, reference, opts);
        return {
            card,
            rule,
            adjusted_rate: valued.adjustedRate,
            notes: valued.notes,
        };
    });

    return rank({
        query,
        resolvedCategories: resolution.normalized_categories,
        candidates,
        maxResults: opts.maxResults,
    });
}
