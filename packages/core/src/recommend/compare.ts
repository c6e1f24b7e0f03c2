import type { CardComparison, ResolveOptionsInput } from '../types/index.js';
import type { CatalogView } from '../catalog/types.js';
import type { ReferenceTables } from '../reference/types.js';
import { normalizeQuery } from '../normalizer/index.js';
import { findBestRules } from '../matcher/index.js';
import { collectNotes, explainScore, sortByRate } from '../ranker/index.js';
import { applyAnnualFeePenalty, baseRateFor } from '../valuation/index.js';
import { formatRate } from '../utils/format.js';
import { assertCatalogShape, parseResolveOptions } from './options.js';
import { valueMatch } from './value.js';

/**
 * Compare cards head to head: one entry per eligible card, valued by its
 * most specific matching rule, or its base rate when nothing matches.
 *
 * @returns Comparisons sorted by rate descending, at most maxResults
 */
export function compareCards(
    query: string,
    catalog: CatalogView,
    reference: ReferenceTables,
    options: ResolveOptionsInput = {}
): CardComparison[] {
    assertCatalogShape(catalog);
    const opts = parseResolveOptions(options);

    const resolution = normalizeQuery(query, reference, { wordBoundary: opts.wordBoundary });
    const best = findBestRules(resolution, catalog, { includeBusiness: opts.includeBusiness });

    const rows = best.map(({ card, rule }) => {
        if (rule) {
            const valued = valueMatch(card, rule, reference, opts);
            return {
                card,
                rule,
                adjusted_rate: valued.adjustedRate,
                explanation: explainScore(card.name, rule, valued.adjustedRate),
                notes: collectNotes(rule, valued.notes),
            };
        }

        const fee = applyAnnualFeePenalty(baseRateFor(card, reference), card.annual_fee, opts.annualFeeWeight);
        return {
            card,
            rule: null,
            adjusted_rate: fee.adjustedRate,
            explanation: `${card.name} earns its base rate (${formatRate(fee.adjustedRate)}%) for ${query}`,
            notes: fee.notes,
        };
    });

    return sortByRate(rows)
        .slice(0, opts.maxResults)
        .map(row => ({
            card: row.card,
            rule: row.rule,
            effective_rate: row.adjusted_rate,
            explanation: row.explanation,
            notes: row.notes,
        }));
}
