import type { CardScore, ComputedRecommendation } from '../types/index.js';
import { collectNotes, explainScore, overallExplanation } from './explain.js';
import type { RankCandidate, RankInput } from './types.js';

/**
 * Sort candidates by adjusted rate, descending.
 * Array.prototype.sort is stable, so ties keep matcher order.
 */
export function sortByRate<T extends { adjusted_rate: number }>(candidates: readonly T[]): T[] {
    return [...candidates].sort((a, b) => b.adjusted_rate - a.adjusted_rate);
}

function toCardScore(candidate: RankCandidate): CardScore {
    return {
        card: candidate.card,
        rule: candidate.rule,
        effective_rate: candidate.adjusted_rate,
        explanation: explainScore(candidate.card.name, candidate.rule, candidate.adjusted_rate),
        notes: collectNotes(candidate.rule, candidate.notes),
    };
}

/**
 * Rank matched candidates and build the final recommendation.
 *
 * @param input - Query, resolved categories, candidates in matcher order, result limit
 * @returns Recommendation with at most maxResults candidates
 */
export function rank(input: RankInput): ComputedRecommendation {
    const candidates = sortByRate(input.candidates)
        .slice(0, input.maxResults)
        .map(toCardScore);

    return {
        query: input.query,
        resolved_categories: [...input.resolvedCategories],
        candidates,
        explanation: overallExplanation(input.query, input.resolvedCategories, candidates),
    };
}
