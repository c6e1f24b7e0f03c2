import type { CardProduct, EarningRule } from '../types/index.js';

/**
 * A matched (card, rule) pair with its adjusted rate, ready for ranking.
 */
export interface RankCandidate {
    card: CardProduct;
    rule: EarningRule;
    adjusted_rate: number;
    /** Valuation notes (cap, fee). Rule notes are added by the ranker. */
    notes: string[];
}

export interface RankInput {
    query: string;
    resolvedCategories: string[];
    candidates: readonly RankCandidate[];
    maxResults: number;
}
