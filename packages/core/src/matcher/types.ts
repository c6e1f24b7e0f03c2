import type { CardProduct, EarningRule } from '../types/index.js';

/**
 * Options for rule matching.
 */
export interface MatchOptions {
    /** Include rules on business cards. Default false. */
    includeBusiness?: boolean;
}

/**
 * A (card, rule) pair whose rule applies to a query.
 */
export interface MatchedRule {
    card: CardProduct;
    rule: EarningRule;
}

/**
 * Best rule for one card. `rule` is null when nothing matched;
 * the caller decides what default applies.
 */
export interface BestRuleResult {
    card: CardProduct;
    rule: EarningRule | null;
}

/**
 * Card id -> that card's rules, most specific first.
 */
export type RuleIndex = ReadonlyMap<string, readonly EarningRule[]>;
