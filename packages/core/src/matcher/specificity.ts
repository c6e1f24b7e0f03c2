/**
 * Best-single-rule-per-card matching.
 *
 * Rules are ranked once per card by specificity; matching walks that order
 * and takes the first rule that applies. No default rule is ever invented.
 */

import { SPECIFICITY_WEIGHTS } from '../types/index.js';
import type { EarningRule, QueryResolution } from '../types/index.js';
import type { CatalogView } from '../catalog/types.js';
import { isEligibleCard, matchesResolution } from './match-rules.js';
import type { BestRuleResult, MatchOptions, RuleIndex } from './types.js';

/**
 * Specificity score: higher = more specific.
 *
 * 10 per category, 20 per merchant name, 15 per MCC, +5 if capped,
 * -10 if rotating (may not be active).
 */
export function ruleSpecificity(rule: EarningRule): number {
    let score = 0;
    score += rule.categories.length * SPECIFICITY_WEIGHTS.CATEGORY;
    score += rule.merchant_names.length * SPECIFICITY_WEIGHTS.MERCHANT_NAME;
    score += rule.mccs.length * SPECIFICITY_WEIGHTS.MCC;
    if (rule.caps.length > 0) score += SPECIFICITY_WEIGHTS.HAS_CAP;
    if (rule.is_rotating) score += SPECIFICITY_WEIGHTS.ROTATING;
    return score;
}

/**
 * Group rules by card id, each group sorted by descending specificity.
 * Sort is stable: equal scores keep catalog order.
 */
export function buildRuleIndex(rules: readonly EarningRule[]): RuleIndex {
    const groups = new Map<string, EarningRule[]>();
    for (const rule of rules) {
        const group = groups.get(rule.card_id);
        if (group) {
            group.push(rule);
        } else {
            groups.set(rule.card_id, [rule]);
        }
    }

    const index = new Map<string, readonly EarningRule[]>();
    for (const [cardId, group] of groups) {
        const scored = group.map(rule => ({ rule, score: ruleSpecificity(rule) }));
        scored.sort((a, b) => b.score - a.score);
        index.set(cardId, scored.map(s => s.rule));
    }
    return index;
}

/**
 * Most specific rule of a card that applies to the resolution.
 *
 * @returns The rule, or null when none applies
 */
export function findBestRule(
    index: RuleIndex,
    cardId: string,
    resolution: QueryResolution
): EarningRule | null {
    const rules = index.get(cardId) ?? [];
    for (const rule of rules) {
        if (matchesResolution(rule, resolution)) {
            return rule;
        }
    }
    return null;
}

/**
 * Best rule for every eligible card, in catalog card order.
 */
export function findBestRules(
    resolution: QueryResolution,
    catalog: CatalogView,
    options: MatchOptions = {}
): BestRuleResult[] {
    const index = buildRuleIndex(catalog.rules);
    return catalog.cards
        .filter(card => isEligibleCard(card, options))
        .map(card => ({ card, rule: findBestRule(index, card.id, resolution) }));
}
