/**
 * Global rule matching: every (card, rule) pair that applies to a query.
 *
 * A rule applies on ANY of three signals, unweighted:
 * - category: rule.categories intersects the resolved categories
 * - MCC: the resolved MCC is in rule.mccs
 * - merchant: case-insensitive containment in either direction between the
 *   resolved merchant name and one of rule.merchant_names
 */

import type { CardProduct, EarningRule, QueryResolution } from '../types/index.js';
import type { CatalogView } from '../catalog/types.js';
import type { MatchedRule, MatchOptions } from './types.js';

function categoryMatch(rule: EarningRule, resolution: QueryResolution): boolean {
    return rule.categories.some(category => resolution.normalized_categories.includes(category));
}

function mccMatch(rule: EarningRule, resolution: QueryResolution): boolean {
    return resolution.mcc !== undefined && rule.mccs.includes(resolution.mcc);
}

function merchantMatch(rule: EarningRule, resolution: QueryResolution): boolean {
    const merchantName = resolution.merchant_name.toLowerCase().trim();
    if (!merchantName) return false;

    return rule.merchant_names.some(name => {
        const ruleName = name.toLowerCase().trim();
        return ruleName.length > 0 &&
            (ruleName.includes(merchantName) || merchantName.includes(ruleName));
    });
}

/**
 * Test whether a rule applies to a resolved query.
 */
export function matchesResolution(rule: EarningRule, resolution: QueryResolution): boolean {
    return categoryMatch(rule, resolution) ||
        mccMatch(rule, resolution) ||
        merchantMatch(rule, resolution);
}

/**
 * Index cards by id.
 */
export function indexCards(cards: readonly CardProduct[]): Map<string, CardProduct> {
    const byId = new Map<string, CardProduct>();
    for (const card of cards) {
        byId.set(card.id, card);
    }
    return byId;
}

/**
 * Whether a card takes part in matching under the given options.
 */
export function isEligibleCard(card: CardProduct, options: MatchOptions = {}): boolean {
    return options.includeBusiness === true || !card.is_business_card;
}

/**
 * Find every rule in the catalog that applies to the resolution.
 *
 * Rules referencing a card not in the catalog are skipped silently.
 * Output preserves rule catalog order.
 *
 * @param resolution - Normalizer output
 * @param catalog - Cards and rules to search
 * @param options - includeBusiness (default false)
 */
export function matchAll(
    resolution: QueryResolution,
    catalog: CatalogView,
    options: MatchOptions = {}
): MatchedRule[] {
    const cardsById = indexCards(catalog.cards);
    const matches: MatchedRule[] = [];

    for (const rule of catalog.rules) {
        const card = cardsById.get(rule.card_id);
        if (!card) continue;
        if (!isEligibleCard(card, options)) continue;

        if (matchesResolution(rule, resolution)) {
            matches.push({ card, rule });
        }
    }

    return matches;
}
