import type { CatalogStats } from '../types/index.js';
import type { CatalogView } from './types.js';

function increment(counts: Record<string, number>, key: string): void {
    counts[key] = (counts[key] ?? 0) + 1;
}

/**
 * Summary counts for a catalog.
 * Issuer and reward type counts are per card.
 */
export function catalogStats(catalog: CatalogView): CatalogStats {
    const cardIds = new Set(catalog.cards.map(card => card.id));
    const byIssuer: Record<string, number> = {};
    const byRewardType: Record<string, number> = {};

    for (const card of catalog.cards) {
        increment(byIssuer, card.issuer.name);
        increment(byRewardType, card.reward_type);
    }

    return {
        cards_count: catalog.cards.length,
        rules_count: catalog.rules.length,
        business_cards: catalog.cards.filter(card => card.is_business_card).length,
        rotating_rules: catalog.rules.filter(rule => rule.is_rotating).length,
        intro_offer_rules: catalog.rules.filter(rule => rule.is_intro_offer_only).length,
        dangling_rules: catalog.rules.filter(rule => !cardIds.has(rule.card_id)).length,
        by_issuer: byIssuer,
        by_reward_type: byRewardType,
    };
}

/**
 * Number of rules per card id, including ids with no card.
 */
export function rulesPerCard(catalog: CatalogView): Map<string, number> {
    const counts = new Map<string, number>();
    for (const rule of catalog.rules) {
        counts.set(rule.card_id, (counts.get(rule.card_id) ?? 0) + 1);
    }
    return counts;
}
