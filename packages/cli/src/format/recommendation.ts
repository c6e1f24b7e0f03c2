/**
 * Plain-text rendering of recommendation results.
 */

import { formatRate } from '@cardwise/core';
import type { CardComparison, CardProduct, CatalogStats, ComputedRecommendation } from '@cardwise/shared';

function cardLine(rank: number, card: CardProduct, rate: number): string {
    const business = card.is_business_card ? ' [business]' : '';
    return `  ${rank}. ${card.name} (${card.issuer.name})${business}: ${formatRate(rate)}%`;
}

/**
 * Render a ranked recommendation.
 */
export function formatRecommendation(result: ComputedRecommendation): string[] {
    const lines = [`Best cards for "${result.query}" (${result.resolved_categories.join(', ')})`];

    result.candidates.forEach((candidate, index) => {
        lines.push(cardLine(index + 1, candidate.card, candidate.effective_rate));
        lines.push(`     ${candidate.explanation}`);
        for (const note of candidate.notes) {
            lines.push(`     - ${note}`);
        }
    });

    lines.push('', result.explanation);
    return lines;
}

/**
 * Render a card-by-card comparison.
 */
export function formatComparison(query: string, rows: readonly CardComparison[]): string[] {
    const lines = [`Card comparison for "${query}"`];
    rows.forEach((row, index) => {
        lines.push(cardLine(index + 1, row.card, row.effective_rate));
        lines.push(`     ${row.explanation}`);
        for (const note of row.notes) {
            lines.push(`     - ${note}`);
        }
    });
    if (rows.length === 0) {
        lines.push('  No eligible cards in the catalog.');
    }
    return lines;
}

/**
 * Render catalog statistics.
 */
export function formatStats(stats: CatalogStats): string[] {
    const lines = [
        `Cards:              ${stats.cards_count}`,
        `Rules:              ${stats.rules_count}`,
        `Business cards:     ${stats.business_cards}`,
        `Rotating rules:     ${stats.rotating_rules}`,
        `Intro offer rules:  ${stats.intro_offer_rules}`,
        `Dangling rules:     ${stats.dangling_rules}`,
        'By issuer:',
    ];
    for (const [issuer, count] of Object.entries(stats.by_issuer)) {
        lines.push(`  ${issuer}: ${count}`);
    }
    lines.push('By reward type:');
    for (const [type, count] of Object.entries(stats.by_reward_type)) {
        lines.push(`  ${type}: ${count}`);
    }
    return lines;
}
