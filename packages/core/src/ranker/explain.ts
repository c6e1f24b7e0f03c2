/**
 * Human-readable explanation and note text.
 */

import type { CardScore, EarningRule } from '../types/index.js';
import { formatMultiplier, formatRate } from '../utils/format.js';

/**
 * "6% cashback", "4x points", "2x miles", "3x rewards".
 */
export function rewardPhrase(rule: EarningRule): string {
    const multiplier = formatMultiplier(rule.multiplier);
    switch (rule.reward_type) {
        case 'cashback_percent':
            return `${multiplier}% cashback`;
        case 'points_per_dollar':
            return `${multiplier}x points`;
        case 'miles_per_dollar':
            return `${multiplier}x miles`;
        case 'hybrid':
            return `${multiplier}x rewards`;
        default: {
            const exhaustive: never = rule.reward_type;
            throw new Error(`Unknown reward type: ${String(exhaustive)}`);
        }
    }
}

/**
 * One-line explanation for a scored (card, rule) pair.
 */
export function explainScore(cardName: string, rule: EarningRule, rate: number): string {
    return `${cardName} offers ${rewardPhrase(rule)} (${formatRate(rate)}% effective value) for ${rule.description}`;
}

/**
 * Valuation notes followed by notes derived from the rule's flags.
 */
export function collectNotes(rule: EarningRule, valuationNotes: readonly string[]): string[] {
    const notes = [...valuationNotes];
    if (rule.is_rotating) {
        notes.push('Rotating category - may require activation');
    }
    if (rule.is_intro_offer_only) {
        notes.push('Introductory offer - limited time');
    }
    if (rule.stacking_note) {
        notes.push(`Note: ${rule.stacking_note}`);
    }
    return notes;
}

/**
 * Summary sentence for a whole recommendation.
 */
export function overallExplanation(
    query: string,
    resolvedCategories: readonly string[],
    candidates: readonly CardScore[]
): string {
    const [best, runnerUp] = candidates;
    if (!best) {
        return `No specific rewards found for '${query}'. Consider cards with flat-rate rewards.`;
    }

    let text = `For ${query} (${resolvedCategories.join(', ')}), ${best.card.name} offers the best value at ${formatRate(best.effective_rate)}% effective return.`;
    if (runnerUp) {
        text += ` Other options include ${runnerUp.card.name} (${formatRate(runnerUp.effective_rate)}%).`;
    }
    return text;
}
