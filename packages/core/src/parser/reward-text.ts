/**
 * Reward text parser.
 *
 * Turns issuer marketing copy ("6% cash back at U.S. supermarkets, on up to
 * $6,000 in spending per year") into structured earning rules. Category
 * keywords come from the reference synonym table, so one parser serves every
 * issuer.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Warnings returned as data.
 */

import { REWARD_TEXT } from '../types/index.js';
import type { Cap, CapPeriod, EarningRule, ParsedRewardRule, RewardType } from '../types/index.js';
import type { ReferenceTables } from '../reference/types.js';
import type { NormalizeOptions } from '../normalizer/types.js';
import { containsPhrase, normalizeText } from '../utils/normalize.js';

interface RewardPattern {
    regex: RegExp;
    rewardType: RewardType;
}

/**
 * First match wins. Group 1 is the multiplier, group 2 the category text.
 */
const REWARD_PATTERNS: readonly RewardPattern[] = [
    { regex: /(\d+(?:\.\d+)?)\s*%\s*cash\s*back\s+(?:at|on|for)\s+(.+)/i, rewardType: 'cashback_percent' },
    { regex: /(\d+(?:\.\d+)?)\s*x\s+points?\s+(?:at|on|for)\s+(.+)/i, rewardType: 'points_per_dollar' },
    { regex: /(\d+(?:\.\d+)?)\s*miles?\s+per\s+dollar\s+(?:at|on|for)\s+(.+)/i, rewardType: 'miles_per_dollar' },
    { regex: /(\d+(?:\.\d+)?)\s*x\s+miles?\s+(?:at|on|for)\s+(.+)/i, rewardType: 'miles_per_dollar' },
    { regex: /(\d+(?:\.\d+)?)\s*x\s+rewards?\s+(?:at|on|for)\s+(.+)/i, rewardType: 'hybrid' },
];

const CAP_PATTERN =
    /up\s+to\s+\$(\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?\s*(?:in\s+(?:combined\s+)?(?:spending|purchases)\s+)?(?:per|each|a)\s+(year|quarter|month)/i;

/** Category text ends where the cap clause begins. */
const CAP_CLAUSE = /,?\s*(?:on\s+)?up\s+to\s+\$.*$/i;

const ROTATING_PATTERN = /rotating|quarterly|changes/i;
const INTRO_PATTERN = /\b(?:intro|introductory|first year)\b/i;

export interface RewardTextResult {
    rules: ParsedRewardRule[];
    warnings: string[];
}

/**
 * Split text on newlines, semicolons, and periods that end a sentence
 * (followed by whitespace and a capital letter or digit).
 */
export function splitSentences(text: string): string[] {
    return text
        .split(/\n|;|\.\s+(?=[A-Z0-9])/)
        .map(sentence => sentence.trim().replace(/\.$/, '').trim())
        .filter(sentence => sentence.length > 0);
}

function isMarketingCopy(sentence: string): boolean {
    const lowered = sentence.toLowerCase();
    return REWARD_TEXT.SKIP_PHRASES.some(phrase => containsPhrase(lowered, phrase, true));
}

/**
 * Extract a spending cap ("up to $1,500 in combined purchases each quarter").
 */
export function extractCap(sentence: string): Cap | undefined {
    const match = CAP_PATTERN.exec(sentence);
    if (!match) return undefined;

    const [, amountText, periodText] = match;
    if (!amountText || !periodText) return undefined;

    const period = periodText.toLowerCase();
    if (period !== 'year' && period !== 'quarter' && period !== 'month') return undefined;
    const capPeriod: CapPeriod = period;

    return {
        amount_dollars: Number(amountText.replace(/,/g, '')),
        period: capPeriod,
    };
}

/**
 * Canonical categories whose name or any synonym occurs in the text.
 * Reference table order.
 */
export function extractCategories(
    text: string,
    reference: ReferenceTables,
    options: NormalizeOptions = {}
): string[] {
    const lowered = normalizeText(text);
    const wordBoundary = options.wordBoundary ?? false;
    const categories: string[] = [];

    for (const [category, synonyms] of reference.categorySynonyms) {
        const phrases = [category.replace(/_/g, ' '), ...synonyms];
        if (phrases.some(phrase => containsPhrase(lowered, phrase, wordBoundary))) {
            categories.push(category);
        }
    }
    return categories;
}

/**
 * Significant words of the category text (stop words and short words dropped).
 */
export function extractKeywords(text: string): string[] {
    const stopWords: ReadonlySet<string> = new Set(REWARD_TEXT.STOP_WORDS);
    const words = text.toLowerCase().match(/[a-z0-9][a-z0-9'+-]*/g) ?? [];
    return words.filter(word => word.length > 2 && !stopWords.has(word));
}

/**
 * Parse reward rules from free text.
 *
 * @param text - Marketing or benefits copy, one or more sentences
 * @param reference - Reference tables (category synonyms)
 * @param options - wordBoundary for category keyword matching
 * @returns One rule per recognised sentence, plus warnings for sentences
 *          whose categories could not be identified
 */
export function parseRewardText(
    text: string,
    reference: ReferenceTables,
    options: NormalizeOptions = {}
): RewardTextResult {
    const rules: ParsedRewardRule[] = [];
    const warnings: string[] = [];

    for (const sentence of splitSentences(text)) {
        if (sentence.length < REWARD_TEXT.MIN_SENTENCE_LENGTH) continue;
        if (isMarketingCopy(sentence)) continue;

        for (const pattern of REWARD_PATTERNS) {
            const match = pattern.regex.exec(sentence);
            if (!match) continue;

            const [, multiplierText, rawCategoryText] = match;
            if (!multiplierText || !rawCategoryText) continue;

            const categoryText = rawCategoryText.replace(CAP_CLAUSE, '').trim();
            const categories = extractCategories(categoryText, reference, options);
            const cap = extractCap(sentence);

            if (categories.length === 0) {
                warnings.push(`No known category in "${sentence}"`);
            }

            rules.push({
                multiplier: Number(multiplierText),
                reward_type: pattern.rewardType,
                categories,
                keywords: extractKeywords(categoryText),
                description: sentence,
                cap,
                is_rotating: ROTATING_PATTERN.test(sentence),
                is_intro_offer_only: INTRO_PATTERN.test(sentence),
                priority: categories.length * REWARD_TEXT.CATEGORY_PRIORITY + (cap ? 1 : 0),
            });
            break;
        }
    }

    return { rules, warnings };
}

/**
 * Bind a parsed rule to a card.
 */
export function toEarningRule(parsed: ParsedRewardRule, cardId: string): EarningRule {
    return {
        card_id: cardId,
        description: parsed.description,
        categories: [...parsed.categories],
        mccs: [],
        merchant_names: [],
        multiplier: parsed.multiplier,
        reward_type: parsed.reward_type,
        caps: parsed.cap ? [parsed.cap] : [],
        is_rotating: parsed.is_rotating,
        is_intro_offer_only: parsed.is_intro_offer_only,
    };
}
