/**
 * Query normalization: free text -> QueryResolution.
 *
 * Resolution order (first hit wins):
 * 1. Known merchant (key or alias, table order)
 * 2. Canonical category (exact key/synonym, then synonym containment)
 * 3. Synthetic category built from the cleaned query
 *
 * Containment is unanchored substring matching unless wordBoundary is set.
 */

import { UNRESOLVED_CATEGORY } from '../types/index.js';
import type { QueryResolution } from '../types/index.js';
import type { MerchantEntry, ReferenceTables } from '../reference/types.js';
import { containsPhrase, normalizeText, stripNoiseSuffixes, toCategoryToken } from '../utils/normalize.js';
import type { NormalizeOptions } from './types.js';

/**
 * Identify a known merchant.
 *
 * An entry matches when its key equals the query or cleaned query, its key
 * occurs in the query, or any alias does either. Table order breaks ties.
 *
 * @param lowered - Normalized query
 * @param cleaned - Normalized query with noise suffixes stripped
 * @returns First matching merchant, or null
 */
export function identifyMerchant(
    lowered: string,
    cleaned: string,
    reference: ReferenceTables,
    options: NormalizeOptions = {}
): MerchantEntry | null {
    const wordBoundary = options.wordBoundary ?? false;
    const hits = (phrase: string): boolean =>
        phrase === lowered ||
        phrase === cleaned ||
        containsPhrase(lowered, phrase, wordBoundary);

    for (const merchant of reference.merchants) {
        if (hits(merchant.key) || merchant.aliases.some(hits)) {
            return merchant;
        }
    }
    return null;
}

/**
 * Find the canonical category for a piece of text.
 *
 * Two passes over the synonym table: exact key or synonym first, then
 * containment of any synonym. The containment pass searches `fullText`,
 * so a synonym the caller stripped as noise ("chevron gas station") still counts.
 *
 * @param text - Text compared for exact matches
 * @param fullText - Text searched for contained synonyms (defaults to text)
 * @returns Canonical category, or null when the table has no match
 */
export function matchCanonicalCategory(
    text: string,
    reference: ReferenceTables,
    options: NormalizeOptions = {},
    fullText: string = text
): string | null {
    const normalized = normalizeText(text);
    const searched = normalizeText(fullText);

    if (normalized) {
        for (const [category, synonyms] of reference.categorySynonyms) {
            if (normalized === category || synonyms.includes(normalized)) {
                return category;
            }
        }
    }
    if (!searched) return null;

    const wordBoundary = options.wordBoundary ?? false;
    for (const [category, synonyms] of reference.categorySynonyms) {
        if (synonyms.some(synonym => containsPhrase(searched, synonym, wordBoundary))) {
            return category;
        }
    }

    return null;
}

/**
 * Normalize a category name, falling back to a synthetic token.
 * "US Supermarkets" -> "groceries"; "home improvement" -> "home_improvement".
 * The token is always built from `text`; `fullText` only widens synonym search.
 */
export function normalizeCategoryName(
    text: string,
    reference: ReferenceTables,
    options: NormalizeOptions = {},
    fullText: string = text
): string {
    const canonical = matchCanonicalCategory(text, reference, options, fullText);
    if (canonical) return canonical;

    const token = toCategoryToken(normalizeText(text));
    return token || UNRESOLVED_CATEGORY;
}

/**
 * Categories for a Merchant Category Code. Unknown codes yield [].
 */
export function categoriesForMcc(mcc: string, reference: ReferenceTables): string[] {
    return [...(reference.mccCategories.get(mcc) ?? [])];
}

/**
 * Resolve a raw query into merchant identity, MCC and categories.
 *
 * `normalized_categories` is never empty.
 *
 * @param query - Free text, e.g. "Walmart Supercenter" or "groceries"
 * @param reference - Reference tables
 * @param options - Matching options
 */
export function normalizeQuery(
    query: string,
    reference: ReferenceTables,
    options: NormalizeOptions = {}
): QueryResolution {
    const lowered = normalizeText(query);
    const cleaned = stripNoiseSuffixes(lowered);

    const merchant = identifyMerchant(lowered, cleaned, reference, options);
    if (merchant) {
        const categories = new Set(merchant.categories);
        if (merchant.mcc) {
            for (const category of categoriesForMcc(merchant.mcc, reference)) {
                categories.add(category);
            }
        }
        return {
            query,
            merchant_name: merchant.name,
            mcc: merchant.mcc,
            normalized_categories: [...categories],
        };
    }

    return {
        query,
        merchant_name: query.trim(),
        normalized_categories: [normalizeCategoryName(cleaned, reference, options, lowered)],
    };
}
