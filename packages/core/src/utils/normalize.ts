/**
 * Text normalization for query and table matching.
 *
 * Every table lookup compares lower-cased, whitespace-collapsed text on both
 * sides.
 */

import { QUERY_NOISE_SUFFIXES } from '../types/index.js';

/**
 * Normalize free text for matching.
 *
 * Transformations:
 * - Convert to lowercase
 * - Collapse multiple whitespace to single space
 * - Trim leading/trailing whitespace
 *
 * @param raw - Raw query or table string
 * @returns Normalized text
 */
export function normalizeText(raw: string): string {
    return raw
        .toLowerCase()
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Strip trailing noise suffixes ("walmart supercenter" -> "walmart").
 * Repeats until no suffix applies. Never strips the text down to nothing.
 *
 * @param text - Already normalized text
 * @param suffixes - Suffixes to strip (defaults to QUERY_NOISE_SUFFIXES)
 */
export function stripNoiseSuffixes(
    text: string,
    suffixes: readonly string[] = QUERY_NOISE_SUFFIXES
): string {
    let current = text;
    let stripped = true;
    while (stripped) {
        stripped = false;
        for (const suffix of suffixes) {
            if (current.endsWith(suffix) && current.length > suffix.length) {
                current = current.slice(0, -suffix.length).trim();
                stripped = true;
                break;
            }
        }
    }
    return current;
}

/**
 * Turn text into a synthetic category token ("home depot" -> "home_depot").
 */
export function toCategoryToken(text: string): string {
    return text.trim().replace(/\s+/g, '_');
}

function escapeRegex(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Check whether `phrase` occurs in `text`.
 *
 * With wordBoundary, the phrase must not touch a letter or digit on either
 * side, so "gas" no longer matches inside "vegas".
 */
export function containsPhrase(text: string, phrase: string, wordBoundary: boolean = false): boolean {
    if (!phrase) return false;
    if (!wordBoundary) {
        return text.includes(phrase);
    }
    const regex = new RegExp(`(?<![a-z0-9])${escapeRegex(phrase)}(?![a-z0-9])`);
    return regex.test(text);
}
