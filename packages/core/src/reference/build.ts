/**
 * Build validated lookup tables from raw reference data.
 *
 * Validation happens here, once, at load time: unknown or malformed keys are
 * rejected instead of silently falling back to defaults inside valuation.
 */

import { ReferenceDataSchema } from '../types/index.js';
import { normalizeText } from '../utils/normalize.js';
import { formatIssues } from '../utils/issues.js';
import type { MerchantEntry, ReferenceTables } from './types.js';

/**
 * Build reference tables.
 *
 * Checks beyond the schema:
 * - point value program ids must be unique after upper-casing
 * - merchant keys must be unique after normalization
 * - merchant categories must be declared by the synonym or MCC table
 *
 * @param raw - Parsed reference.yaml content (unvalidated)
 * @returns Immutable lookup tables
 * @throws Error listing every problem found
 */
export function buildReferenceTables(raw: unknown): ReferenceTables {
    const parsed = ReferenceDataSchema.safeParse(raw);
    if (!parsed.success) {
        throw new Error(`Invalid reference data:\n- ${formatIssues(parsed.error).join('\n- ')}`);
    }
    const data = parsed.data;
    const errors: string[] = [];

    const pointValues = new Map<string, number>();
    for (const [programId, cents] of Object.entries(data.point_values)) {
        const key = programId.trim().toUpperCase();
        if (pointValues.has(key)) {
            errors.push(`point_values: duplicate program id "${key}"`);
            continue;
        }
        pointValues.set(key, cents);
    }

    const categorySynonyms = new Map<string, readonly string[]>();
    for (const [category, synonyms] of Object.entries(data.categories)) {
        categorySynonyms.set(category, synonyms.map(normalizeText));
    }

    const mccCategories = new Map<string, readonly string[]>();
    for (const [mcc, categories] of Object.entries(data.mcc_categories)) {
        mccCategories.set(mcc, [...categories]);
    }

    const knownCategories = new Set<string>(categorySynonyms.keys());
    for (const categories of mccCategories.values()) {
        for (const category of categories) knownCategories.add(category);
    }

    const merchants: MerchantEntry[] = [];
    const seenKeys = new Set<string>();
    data.merchants.forEach((merchant, index) => {
        const key = normalizeText(merchant.key);
        if (seenKeys.has(key)) {
            errors.push(`merchants.${index}: duplicate merchant key "${key}"`);
        }
        seenKeys.add(key);

        for (const category of merchant.categories) {
            if (!knownCategories.has(category)) {
                errors.push(`merchants.${index}: unknown category "${category}" for ${merchant.name}`);
            }
        }

        merchants.push({
            key,
            name: merchant.name,
            mcc: merchant.mcc,
            categories: [...merchant.categories],
            aliases: merchant.aliases.map(normalizeText),
        });
    });

    if (errors.length > 0) {
        throw new Error(`Invalid reference data:\n- ${errors.join('\n- ')}`);
    }

    return {
        defaultPointValueCents: data.default_point_value_cents,
        pointValues,
        categorySynonyms,
        mccCategories,
        merchants,
        knownCategories,
    };
}
