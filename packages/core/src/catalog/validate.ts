/**
 * Catalog ingestion.
 *
 * The only place catalog entities are validated. Everything downstream of
 * here trusts the data.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Findings returned as data.
 */

import { CatalogSchema } from '../types/index.js';
import type { EarningRule } from '../types/index.js';
import { formatIssues } from '../utils/issues.js';
import type { CatalogValidationResult } from './types.js';

function hasMatchCriteria(rule: EarningRule): boolean {
    return rule.categories.length > 0 || rule.mccs.length > 0 || rule.merchant_names.length > 0;
}

/**
 * Validate raw catalog data (e.g. parsed catalog.yaml).
 *
 * Fatal: schema violations, duplicate card ids.
 * Warnings: rules referencing unknown cards, rules that can never match,
 * rules whose validity window ends before it starts.
 *
 * @param raw - Unvalidated { cards, rules } object
 * @returns Parsed catalog with defaults applied, plus warnings
 * @throws Error listing every fatal problem
 */
export function validateCatalog(raw: unknown): CatalogValidationResult {
    const parsed = CatalogSchema.safeParse(raw);
    if (!parsed.success) {
        throw new Error(`Invalid catalog:\n- ${formatIssues(parsed.error).join('\n- ')}`);
    }
    const { cards, rules } = parsed.data;

    const errors: string[] = [];
    const cardIds = new Set<string>();
    cards.forEach((card, index) => {
        if (cardIds.has(card.id)) {
            errors.push(`cards.${index}.id: duplicate card id "${card.id}"`);
        }
        cardIds.add(card.id);
    });
    if (errors.length > 0) {
        throw new Error(`Invalid catalog:\n- ${errors.join('\n- ')}`);
    }

    const warnings: string[] = [];
    rules.forEach((rule, index) => {
        if (!cardIds.has(rule.card_id)) {
            warnings.push(`rules.${index}: card "${rule.card_id}" is not in the catalog; rule will be ignored`);
        }
        if (!hasMatchCriteria(rule)) {
            warnings.push(`rules.${index}: no categories, MCCs or merchant names; rule can never match`);
        }
        if (rule.valid_from && rule.valid_to && rule.valid_from > rule.valid_to) {
            warnings.push(`rules.${index}: valid_from ${rule.valid_from} is after valid_to ${rule.valid_to}`);
        }
    });

    return { catalog: { cards, rules }, warnings };
}
