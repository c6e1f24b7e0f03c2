import { parseDocument, isSeq, isMap, isScalar } from 'yaml';
import { readFile, writeFile } from 'node:fs/promises';
import type { EarningRule } from '@cardwise/shared';

/**
 * Plain object for a rule, leaving out fields that hold their defaults.
 */
export function toYamlRule(rule: EarningRule): Record<string, unknown> {
    const out: Record<string, unknown> = {
        card_id: rule.card_id,
        description: rule.description,
    };
    if (rule.categories.length > 0) out.categories = rule.categories;
    if (rule.mccs.length > 0) out.mccs = rule.mccs;
    if (rule.merchant_names.length > 0) out.merchant_names = rule.merchant_names;
    out.multiplier = rule.multiplier;
    out.reward_type = rule.reward_type;
    if (rule.caps.length > 0) out.caps = rule.caps;
    if (rule.is_rotating) out.is_rotating = true;
    if (rule.is_intro_offer_only) out.is_intro_offer_only = true;
    if (rule.stacking_note) out.stacking_note = rule.stacking_note;
    if (rule.valid_from) out.valid_from = rule.valid_from;
    if (rule.valid_to) out.valid_to = rule.valid_to;
    return out;
}

/**
 * Appends earning rules to a catalog YAML file while preserving comments.
 * Round-trips through the YAML document model so existing formatting survives.
 */
export async function appendRulesToCatalog(filePath: string, rules: readonly EarningRule[]): Promise<void> {
    const content = await readFile(filePath, 'utf8');
    const doc = parseDocument(content);
    const root = doc.contents;
    const items = rules.map(toYamlRule);

    if (root === null) {
        // Empty file
        doc.set('rules', doc.createNode(items));
    } else if (isMap(root)) {
        const existing = root.get('rules', true);
        if (!existing || (isScalar(existing) && existing.value === null)) {
            doc.set('rules', doc.createNode(items));
        } else if (isSeq(existing)) {
            for (const item of items) {
                existing.add(doc.createNode(item));
            }
        } else {
            throw new Error(`Invalid YAML structure in ${filePath}: "rules" must be a list.`);
        }
    } else {
        throw new Error(`Invalid YAML structure in ${filePath}: expected a mapping with "cards" and "rules".`);
    }

    await writeFile(filePath, doc.toString());
}
