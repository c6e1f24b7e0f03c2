import { formatMultiplier, parseRewardText, toEarningRule } from '@cardwise/core';
import { appendRulesToCatalog } from '../yaml/rules.js';
import { success, log, arrow, warn, fail } from '../utils/console.js';
import { loadSession } from './session.js';
import type { AddRuleOptions } from '../types.js';

/**
 * Parse reward text for a card and append the resulting rules to catalog.yaml.
 */
export async function addRule(cardId: string, text: string, options: AddRuleOptions): Promise<void> {
    const session = loadSession(options);
    const catalog = session.store.current();

    const card = catalog.cards.find(c => c.id === cardId);
    if (!card) {
        fail(`Card "${cardId}" is not in the catalog. Run "cardwise cards" to list card ids.`);
    }

    const parsed = parseRewardText(text, session.reference, {
        wordBoundary: session.settings.word_boundary,
    });
    for (const w of parsed.warnings) {
        warn(w);
    }
    if (parsed.rules.length === 0) {
        fail('No reward rules recognised in the text.');
    }

    const rules = parsed.rules.map(rule => toEarningRule(rule, card.id));

    log(`${options.dryRun ? 'Parsed' : 'Adding'} ${rules.length} rule${rules.length === 1 ? '' : 's'} for ${card.name}:`);
    for (const rule of rules) {
        const categories = rule.categories.length > 0 ? rule.categories.join(', ') : '(none)';
        arrow(`${formatMultiplier(rule.multiplier)} ${rule.reward_type} on ${categories}`);
        for (const cap of rule.caps) {
            log(`    cap: $${cap.amount_dollars} per ${cap.period}`);
        }
    }

    if (options.dryRun) {
        log('\nDry run: catalog not modified.');
        return;
    }

    const catalogPath = session.workspace.config.catalogPath;
    try {
        await appendRulesToCatalog(catalogPath, rules);
    } catch (err) {
        fail(`Failed to add rules: ${err instanceof Error ? err.message : String(err)}`);
    }
    success(`Rules written to ${catalogPath}`);
}
