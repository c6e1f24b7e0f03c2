import { formatDollars, rulesPerCard } from '@cardwise/core';
import { log } from '../utils/console.js';
import { loadSession } from './session.js';
import type { GlobalOptions } from '../types.js';

/**
 * List catalog cards with their rule counts.
 */
export function listCards(options: GlobalOptions): void {
    const session = loadSession(options);
    const catalog = session.store.current();
    const counts = rulesPerCard(catalog);

    log(`${catalog.cards.length} cards in catalog`);
    for (const card of catalog.cards) {
        const business = card.is_business_card ? ' [business]' : '';
        const rules = counts.get(card.id) ?? 0;
        log(`  ${card.id}  ${card.name} (${card.issuer.name})${business}  fee ${formatDollars(card.annual_fee)}  ${rules} rule${rules === 1 ? '' : 's'}`);
    }
}
