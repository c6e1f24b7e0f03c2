import { describe, it, expect } from 'vitest';
import { matchAll, matchesResolution } from '../../src/matcher/match-rules.js';
import type { QueryResolution } from '../../src/types/index.js';
import { makeCard, makeRule } from '../helpers.js';

function resolution(overrides: Partial<QueryResolution> = {}): QueryResolution {
    return {
        query: 'test',
        merchant_name: 'test',
        normalized_categories: ['groceries'],
        ...overrides,
    };
}

describe('matchesResolution', () => {
    it('matches on category intersection', () => {
        const rule = makeRule('a', { categories: ['gas', 'groceries'] });
        expect(matchesResolution(rule, resolution())).toBe(true);
    });

    it('matches on MCC', () => {
        const rule = makeRule('a', { mccs: ['5411'] });
        expect(matchesResolution(rule, resolution({ normalized_categories: ['other'], mcc: '5411' }))).toBe(true);
        expect(matchesResolution(rule, resolution({ normalized_categories: ['other'] }))).toBe(false);
    });

    it('matches merchant names in either direction, ignoring case', () => {
        const rule = makeRule('a', { merchant_names: ['Amazon'] });
        expect(matchesResolution(rule, resolution({ normalized_categories: ['x'], merchant_name: 'amazon.com' }))).toBe(true);
        const longRule = makeRule('a', { merchant_names: ['Amazon Fresh'] });
        expect(matchesResolution(longRule, resolution({ normalized_categories: ['x'], merchant_name: 'AMAZON' }))).toBe(true);
    });

    it('ignores an empty merchant name', () => {
        const rule = makeRule('a', { merchant_names: ['Amazon'] });
        expect(matchesResolution(rule, resolution({ normalized_categories: ['x'], merchant_name: '  ' }))).toBe(false);
    });

    it('does not match a rule with no criteria', () => {
        expect(matchesResolution(makeRule('a'), resolution())).toBe(false);
    });
});

describe('matchAll', () => {
    const personal = makeCard('personal');
    const business = makeCard('business', { is_business_card: true });

    it('returns every matching rule in catalog order', () => {
        const rules = [
            makeRule('personal', { description: 'groceries', categories: ['groceries'] }),
            makeRule('personal', { description: 'gas', categories: ['gas'] }),
            makeRule('personal', { description: 'supermarkets', mccs: ['5411'] }),
        ];
        const matches = matchAll(resolution({ mcc: '5411' }), { cards: [personal], rules });
        expect(matches.map(m => m.rule.description)).toEqual(['groceries', 'supermarkets']);
        expect(matches.every(m => m.card === personal)).toBe(true);
    });

    it('skips rules referencing unknown cards', () => {
        const rules = [makeRule('retired', { categories: ['groceries'] })];
        expect(matchAll(resolution(), { cards: [personal], rules })).toEqual([]);
    });

    it('excludes business cards by default', () => {
        const rules = [
            makeRule('business', { categories: ['groceries'] }),
            makeRule('personal', { categories: ['groceries'] }),
        ];
        const catalog = { cards: [personal, business], rules };

        expect(matchAll(resolution(), catalog).map(m => m.card.id)).toEqual(['personal']);
        expect(matchAll(resolution(), catalog, { includeBusiness: true }).map(m => m.card.id))
            .toEqual(['business', 'personal']);
    });

    it('returns an empty list when nothing matches', () => {
        const rules = [makeRule('personal', { categories: ['travel'] })];
        expect(matchAll(resolution(), { cards: [personal], rules })).toEqual([]);
    });
});
