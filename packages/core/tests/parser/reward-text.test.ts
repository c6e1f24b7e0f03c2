import { describe, it, expect } from 'vitest';
import {
    extractCap,
    extractCategories,
    extractKeywords,
    parseRewardText,
    splitSentences,
    toEarningRule,
} from '../../src/parser/reward-text.js';
import { TEST_REFERENCE } from '../helpers.js';

const BLUE_CASH_TEXT =
    '6% cash back at U.S. supermarkets, on up to $6,000 in spending per year. ' +
    '6% cash back on select U.S. streaming subscriptions. ' +
    '3% cash back at U.S. gas stations. ' +
    '1% cash back on other purchases.';

describe('splitSentences', () => {
    it('splits on sentence-ending periods but not abbreviations', () => {
        expect(splitSentences(BLUE_CASH_TEXT)).toEqual([
            '6% cash back at U.S. supermarkets, on up to $6,000 in spending per year',
            '6% cash back on select U.S. streaming subscriptions',
            '3% cash back at U.S. gas stations',
            '1% cash back on other purchases',
        ]);
    });

    it('splits on newlines and semicolons', () => {
        expect(splitSentences('3% cash back on gas; 2% cash back on groceries\n1% on everything else')).toEqual([
            '3% cash back on gas',
            '2% cash back on groceries',
            '1% on everything else',
        ]);
    });
});

describe('extractCap', () => {
    it('reads amount and period', () => {
        expect(extractCap('on up to $6,000 in spending per year')).toEqual({ amount_dollars: 6000, period: 'year' });
        expect(extractCap('up to $1,500 in combined purchases each quarter')).toEqual({ amount_dollars: 1500, period: 'quarter' });
        expect(extractCap('up to $500 a month')).toEqual({ amount_dollars: 500, period: 'month' });
    });

    it('returns undefined without a cap', () => {
        expect(extractCap('3% cash back at gas stations')).toBeUndefined();
    });
});

describe('extractCategories', () => {
    it('finds categories by name or synonym in table order', () => {
        expect(extractCategories('dining and travel', TEST_REFERENCE)).toEqual(['restaurants', 'travel']);
        expect(extractCategories('U.S. supermarkets', TEST_REFERENCE)).toEqual(['groceries']);
    });

    it('honours wordBoundary', () => {
        expect(extractCategories('Las Vegas casinos', TEST_REFERENCE)).toEqual(['gas']);
        expect(extractCategories('Las Vegas casinos', TEST_REFERENCE, { wordBoundary: true })).toEqual([]);
    });
});

describe('extractKeywords', () => {
    it('drops stop words and short words', () => {
        expect(extractKeywords('select U.S. streaming subscriptions')).toEqual(['streaming', 'subscriptions']);
    });
});

describe('parseRewardText', () => {
    it('parses a full benefits paragraph', () => {
        const { rules, warnings } = parseRewardText(BLUE_CASH_TEXT, TEST_REFERENCE);

        expect(rules.map(r => [r.multiplier, r.reward_type, r.categories, r.priority])).toEqual([
            [6, 'cashback_percent', ['groceries'], 11],
            [6, 'cashback_percent', ['streaming'], 10],
            [3, 'cashback_percent', ['gas'], 10],
            [1, 'cashback_percent', [], 0],
        ]);
        expect(rules[0]?.cap).toEqual({ amount_dollars: 6000, period: 'year' });
        expect(rules[0]?.keywords).toEqual(['supermarkets']);
        expect(rules[1]?.cap).toBeUndefined();
        expect(warnings).toEqual(['No known category in "1% cash back on other purchases"']);
    });

    it('recognises points, miles and hybrid rewards', () => {
        const { rules } = parseRewardText(
            '3x points on dining and travel\n2 miles per dollar on flights\n2x miles on hotels\n5x rewards on rideshare',
            TEST_REFERENCE
        );
        expect(rules.map(r => [r.reward_type, r.multiplier, r.categories])).toEqual([
            ['points_per_dollar', 3, ['restaurants', 'travel']],
            ['miles_per_dollar', 2, ['travel']],
            ['miles_per_dollar', 2, ['travel']],
            ['hybrid', 5, ['transit']],
        ]);
        expect(rules[0]?.priority).toBe(20);
    });

    it('flags rotating and introductory offers', () => {
        const { rules } = parseRewardText(
            '5% cash back on rotating quarterly categories, up to $1,500 in combined purchases each quarter\n' +
            'Intro offer: 5% cash back on groceries for the first year',
            TEST_REFERENCE
        );
        expect(rules[0]?.is_rotating).toBe(true);
        expect(rules[0]?.cap).toEqual({ amount_dollars: 1500, period: 'quarter' });
        expect(rules[1]?.is_intro_offer_only).toBe(true);
        expect(rules[1]?.is_rotating).toBe(false);
        expect(rules[1]?.categories).toEqual(['groceries']);
    });

    it('skips marketing copy and short fragments', () => {
        const { rules, warnings } = parseRewardText(
            'Compare this card vs others: 10% cash back on everything\n2% back\nSponsored: 4% cash back at gas stations',
            TEST_REFERENCE
        );
        expect(rules).toEqual([]);
        expect(warnings).toEqual([]);
    });

    it('ignores sentences without a reward pattern', () => {
        expect(parseRewardText('No annual fee and no foreign transaction fees', TEST_REFERENCE).rules).toEqual([]);
    });
});

describe('toEarningRule', () => {
    it('binds a parsed rule to a card', () => {
        const { rules } = parseRewardText(BLUE_CASH_TEXT, TEST_REFERENCE);
        const [first] = rules;
        expect(first).toBeDefined();
        if (!first) return;

        expect(toEarningRule(first, 'blue-cash')).toEqual({
            card_id: 'blue-cash',
            description: '6% cash back at U.S. supermarkets, on up to $6,000 in spending per year',
            categories: ['groceries'],
            mccs: [],
            merchant_names: [],
            multiplier: 6,
            reward_type: 'cashback_percent',
            caps: [{ amount_dollars: 6000, period: 'year' }],
            is_rotating: false,
            is_intro_offer_only: false,
        });
    });
});
