import { buildReferenceTables } from '../src/reference/build.js';
import type { CardProduct, EarningRule } from '../src/types/index.js';

/**
 * Small reference table shared by core tests.
 */
export const TEST_REFERENCE_DATA = {
    default_point_value_cents: 1,
    point_values: {
        AMEX_MR: 1.7,
        CHASE_UR: 1.7,
    },
    categories: {
        groceries: ['grocery', 'supermarket', 'supermarkets', 'grocery store'],
        gas: ['gas station', 'gas stations', 'fuel', 'gasoline'],
        restaurants: ['restaurant', 'restaurants', 'dining'],
        travel: ['travel', 'airline', 'airlines', 'flight', 'hotel'],
        online_shopping: ['online', 'e-commerce'],
        department_store: ['department store'],
        wholesale: ['wholesale club', 'warehouse'],
        streaming: ['streaming', 'netflix'],
        transit: ['transit', 'rideshare'],
    },
    mcc_categories: {
        '5411': ['groceries'],
        '5541': ['gas'],
        '5311': ['department_store'],
        '5331': ['general_merchandise'],
        '5300': ['wholesale'],
        '4511': ['travel', 'airline'],
    },
    merchants: [
        { key: "macy's", name: "Macy's", mcc: '5311', categories: ['department_store'], aliases: ['macys', 'macy'] },
        { key: 'costco', name: 'Costco', mcc: '5300', categories: ['wholesale', 'groceries'], aliases: ['costco wholesale'] },
        { key: 'walmart', name: 'Walmart', mcc: '5331', categories: ['general_merchandise', 'groceries'], aliases: ['walmart supercenter', 'walmart.com'] },
        { key: 'whole foods', name: 'Whole Foods', mcc: '5411', categories: ['groceries'], aliases: ['whole foods market', 'wholefoods'] },
        { key: 'delta', name: 'Delta Airlines', mcc: '4511', categories: ['travel', 'airline'], aliases: ['delta air lines'] },
    ],
};

export const TEST_REFERENCE = buildReferenceTables(TEST_REFERENCE_DATA);

// Helper to create a minimal card
export function makeCard(id: string, overrides: Partial<CardProduct> = {}): CardProduct {
    return {
        id,
        issuer: { name: 'Test Bank', website_url: 'https://bank.example.com' },
        name: `Card ${id}`,
        network: 'visa',
        reward_type: 'cashback_percent',
        annual_fee: 0,
        foreign_transaction_fee: 0,
        is_business_card: false,
        metadata: {},
        ...overrides,
    };
}

// Helper to create a minimal rule
export function makeRule(cardId: string, overrides: Partial<EarningRule> = {}): EarningRule {
    return {
        card_id: cardId,
        description: 'all purchases',
        categories: [],
        mccs: [],
        merchant_names: [],
        multiplier: 1,
        reward_type: 'cashback_percent',
        caps: [],
        is_rotating: false,
        is_intro_offer_only: false,
        ...overrides,
    };
}

/**
 * 6% cashback on groceries capped at $6,000/year.
 */
export const BLUE_CASH = makeCard('blue-cash', {
    name: 'Blue Cash Preferred',
    issuer: { name: 'American Express', website_url: 'https://www.americanexpress.com' },
    network: 'amex',
    annual_fee: 95,
});

/**
 * 4x Membership Rewards points on groceries (valued at 1.7 cents).
 */
export const GOLD = makeCard('gold', {
    name: 'Gold Card',
    issuer: { name: 'American Express', website_url: 'https://www.americanexpress.com' },
    network: 'amex',
    reward_type: 'points_per_dollar',
    annual_fee: 250,
    reward_program: { id: 'amex_mr', name: 'Membership Rewards', base_point_value_cents: 1 },
});

export const BLUE_CASH_GROCERIES = makeRule('blue-cash', {
    description: 'U.S. supermarkets',
    categories: ['groceries'],
    multiplier: 6,
    caps: [{ amount_dollars: 6000, period: 'year' }],
});

export const GOLD_GROCERIES = makeRule('gold', {
    description: 'U.S. supermarkets',
    categories: ['groceries'],
    multiplier: 4,
    reward_type: 'points_per_dollar',
});
