/**
 * Constants for Cardwise.
 */

/**
 * Reward valuation defaults.
 * Rates are expressed in cents earned per dollar spent (numerically a percentage).
 */
export const REWARD_DEFAULTS = {
    /** Cents per point/mile when no reward program is known. */
    POINT_VALUE_CENTS: 1.0,
    /** What a cashback card earns once a bonus category is exhausted. */
    CASHBACK_BASE_RATE: 1.0,
    MAX_RESULTS: 5,
    /** Percentage points deducted per $100 of annual fee. 0 disables the penalty. */
    ANNUAL_FEE_WEIGHT: 0,
} as const;

/**
 * Specificity weights for best-rule-per-card matching.
 * Higher score = more specific rule, tried first.
 */
export const SPECIFICITY_WEIGHTS = {
    CATEGORY: 10,
    MERCHANT_NAME: 20,
    MCC: 15,
    HAS_CAP: 5,
    ROTATING: -10,
} as const;

/**
 * Trailing tokens stripped from a query before lookup.
 * Order matters only for readability; stripping repeats until none apply.
 */
export const QUERY_NOISE_SUFFIXES = [
    '.com',
    ' store',
    ' stores',
    ' gas station',
    ' supercenter',
] as const;

/**
 * Synthetic category used when a query is empty after cleaning.
 */
export const UNRESOLVED_CATEGORY = 'uncategorized';

/**
 * Catalog and reference data limits.
 */
export const CATALOG_LIMITS = {
    MCC_LENGTH: 4,
    FINGERPRINT_LENGTH: 16,
} as const;

/**
 * Spending cap periods understood by the valuation engine.
 */
export const CAP_PERIODS = ['month', 'quarter', 'year', 'lifetime'] as const;

/**
 * Reward currencies a card or rule can earn in.
 */
export const REWARD_TYPES = [
    'cashback_percent',
    'points_per_dollar',
    'miles_per_dollar',
    'hybrid',
] as const;

export const CARD_NETWORKS = ['visa', 'mastercard', 'amex', 'discover'] as const;

/**
 * Reward text parsing.
 */
export const REWARD_TEXT = {
    /** Sentences shorter than this are ignored. */
    MIN_SENTENCE_LENGTH: 10,
    /** Sentences containing any of these (whole words) are marketing copy. */
    SKIP_PHRASES: ['compare', 'vs', 'versus', 'better than', 'advertisement', 'sponsored'],
    /** Dropped when extracting keywords from category text. */
    STOP_WORDS: ['at', 'on', 'for', 'the', 'and', 'other', 'select', 'u.s.', 'us'],
    /** Priority per recognised category; +1 for a capped rule. */
    CATEGORY_PRIORITY: 10,
} as const;
