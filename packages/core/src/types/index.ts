/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    RewardType,
    CapPeriod,
    CardProduct,
    RewardProgram,
    Cap,
    EarningRule,
    Catalog,
    CatalogStats,
    KnownMerchant,
    ReferenceData,
    ResolveOptions,
    ResolveOptionsInput,
    QueryResolution,
    CardScore,
    ComputedRecommendation,
    CardComparison,
    ParsedRewardRule,
} from '@cardwise/shared';

export {
    CatalogSchema,
    EarningRuleSchema,
    ReferenceDataSchema,
    ResolveOptionsSchema,
    REWARD_DEFAULTS,
    SPECIFICITY_WEIGHTS,
    QUERY_NOISE_SUFFIXES,
    UNRESOLVED_CATEGORY,
    CATALOG_LIMITS,
    REWARD_TEXT,
} from '@cardwise/shared';
