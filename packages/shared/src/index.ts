// Schemas
export {
    RewardTypeSchema,
    CardNetworkSchema,
    CapPeriodSchema,
    CardIssuerSchema,
    RewardProgramSchema,
    CardProductSchema,
    CapSchema,
    EarningRuleSchema,
    CatalogSchema,
    CatalogStatsSchema,
    KnownMerchantSchema,
    ReferenceDataSchema,
    SettingsSchema,
    ResolveOptionsSchema,
    QueryResolutionSchema,
    CardScoreSchema,
    ComputedRecommendationSchema,
    CardComparisonSchema,
    ParsedRewardRuleSchema,
    mccCode,
    categoryToken,
} from './schemas.js';

// Types
export type {
    RewardType,
    CardNetwork,
    CapPeriod,
    CardIssuer,
    RewardProgram,
    CardProduct,
    Cap,
    EarningRule,
    Catalog,
    CatalogStats,
    KnownMerchant,
    ReferenceData,
    Settings,
    ResolveOptions,
    ResolveOptionsInput,
    QueryResolution,
    CardScore,
    ComputedRecommendation,
    CardComparison,
    ParsedRewardRule,
} from './schemas.js';

// Constants
export {
    REWARD_DEFAULTS,
    SPECIFICITY_WEIGHTS,
    QUERY_NOISE_SUFFIXES,
    UNRESOLVED_CATEGORY,
    CATALOG_LIMITS,
    CAP_PERIODS,
    REWARD_TYPES,
    CARD_NETWORKS,
    REWARD_TEXT,
} from './constants.js';
