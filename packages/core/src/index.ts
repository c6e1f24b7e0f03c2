// Types (re-exported from shared)
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
} from './types/index.js';

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
} from './types/index.js';

// Utils
export { normalizeText, stripNoiseSuffixes, containsPhrase } from './utils/index.js';
export { formatDollars, formatRate, formatMultiplier, formatIssues } from './utils/index.js';

// Reference tables
export { buildReferenceTables } from './reference/index.js';
export type { ReferenceTables, MerchantEntry } from './reference/index.js';

// Normalizer
export { normalizeQuery, normalizeCategoryName, categoriesForMcc } from './normalizer/index.js';
export type { NormalizeOptions } from './normalizer/index.js';

// Matcher
export { matchAll, ruleSpecificity, buildRuleIndex, findBestRule, findBestRules } from './matcher/index.js';
export type { MatchOptions, MatchedRule, BestRuleResult, RuleIndex } from './matcher/index.js';

// Valuation
export { pointValueCents, baseRateFor, effectiveRate, applyCap, applyAnnualFeePenalty } from './valuation/index.js';
export type { RateAdjustment } from './valuation/index.js';

// Ranker
export { rank } from './ranker/index.js';
export type { RankCandidate, RankInput } from './ranker/index.js';

// Recommendation
export { resolve, compareCards } from './recommend/index.js';

// Catalog
export { validateCatalog, createSnapshot, CatalogStore, catalogStats, rulesPerCard } from './catalog/index.js';
export type { CatalogView, CatalogSnapshot, CatalogValidationResult, RefreshResult } from './catalog/index.js';

// Reward text parser
export { parseRewardText, toEarningRule } from './parser/index.js';
export type { RewardTextResult } from './parser/index.js';
