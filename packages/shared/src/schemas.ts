/**
 * Zod schemas for Cardwise data structures.
 *
 * Catalog entities arrive from outside (YAML files, other tools) and are
 * validated here, at the ingestion boundary. The core assumes anything it
 * receives already satisfies these schemas.
 */

import { z } from 'zod';
import { CAP_PERIODS, CARD_NETWORKS, CATALOG_LIMITS, REWARD_DEFAULTS, REWARD_TYPES } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

/**
 * Merchant Category Code: exactly 4 digits, kept as a string ("0742" is valid).
 */
export const mccCode = z.string().regex(
    new RegExp(`^\\d{${CATALOG_LIMITS.MCC_LENGTH}}$`),
    `Must be a ${CATALOG_LIMITS.MCC_LENGTH}-digit MCC`
);

/**
 * Canonical category token: lower snake_case (e.g. "groceries", "online_shopping").
 */
export const categoryToken = z.string().regex(
    /^[a-z0-9]+(?:_[a-z0-9]+)*$/,
    'Must be a lower snake_case category token'
);

const nonNegative = z.number().finite().min(0);

// ============================================================================
// Catalog Schemas
// ============================================================================

export const RewardTypeSchema = z.enum(REWARD_TYPES);

export type RewardType = z.infer<typeof RewardTypeSchema>;

export const CardNetworkSchema = z.enum(CARD_NETWORKS);

export type CardNetwork = z.infer<typeof CardNetworkSchema>;

export const CapPeriodSchema = z.enum(CAP_PERIODS);

export type CapPeriod = z.infer<typeof CapPeriodSchema>;

export const CardIssuerSchema = z.object({
    name: z.string().min(1),
    website_url: z.string().url(),
    support_contact: z.string().optional(),
});

export type CardIssuer = z.infer<typeof CardIssuerSchema>;

/**
 * A point or mile currency with its self-declared cash value.
 * Used as a valuation anchor when the point-value table has no override.
 */
export const RewardProgramSchema = z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    base_point_value_cents: nonNegative,
    notes: z.string().optional(),
});

export type RewardProgram = z.infer<typeof RewardProgramSchema>;

export const CardProductSchema = z.object({
    id: z.string().min(1),
    issuer: CardIssuerSchema,
    name: z.string().min(1),
    network: CardNetworkSchema,
    reward_type: RewardTypeSchema,
    annual_fee: nonNegative,
    foreign_transaction_fee: nonNegative,
    reward_program: RewardProgramSchema.optional(),
    is_business_card: z.boolean().default(false),
    official_url: z.string().url().optional(),
    metadata: z.record(z.string(), z.unknown()).default({}),
});

export type CardProduct = z.infer<typeof CardProductSchema>;

export const CapSchema = z.object({
    amount_dollars: z.number().finite().positive(),
    period: CapPeriodSchema,
    description: z.string().optional(),
});

export type Cap = z.infer<typeof CapSchema>;

/**
 * Earning rule. `card_id` is not guaranteed to reference a catalog card.
 * `multiplier` is a percentage for cashback rules, points/miles per dollar otherwise.
 */
export const EarningRuleSchema = z.object({
    card_id: z.string().min(1),
    description: z.string(),
    categories: z.array(categoryToken).default([]),
    mccs: z.array(mccCode).default([]),
    merchant_names: z.array(z.string().min(1)).default([]),
    multiplier: nonNegative,
    reward_type: RewardTypeSchema,
    caps: z.array(CapSchema).default([]),
    is_rotating: z.boolean().default(false),
    is_intro_offer_only: z.boolean().default(false),
    stacking_note: z.string().optional(),
    valid_from: isoDateString.optional(),
    valid_to: isoDateString.optional(),
});

export type EarningRule = z.infer<typeof EarningRuleSchema>;

/**
 * The (cards, rules) pair. Always read and replaced together.
 */
export const CatalogSchema = z.object({
    cards: z.array(CardProductSchema),
    rules: z.array(EarningRuleSchema),
});

export type Catalog = z.infer<typeof CatalogSchema>;

/**
 * Catalog statistics for `cardwise stats`.
 */
export const CatalogStatsSchema = z.object({
    cards_count: z.number().int().min(0),
    rules_count: z.number().int().min(0),
    business_cards: z.number().int().min(0),
    rotating_rules: z.number().int().min(0),
    intro_offer_rules: z.number().int().min(0),
    dangling_rules: z.number().int().min(0),
    by_issuer: z.record(z.string(), z.number().int().min(0)),
    by_reward_type: z.record(z.string(), z.number().int().min(0)),
});

export type CatalogStats = z.infer<typeof CatalogStatsSchema>;

// ============================================================================
// Reference Data Schemas
// ============================================================================

/**
 * Known merchant entry. Table order is the tie-break between entries.
 */
export const KnownMerchantSchema = z.object({
    key: z.string().min(1),
    name: z.string().min(1),
    mcc: mccCode.optional(),
    categories: z.array(categoryToken).min(1),
    aliases: z.array(z.string().min(1)).default([]),
});

export type KnownMerchant = z.infer<typeof KnownMerchantSchema>;

/**
 * Raw reference data as written in reference.yaml.
 * Built into lookup maps once by buildReferenceTables().
 */
export const ReferenceDataSchema = z.object({
    default_point_value_cents: nonNegative.default(REWARD_DEFAULTS.POINT_VALUE_CENTS),
    point_values: z.record(z.string().min(1), nonNegative).default({}),
    categories: z.record(categoryToken, z.array(z.string().min(1))),
    mcc_categories: z.record(mccCode, z.array(categoryToken)).default({}),
    merchants: z.array(KnownMerchantSchema).default([]),
});

export type ReferenceData = z.infer<typeof ReferenceDataSchema>;

/**
 * Workspace settings (config/settings.yaml).
 */
export const SettingsSchema = z.object({
    max_results: z.number().int().min(1).default(REWARD_DEFAULTS.MAX_RESULTS),
    annual_fee_weight: nonNegative.default(REWARD_DEFAULTS.ANNUAL_FEE_WEIGHT),
    include_business: z.boolean().default(false),
    word_boundary: z.boolean().default(false),
});

export type Settings = z.infer<typeof SettingsSchema>;

// ============================================================================
// Recommendation Schemas
// ============================================================================

/**
 * Options for resolve() and compareCards().
 */
export const ResolveOptionsSchema = z.object({
    maxResults: z.number().int().min(1).default(REWARD_DEFAULTS.MAX_RESULTS),
    includeBusiness: z.boolean().default(false),
    spendingAmount: nonNegative.default(0),
    annualFeeWeight: nonNegative.default(REWARD_DEFAULTS.ANNUAL_FEE_WEIGHT),
    wordBoundary: z.boolean().default(false),
});

export type ResolveOptions = z.infer<typeof ResolveOptionsSchema>;

export type ResolveOptionsInput = z.input<typeof ResolveOptionsSchema>;

/**
 * Query resolution produced by the normalizer.
 * `normalized_categories` is a set: deduplicated, order carries no meaning.
 */
export const QueryResolutionSchema = z.object({
    query: z.string(),
    merchant_name: z.string(),
    mcc: mccCode.optional(),
    normalized_categories: z.array(z.string().min(1)).min(1),
});

export type QueryResolution = z.infer<typeof QueryResolutionSchema>;

/**
 * Score for one matched (card, rule) pair.
 */
export const CardScoreSchema = z.object({
    card: CardProductSchema,
    rule: EarningRuleSchema,
    effective_rate: nonNegative,
    explanation: z.string(),
    notes: z.array(z.string()),
});

export type CardScore = z.infer<typeof CardScoreSchema>;

/**
 * Final recommendation. Candidates are ranked across all (card, rule) pairs.
 */
export const ComputedRecommendationSchema = z.object({
    query: z.string(),
    resolved_categories: z.array(z.string()).min(1),
    candidates: z.array(CardScoreSchema),
    explanation: z.string(),
});

export type ComputedRecommendation = z.infer<typeof ComputedRecommendationSchema>;

/**
 * Best single rule per card. `rule` is null when the card earns its base rate.
 */
export const CardComparisonSchema = z.object({
    card: CardProductSchema,
    rule: EarningRuleSchema.nullable(),
    effective_rate: nonNegative,
    explanation: z.string(),
    notes: z.array(z.string()),
});

export type CardComparison = z.infer<typeof CardComparisonSchema>;

// ============================================================================
// Reward Text Parser Schemas
// ============================================================================

/**
 * Rule extracted from marketing text, before it is bound to a card.
 */
export const ParsedRewardRuleSchema = z.object({
    multiplier: nonNegative,
    reward_type: RewardTypeSchema,
    categories: z.array(categoryToken),
    keywords: z.array(z.string()),
    description: z.string(),
    cap: CapSchema.optional(),
    is_rotating: z.boolean(),
    is_intro_offer_only: z.boolean(),
    priority: z.number().int(),
});

export type ParsedRewardRule = z.infer<typeof ParsedRewardRuleSchema>;
