/**
 * Reference tables consumed by the normalizer and valuation engine.
 * Built once by buildReferenceTables(); never mutated afterwards.
 */

/**
 * Known merchant with its key and aliases already normalized (lower case).
 */
export interface MerchantEntry {
    key: string;
    name: string;
    mcc?: string;
    categories: readonly string[];
    aliases: readonly string[];
}

export interface ReferenceTables {
    /** Cents per point when a card has no reward program. */
    readonly defaultPointValueCents: number;
    /** Upper-cased program id -> cents per point/mile. */
    readonly pointValues: ReadonlyMap<string, number>;
    /** Canonical category -> normalized synonym phrases, in table order. */
    readonly categorySynonyms: ReadonlyMap<string, readonly string[]>;
    /** MCC -> canonical categories. */
    readonly mccCategories: ReadonlyMap<string, readonly string[]>;
    /** Known merchants, in table order. */
    readonly merchants: readonly MerchantEntry[];
    /** Every category the synonym and MCC tables declare. */
    readonly knownCategories: ReadonlySet<string>;
}
