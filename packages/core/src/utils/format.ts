/**
 * Display formatting shared by valuation notes and explanations.
 */

/**
 * Format a dollar amount without cents: 6000 -> "$6,000".
 */
export function formatDollars(amount: number): string {
    return `$${amount.toLocaleString('en-US', { maximumFractionDigits: 0 })}`;
}

/**
 * Format a rate (cents per dollar) to two decimals: 3.5 -> "3.50".
 */
export function formatRate(rate: number): string {
    return rate.toFixed(2);
}

/**
 * Format a multiplier as written in catalog data: 6 -> "6", 1.5 -> "1.5".
 */
export function formatMultiplier(multiplier: number): string {
    return String(multiplier);
}
