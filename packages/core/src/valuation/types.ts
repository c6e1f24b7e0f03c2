/**
 * Rate after cap or fee adjustment, with the notes that explain it.
 */
export interface RateAdjustment {
    adjustedRate: number;
    notes: string[];
}
