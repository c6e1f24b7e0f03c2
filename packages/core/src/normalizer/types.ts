/**
 * Options for query normalization.
 */
export interface NormalizeOptions {
    /** Match synonyms and aliases on whole words only. Default false. */
    wordBoundary?: boolean;
}
