import type { ResolveOptionsInput } from '@cardwise/core';
import type { Settings } from '@cardwise/shared';
import { openSession } from '../workspace/session.js';
import { fail, warn } from '../utils/console.js';
import type { GlobalOptions, QueryOptions, Session } from '../types.js';

/**
 * Open the workspace session or exit with the load error.
 * Catalog ingestion warnings are printed before returning.
 */
export function loadSession(options: GlobalOptions): Session {
    let session: Session;
    try {
        session = openSession(options);
    } catch (err) {
        fail(err instanceof Error ? err.message : String(err));
    }
    for (const w of session.warnings) {
        warn(w);
    }
    return session;
}

/**
 * Command-line flags take precedence over workspace settings.
 */
export function toResolveOptions(options: QueryOptions, settings: Settings): ResolveOptionsInput {
    return {
        maxResults: options.max ?? settings.max_results,
        includeBusiness: options.business || settings.include_business,
        spendingAmount: options.spend ?? 0,
        annualFeeWeight: settings.annual_fee_weight,
        wordBoundary: options.wordBoundary || settings.word_boundary,
    };
}
