import { ResolveOptionsSchema } from '../types/index.js';
import type { ResolveOptions, ResolveOptionsInput } from '../types/index.js';
import type { CatalogView } from '../catalog/types.js';
import { formatIssues } from '../utils/issues.js';

/**
 * Validate options and fill defaults.
 *
 * @throws Error listing every invalid option
 */
export function parseResolveOptions(options: ResolveOptionsInput = {}): ResolveOptions {
    const parsed = ResolveOptionsSchema.safeParse(options);
    if (!parsed.success) {
        throw new Error(`Invalid options:\n- ${formatIssues(parsed.error).join('\n- ')}`);
    }
    return parsed.data;
}

/**
 * Structural check only. Entity contents are validated at ingestion.
 *
 * @throws Error when cards or rules is not an array
 */
export function assertCatalogShape(catalog: CatalogView): void {
    const problems: string[] = [];
    if (!Array.isArray(catalog.cards)) problems.push('cards must be an array');
    if (!Array.isArray(catalog.rules)) problems.push('rules must be an array');
    if (problems.length > 0) {
        throw new Error(`Invalid catalog: ${problems.join(', ')}`);
    }
}
