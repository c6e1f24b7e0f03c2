import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { resolve, type ComputedRecommendation } from '@cardwise/core';
import { generateRecommendationReport } from '../excel/report.js';
import { getReportPath } from '../workspace/paths.js';
import { success, arrow, fail } from '../utils/console.js';
import { loadSession, toResolveOptions } from './session.js';
import type { ReportOptions } from '../types.js';

/**
 * Write an Excel workbook with recommendations for each query.
 */
export async function writeReport(queries: readonly string[], options: ReportOptions): Promise<void> {
    if (queries.length === 0) {
        fail('At least one query is required.');
    }
    const session = loadSession(options);
    const catalog = session.store.current();
    const resolveOptions = toResolveOptions(options, session.settings);

    let results: ComputedRecommendation[];
    try {
        results = queries.map(query => resolve(query, catalog, session.reference, resolveOptions));
    } catch (err) {
        fail(err instanceof Error ? err.message : String(err));
    }

    const outPath = options.out ?? getReportPath(session.workspace);
    try {
        const workbook = await generateRecommendationReport(results);
        await mkdir(dirname(outPath), { recursive: true });
        await workbook.xlsx.writeFile(outPath);
    } catch (err) {
        fail(`Failed to write report: ${err instanceof Error ? err.message : String(err)}`);
    }

    success(`Report written to ${outPath}`);
    for (const result of results) {
        const best = result.candidates[0];
        arrow(`${result.query}: ${best ? best.card.name : 'no matching card'}`);
    }
}
