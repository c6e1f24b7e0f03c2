import type { Workbook } from 'exceljs';
import type { ComputedRecommendation } from '@cardwise/shared';
import { createWorkbook, formatHeaderRow, autoFitColumns, formatRateColumn } from './utils.js';

/**
 * Generates the recommendation report for one or more queries.
 *
 * Sheets:
 * - Recommendations: every ranked candidate of every query
 * - Summary: best card per query
 */
export async function generateRecommendationReport(results: readonly ComputedRecommendation[]): Promise<Workbook> {
    const workbook = createWorkbook();

    addRecommendationsSheet(workbook, results);
    addSummarySheet(workbook, results);

    return workbook;
}

/**
 * Sheet: Recommendations
 * Columns: query, rank, card, issuer, rule, effective_rate, notes
 */
function addRecommendationsSheet(workbook: Workbook, results: readonly ComputedRecommendation[]): void {
    const sheet = workbook.addWorksheet('Recommendations');
    sheet.columns = [
        { header: 'query', key: 'query' },
        { header: 'rank', key: 'rank' },
        { header: 'card', key: 'card' },
        { header: 'issuer', key: 'issuer' },
        { header: 'rule', key: 'rule' },
        { header: 'effective_rate', key: 'effective_rate' },
        { header: 'notes', key: 'notes' },
    ];

    for (const result of results) {
        result.candidates.forEach((candidate, index) => {
            sheet.addRow({
                query: result.query,
                rank: index + 1,
                card: candidate.card.name,
                issuer: candidate.card.issuer.name,
                rule: candidate.rule.description,
                effective_rate: candidate.effective_rate,
                notes: candidate.notes.join('; '),
            });
        });
    }

    formatHeaderRow(sheet);
    formatRateColumn(sheet, 'effective_rate');
    autoFitColumns(sheet);
}

/**
 * Sheet: Summary
 * Columns: query, categories, best_card, best_rate, explanation
 */
function addSummarySheet(workbook: Workbook, results: readonly ComputedRecommendation[]): void {
    const sheet = workbook.addWorksheet('Summary');
    sheet.columns = [
        { header: 'query', key: 'query' },
        { header: 'categories', key: 'categories' },
        { header: 'best_card', key: 'best_card' },
        { header: 'best_rate', key: 'best_rate' },
        { header: 'explanation', key: 'explanation' },
    ];

    for (const result of results) {
        const best = result.candidates[0];
        sheet.addRow({
            query: result.query,
            categories: result.resolved_categories.join(', '),
            best_card: best ? best.card.name : 'N/A',
            best_rate: best ? best.effective_rate : null,
            explanation: result.explanation,
        });
    }

    formatHeaderRow(sheet);
    formatRateColumn(sheet, 'best_rate');
    autoFitColumns(sheet);
}
