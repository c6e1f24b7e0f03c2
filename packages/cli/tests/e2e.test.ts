import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import exceljs from 'exceljs';
import { recommend } from '../src/commands/recommend.js';
import { compare } from '../src/commands/compare.js';
import { listCards } from '../src/commands/cards.js';
import { showStats } from '../src/commands/stats.js';
import { addRule } from '../src/commands/add-rule.js';
import { writeReport } from '../src/commands/report.js';
import { CardComparisonSchema, ComputedRecommendationSchema } from '@cardwise/shared';
import type { QueryOptions } from '../src/types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const SAMPLE_WORKSPACE = join(__dirname, '..', '..', '..', 'sample-workspace');

const DANGLING_WARNING = '⚠️  rules.16: card "retired-card" is not in the catalog; rule will be ignored';

function queryOptions(overrides: Partial<QueryOptions> = {}): QueryOptions {
    return {
        workspace: SAMPLE_WORKSPACE,
        business: false,
        wordBoundary: false,
        json: true,
        ...overrides,
    };
}

describe('CLI commands against the sample workspace', () => {
    function printed(): string[] {
        return vi.mocked(console.log).mock.calls.map(call => String(call[0]));
    }

    function printedJson(): unknown {
        return JSON.parse(printed().join('\n'));
    }

    function printedRecommendation() {
        return ComputedRecommendationSchema.parse(printedJson());
    }

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        vi.spyOn(process, 'exit').mockImplementation(() => { throw new Error('exit'); });
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should rank every matching rule for a category query', () => {
        recommend('groceries', queryOptions());

        const result = printedRecommendation();
        expect(result.resolved_categories).toEqual(['groceries']);
        expect(result.candidates.map(c => [c.card.id, c.effective_rate])).toEqual([
            ['amex-gold', 6.8],
            ['amex-blue-cash-preferred', 3.5],
        ]);
        expect(console.warn).toHaveBeenCalledWith(DANGLING_WARNING);
    });

    it('should resolve a known merchant through its MCC categories', () => {
        recommend('Whole Foods Market', queryOptions());

        const result = printedRecommendation();
        expect(result.resolved_categories).toEqual(['groceries']);
        expect(result.candidates[0]?.card.id).toBe('amex-gold');
    });

    it('should keep catalog order for equal rates', () => {
        recommend('gas', queryOptions());

        const result = printedRecommendation();
        expect(result.candidates.map(c => [c.card.id, c.effective_rate])).toEqual([
            ['amex-blue-cash-preferred', 3],
            ['chase-freedom-flex', 3],
            ['costco-anywhere-visa', 2.5],
        ]);
    });

    it('should include business cards only when asked', () => {
        recommend('gas', queryOptions({ business: true, max: 10 }));

        const result = printedRecommendation();
        expect(result.candidates.map(c => c.card.id)).toContain('chase-ink-cash');
    });

    it('should honour --max', () => {
        recommend('gas', queryOptions({ max: 1 }));

        const result = printedRecommendation();
        expect(result.candidates).toHaveLength(1);
    });

    it('should print a readable recommendation without --json', () => {
        recommend('groceries', queryOptions({ json: false }));

        const lines = printed();
        expect(lines[0]).toBe('Best cards for "groceries" (groceries)');
        expect(lines[1]).toBe('  1. Gold Card (American Express): 6.80%');
    });

    it('should exit on invalid options', () => {
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        expect(() => recommend('gas', queryOptions({ max: 0 }))).toThrow('exit');
        expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('Invalid options'));
    });

    it('should compare one best rule per card, falling back to base rates', () => {
        compare('groceries', queryOptions());

        const rows = CardComparisonSchema.array().parse(printedJson());
        expect(rows.map(r => [r.card.id, r.effective_rate])).toEqual([
            ['amex-gold', 6.8],
            ['amex-blue-cash-preferred', 3.5],
            ['chase-freedom-flex', 1],
            ['costco-anywhere-visa', 1],
        ]);
        expect(rows[2]?.rule).toBeNull();
    });

    it('should list cards with rule counts', () => {
        listCards({ workspace: SAMPLE_WORKSPACE });

        const lines = printed();
        expect(lines[0]).toBe('5 cards in catalog');
        expect(lines).toContain('  amex-blue-cash-preferred  Blue Cash Preferred (American Express)  fee $95  4 rules');
        expect(lines).toContain('  chase-ink-cash  Ink Business Cash (Chase) [business]  fee $0  2 rules');
    });

    it('should report catalog statistics', () => {
        showStats({ workspace: SAMPLE_WORKSPACE, json: true });

        expect(printedJson()).toEqual({
            cards_count: 5,
            rules_count: 17,
            business_cards: 1,
            rotating_rules: 1,
            intro_offer_rules: 0,
            dangling_rules: 1,
            by_issuer: { 'American Express': 2, Chase: 2, Citi: 1 },
            by_reward_type: { cashback_percent: 4, points_per_dollar: 1 },
        });
    });

    it('should parse reward text on a dry run without touching the catalog', async () => {
        await addRule('amex-gold', '4X points at restaurants worldwide', { workspace: SAMPLE_WORKSPACE, dryRun: true });

        const lines = printed();
        expect(lines).toContain('Parsed 1 rule for Gold Card:');
        expect(lines).toContain('→ 4 points_per_dollar on restaurants');
        expect(lines).toContain('\nDry run: catalog not modified.');
    });

    describe('report', () => {
        let dir: string;

        beforeEach(async () => {
            dir = await mkdtemp(join(tmpdir(), 'cardwise-report-'));
        });

        afterEach(async () => {
            await rm(dir, { recursive: true, force: true });
        });

        it('should write a workbook with one summary row per query', async () => {
            const out = join(dir, 'nested', 'cards.xlsx');
            await writeReport(['groceries', 'gas'], { ...queryOptions({ json: false }), out });

            const workbook = new exceljs.Workbook();
            await workbook.xlsx.readFile(out);

            const summary = workbook.getWorksheet('Summary');
            expect(summary?.actualRowCount).toBe(3);
            expect(summary?.getRow(2).getCell(3).value).toBe('Gold Card');
            expect(summary?.getRow(3).getCell(3).value).toBe('Blue Cash Preferred');

            // 2 groceries candidates + 3 gas candidates
            expect(workbook.getWorksheet('Recommendations')?.actualRowCount).toBe(6);
            expect(printed()).toContain(`✓ Report written to ${out}`);
        });
    });
});
