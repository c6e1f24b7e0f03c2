#!/usr/bin/env tsx
/**
 * Cardwise CLI
 *
 * The CLI owns all file I/O and console output; @cardwise/core receives
 * validated data and returns results and warnings as values.
 */

import { parseArgs, toAddRuleOptions, toGlobalOptions, toQueryOptions, toReportOptions } from './args.js';
import type { ParsedArgs } from './args.js';
import { recommend } from './commands/recommend.js';
import { compare } from './commands/compare.js';
import { listCards } from './commands/cards.js';
import { showStats } from './commands/stats.js';
import { addRule } from './commands/add-rule.js';
import { writeReport } from './commands/report.js';
import { fail, log } from './utils/console.js';

const USAGE = [
    'Cardwise - pick the card that earns the most for a purchase',
    '',
    'Usage:',
    '  cardwise recommend <query...>  [--max N] [--spend N] [--business] [--word-boundary] [--json]',
    '  cardwise compare <query...>    [--max N] [--spend N] [--business] [--word-boundary] [--json]',
    '  cardwise cards',
    '  cardwise stats                 [--json]',
    '  cardwise add-rule <card-id> <reward text...> [--dry-run]',
    '  cardwise report <query> [<query>...] [--out file.xlsx]',
    '',
    'Global options:',
    '  --workspace <dir>   Workspace root (default: nearest directory with config/catalog.yaml)',
    '',
    'Examples:',
    '  cardwise recommend whole foods',
    '  cardwise compare gas --spend 2000',
    '  cardwise add-rule amex-gold "4X points at restaurants worldwide"',
    '  cardwise report groceries gas "whole foods" --out outputs/cards.xlsx',
];

function requireQuery(args: ParsedArgs): string {
    const query = args.positionals.join(' ').trim();
    if (!query) {
        fail(`"${args.command}" needs a merchant or category query.`);
    }
    return query;
}

async function main(argv: readonly string[]): Promise<void> {
    let args: ParsedArgs;
    try {
        args = parseArgs(argv);
    } catch (err) {
        fail(err instanceof Error ? err.message : String(err));
    }

    if (!args.command || args.switches.has('help')) {
        for (const line of USAGE) log(line);
        return;
    }

    try {
        switch (args.command) {
            case 'recommend':
                recommend(requireQuery(args), toQueryOptions(args));
                return;
            case 'compare':
                compare(requireQuery(args), toQueryOptions(args));
                return;
            case 'cards':
                listCards(toGlobalOptions(args));
                return;
            case 'stats':
                showStats({ ...toGlobalOptions(args), json: args.switches.has('json') });
                return;
            case 'add-rule': {
                const [cardId, ...words] = args.positionals;
                if (!cardId || words.length === 0) {
                    fail('Usage: cardwise add-rule <card-id> <reward text...>');
                }
                await addRule(cardId, words.join(' '), toAddRuleOptions(args));
                return;
            }
            case 'report':
                await writeReport(args.positionals, toReportOptions(args));
                return;
            default:
                fail(`Unknown command "${args.command}". Run "cardwise --help" for usage.`);
        }
    } catch (err) {
        fail(err instanceof Error ? err.message : String(err));
    }
}

main(process.argv.slice(2)).catch((err: unknown) => {
    console.error(`\n✖ Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
});
