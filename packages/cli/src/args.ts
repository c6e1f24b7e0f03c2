/**
 * Command-line argument parsing.
 */

import type { AddRuleOptions, GlobalOptions, QueryOptions, ReportOptions } from './types.js';

const VALUE_FLAGS: ReadonlySet<string> = new Set(['max', 'spend', 'workspace', 'out']);
const BOOLEAN_FLAGS: ReadonlySet<string> = new Set(['business', 'word-boundary', 'json', 'dry-run', 'help']);

export interface ParsedArgs {
    command: string | undefined;
    positionals: string[];
    values: Map<string, string>;
    switches: Set<string>;
}

/**
 * Split argv into command, positionals and flags.
 * Accepts "--flag value" and "--flag=value".
 *
 * @throws Error on an unknown flag or a value flag without a value
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
    const positionals: string[] = [];
    const values = new Map<string, string>();
    const switches = new Set<string>();

    for (let i = 0; i < argv.length; i++) {
        const token = argv[i];
        if (token === undefined) continue;

        if (!token.startsWith('--')) {
            positionals.push(token);
            continue;
        }

        const eq = token.indexOf('=');
        const name = eq === -1 ? token.slice(2) : token.slice(2, eq);

        if (VALUE_FLAGS.has(name)) {
            const value = eq === -1 ? argv[++i] : token.slice(eq + 1);
            if (value === undefined || value === '' || value.startsWith('--')) {
                throw new Error(`--${name} requires a value`);
            }
            values.set(name, value);
        } else if (BOOLEAN_FLAGS.has(name) && eq === -1) {
            switches.add(name);
        } else {
            throw new Error(`Unknown option: ${token}`);
        }
    }

    const [command, ...rest] = positionals;
    return { command, positionals: rest, values, switches };
}

function numberFlag(args: ParsedArgs, name: string, integer: boolean): number | undefined {
    const raw = args.values.get(name);
    if (raw === undefined) return undefined;
    const value = Number(raw);
    if (!Number.isFinite(value) || value < 0 || (integer && !Number.isInteger(value))) {
        throw new Error(`--${name} must be a ${integer ? 'non-negative integer' : 'non-negative number'}, got "${raw}"`);
    }
    return value;
}

export function toGlobalOptions(args: ParsedArgs): GlobalOptions {
    const workspace = args.values.get('workspace');
    return workspace === undefined ? {} : { workspace };
}

/**
 * @throws Error if --max or --spend is not a valid number
 */
export function toQueryOptions(args: ParsedArgs): QueryOptions {
    return {
        ...toGlobalOptions(args),
        max: numberFlag(args, 'max', true),
        spend: numberFlag(args, 'spend', false),
        business: args.switches.has('business'),
        wordBoundary: args.switches.has('word-boundary'),
        json: args.switches.has('json'),
    };
}

export function toAddRuleOptions(args: ParsedArgs): AddRuleOptions {
    return {
        ...toGlobalOptions(args),
        dryRun: args.switches.has('dry-run'),
    };
}

export function toReportOptions(args: ParsedArgs): ReportOptions {
    return {
        ...toQueryOptions(args),
        out: args.values.get('out'),
    };
}
