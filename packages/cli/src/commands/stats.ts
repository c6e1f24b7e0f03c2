import { catalogStats } from '@cardwise/core';
import { formatStats } from '../format/recommendation.js';
import { log } from '../utils/console.js';
import { loadSession } from './session.js';
import type { GlobalOptions } from '../types.js';

export function showStats(options: GlobalOptions & { json: boolean }): void {
    const session = loadSession(options);
    const stats = catalogStats(session.store.current());

    if (options.json) {
        log(JSON.stringify(stats, null, 2));
        return;
    }
    for (const line of formatStats(stats)) {
        log(line);
    }
}
