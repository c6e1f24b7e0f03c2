import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { existsSync } from 'node:fs';
import type { Workspace } from '../types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

const BUNDLED_REFERENCE = join('assets', 'reference.yaml');

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    return {
        root,
        outputs: join(root, 'outputs'),
        config: {
            catalogPath: join(root, 'config', 'catalog.yaml'),
            settingsPath: join(root, 'config', 'settings.yaml'),
            referencePath: join(root, 'config', 'reference.yaml'),
            bundledReferencePath: resolveBundledReferencePath(),
        },
    };
}

/**
 * Locates the reference tables shipped with the CLI.
 *
 * In dev the file sits at packages/cli/assets; a build under dist/ finds it
 * by walking up to the repository root.
 */
export function resolveBundledReferencePath(startPath: string = __dirname): string {
    let current = startPath;
    while (true) {
        const candidates = [
            join(current, BUNDLED_REFERENCE),
            join(current, 'packages', 'cli', BUNDLED_REFERENCE),
        ];
        const found = candidates.find(candidate => existsSync(candidate));
        if (found) {
            return found;
        }
        const parent = dirname(current);
        if (parent === current) {
            break;
        }
        current = parent;
    }
    return join(startPath, '..', '..', BUNDLED_REFERENCE);
}

export function getReportPath(workspace: Workspace, filename: string = 'recommendations.xlsx'): string {
    return join(workspace.outputs, filename);
}
