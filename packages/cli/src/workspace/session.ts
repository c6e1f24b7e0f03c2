import { CatalogStore } from '@cardwise/core';
import { detectWorkspaceRoot } from './detect.js';
import { resolveWorkspace } from './paths.js';
import { loadCatalog, loadReference, loadSettings } from './config.js';
import type { GlobalOptions, Session } from '../types.js';

/**
 * Detect the workspace and load catalog, reference tables and settings.
 *
 * @throws Error if no workspace is found or any file fails validation
 */
export function openSession(options: GlobalOptions = {}): Session {
    const root = options.workspace || detectWorkspaceRoot();
    if (!root) {
        throw new Error('Workspace not found. Expected "config/catalog.yaml" in the workspace root.');
    }
    const workspace = resolveWorkspace(root);

    const { catalog, warnings } = loadCatalog(workspace);
    return {
        workspace,
        store: new CatalogStore(catalog),
        reference: loadReference(workspace),
        settings: loadSettings(workspace),
        warnings,
    };
}
