import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import { buildReferenceTables, formatIssues, validateCatalog } from '@cardwise/core';
import type { CatalogValidationResult, ReferenceTables } from '@cardwise/core';
import { SettingsSchema, type Settings } from '@cardwise/shared';
import type { Workspace } from '../types.js';

function readYaml(path: string): unknown {
    const content = readFileSync(path, 'utf-8');
    return parse(content);
}

/**
 * Loads and validates the card catalog (catalog.yaml).
 */
export function loadCatalog(workspace: Workspace): CatalogValidationResult {
    const path = workspace.config.catalogPath;
    if (!existsSync(path)) {
        throw new Error(`Catalog file not found: ${path}`);
    }
    const data = readYaml(path) ?? { cards: [], rules: [] };
    try {
        return validateCatalog(data);
    } catch (err) {
        throw new Error(`${path}: ${err instanceof Error ? err.message : String(err)}`);
    }
}

/**
 * Loads reference tables: the workspace override if present, else the bundled copy.
 */
export function loadReference(workspace: Workspace): ReferenceTables {
    const override = workspace.config.referencePath;
    const path = existsSync(override) ? override : workspace.config.bundledReferencePath;
    if (!existsSync(path)) {
        throw new Error(`Reference data not found: ${path}`);
    }
    try {
        return buildReferenceTables(readYaml(path));
    } catch (err) {
        throw new Error(`${path}: ${err instanceof Error ? err.message : String(err)}`);
    }
}

/**
 * Loads workspace settings (settings.yaml). Missing file means defaults.
 */
export function loadSettings(workspace: Workspace): Settings {
    const path = workspace.config.settingsPath;
    if (!existsSync(path)) {
        return SettingsSchema.parse({});
    }
    const parsed = SettingsSchema.safeParse(readYaml(path) ?? {});
    if (!parsed.success) {
        throw new Error(`${path}: Invalid settings:\n- ${formatIssues(parsed.error).join('\n- ')}`);
    }
    return parsed.data;
}
