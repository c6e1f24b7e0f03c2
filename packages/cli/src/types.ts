/**
 * Cardwise CLI - Core Types
 */

import type { CatalogStore, ReferenceTables } from '@cardwise/core';
import type { Settings } from '@cardwise/shared';

export interface GlobalOptions {
    workspace?: string;
}

export interface QueryOptions extends GlobalOptions {
    max?: number;
    spend?: number;
    business: boolean;
    wordBoundary: boolean;
    json: boolean;
}

export interface AddRuleOptions extends GlobalOptions {
    dryRun: boolean;
}

export interface ReportOptions extends QueryOptions {
    out?: string;
}

export interface WorkspaceConfig {
    catalogPath: string;
    settingsPath: string;
    referencePath: string;
    bundledReferencePath: string;
}

export interface Workspace {
    root: string;
    outputs: string;
    config: WorkspaceConfig;
}

/**
 * Everything a command needs, loaded once per invocation.
 */
export interface Session {
    workspace: Workspace;
    store: CatalogStore;
    reference: ReferenceTables;
    settings: Settings;
    /** Catalog ingestion warnings. */
    warnings: string[];
}
