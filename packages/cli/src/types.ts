/**
 * Keyword Baskets CLI - Core Types
 */

import type { ExportFormat } from '@keyword-baskets/shared';

/**
 * Files a classify run can write. `xlsx` is produced by the CLI, the rest by the core formatter.
 */
export type OutputFormat = ExportFormat | 'xlsx';

export interface ClassifyOptions {
    categories?: string;
    column: string;
    separator: string;
    outDir?: string;
    formats: OutputFormat[];
    dryRun: boolean;
    strict: boolean;
    workspace?: string;
}

export interface CheckOptions {
    workspace?: string;
}

export interface AddPatternOptions {
    keywords?: string;
    column: string;
    separator: string;
    workspace?: string;
}

export interface WorkspaceConfig {
    categoriesPath: string;
    defaultCategoriesPath: string;
}

export interface Workspace {
    root: string;
    outputs: string;
    config: WorkspaceConfig;
}
