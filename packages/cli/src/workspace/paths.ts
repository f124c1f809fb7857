import { join, dirname, basename, extname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { findCategoriesFile } from './detect.js';
import type { Workspace } from '../types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Constructs a Workspace object from a root path.
 * An existing categories.yml/json wins over the default config/categories.yaml location.
 */
export function resolveWorkspace(root: string): Workspace {
    return {
        root,
        outputs: join(root, 'outputs'),
        config: {
            categoriesPath: findCategoriesFile(root) ?? join(root, 'config', 'categories.yaml'),
            defaultCategoriesPath: resolveDefaultCategoriesPath(),
        },
    };
}

/**
 * Category set bundled with the CLI package (packages/cli/assets).
 */
export function resolveDefaultCategoriesPath(): string {
    // src/workspace -> package root
    const pkgRoot = join(__dirname, '..', '..');
    return join(pkgRoot, 'assets', 'default-categories.yaml');
}

/**
 * Run name derived from the keyword file: "data/keywords.csv" -> "keywords".
 */
export function getRunName(keywordsPath: string): string {
    const file = basename(keywordsPath);
    return basename(file, extname(file));
}

export function getOutputsPath(workspace: Workspace, runName: string): string {
    return join(workspace.outputs, runName);
}
