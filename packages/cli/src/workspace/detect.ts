import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

/**
 * Category config file names, in lookup order.
 */
export const CATEGORY_CONFIG_FILES = ['categories.yaml', 'categories.yml', 'categories.json'] as const;

/**
 * Path of the first category config under `<root>/config`, or null.
 */
export function findCategoriesFile(root: string): string | null {
    for (const file of CATEGORY_CONFIG_FILES) {
        const candidate = join(root, 'config', file);
        if (existsSync(candidate)) {
            return candidate;
        }
    }
    return null;
}

/**
 * Walks up from startPath until a directory with a category config is found.
 */
export function detectWorkspaceRoot(startPath: string = process.cwd()): string | null {
    let current = resolve(startPath);
    while (findCategoriesFile(current) === null) {
        const parent = dirname(current);
        if (parent === current) {
            return null;
        }
        current = parent;
    }
    return current;
}
