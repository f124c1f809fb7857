import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { parseCategoryDefinitions, type CategoryDefinition } from '@keyword-baskets/core';
import type { Workspace } from '../types.js';

export interface LoadedCategories {
    path: string;
    content: string;
    definitions: CategoryDefinition[];
}

/**
 * Picks the category file for a run.
 * Order: explicit file, workspace config, bundled defaults.
 */
export function resolveCategoriesPath(explicit: string | undefined, workspace: Workspace): string {
    if (explicit) {
        return resolve(explicit);
    }
    if (existsSync(workspace.config.categoriesPath)) {
        return workspace.config.categoriesPath;
    }
    return workspace.config.defaultCategoriesPath;
}

/**
 * Reads and parses a category file. Parse failures surface as MalformedInputError.
 */
export async function loadCategories(path: string): Promise<LoadedCategories> {
    if (!existsSync(path)) {
        throw new Error(`Categories file not found: ${path}`);
    }
    const content = await readFile(path, 'utf-8');
    return { path, content, definitions: parseCategoryDefinitions(content) };
}

