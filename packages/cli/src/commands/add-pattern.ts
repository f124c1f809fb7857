import { existsSync } from 'node:fs';
import { mkdir, readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import {
    buildRuleSet,
    findShadowingCategories,
    parseKeywords,
    validatePattern,
} from '@keyword-baskets/core';
import { detectWorkspaceRoot } from '../workspace/detect.js';
import { resolveWorkspace } from '../workspace/paths.js';
import { loadCategories } from '../workspace/config.js';
import { appendPatternToYaml } from '../yaml/categories.js';
import { success, log, arrow, warn, error } from '../utils/console.js';
import type { AddPatternOptions } from '../types.js';

function message(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export async function addPattern(category: string, pattern: string, options: AddPatternOptions): Promise<void> {
    if (category.trim() === '') {
        error('Error: Category name cannot be empty.');
        process.exit(1);
    }

    // 1. Workspace detection
    const root = options.workspace ?? detectWorkspaceRoot();
    if (!root) {
        error('Error: Workspace not found.');
        log('Expected "config/categories.yaml" in the workspace root, or pass --workspace <dir>.');
        process.exit(1);
    }
    const workspace = resolveWorkspace(resolve(root));
    const categoriesPath = workspace.config.categoriesPath;

    // 2. Optional keyword sample for breadth and shadowing checks
    let keywords: string[] = [];
    if (options.keywords) {
        try {
            const buffer = await readFile(options.keywords);
            keywords = parseKeywords(buffer, { column: options.column, separator: options.separator }).keywords;
        } catch (err) {
            error(`Error loading keywords: ${message(err)}`);
            process.exit(1);
        }
    }

    // 3. Validate the pattern (syntax, then breadth)
    const validation = validatePattern(pattern, keywords);
    if (!validation.valid) {
        error(`Error: ${validation.errors.join(', ')}`);
        process.exit(1);
    }
    for (const w of validation.warnings) {
        warn(w);
    }

    // 4. Shadowing: earlier categories win keywords the pattern matches (warn, don't block)
    if (keywords.length > 0 && existsSync(categoriesPath)) {
        try {
            const { definitions } = await loadCategories(categoriesPath);
            const { ruleSet } = buildRuleSet(definitions);
            const shadowing = findShadowingCategories(pattern, category, ruleSet, keywords);
            if (shadowing.length > 0) {
                warn(`Some keywords matching "${pattern}" are already taken by earlier categories:`);
                for (const name of shadowing) {
                    log(`  ${name}`);
                }
            }
        } catch (err) {
            error(`Error loading categories: ${message(err)}`);
            process.exit(1);
        }
    }

    // 5. Perform addition
    log(`Adding pattern to: ${categoriesPath}`);

    try {
        await mkdir(dirname(categoriesPath), { recursive: true });
        const { created } = await appendPatternToYaml(categoriesPath, category, pattern);

        success('Pattern successfully added!');
        arrow(`Category: ${category}${created ? ' (new)' : ''}`);
        arrow(`Pattern:  "${pattern}"`);
        if (validation.matchCount !== undefined) {
            arrow(`Matches:  ${validation.matchCount} of ${keywords.length} keywords`);
        }
    } catch (err) {
        error(`Failed to add pattern: ${message(err)}`);
        process.exit(1);
    }
}
