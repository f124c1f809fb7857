import { resolve } from 'node:path';
import { buildRuleSet, hasActivePatterns } from '@keyword-baskets/core';
import { detectWorkspaceRoot } from '../workspace/detect.js';
import { resolveWorkspace } from '../workspace/paths.js';
import { resolveCategoriesPath, loadCategories, type LoadedCategories } from '../workspace/config.js';
import { log, success, warn, arrow, error } from '../utils/console.js';
import type { CheckOptions } from '../types.js';

/**
 * Compiles a category file and lists every invalid pattern.
 * Exits 1 when a pattern is invalid or the file cannot be read.
 */
export async function checkCategories(categoriesFile: string | undefined, options: CheckOptions): Promise<void> {
    const root = options.workspace ?? detectWorkspaceRoot() ?? process.cwd();
    const path = resolveCategoriesPath(categoriesFile, resolveWorkspace(resolve(root)));

    log(`\nChecking categories: ${path}`);

    let loaded: LoadedCategories;
    try {
        loaded = await loadCategories(path);
    } catch (err) {
        error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
    }

    const { ruleSet, diagnostics } = buildRuleSet(loaded.definitions);

    for (const category of ruleSet.categories) {
        const valid = category.patterns.filter(p => p.valid).length;
        arrow(`${category.name}: ${valid}/${category.patterns.length} patterns valid`);
    }

    if (!hasActivePatterns(ruleSet)) {
        warn('No valid patterns: every keyword would be Uncategorized.');
    }

    if (diagnostics.length > 0) {
        log('');
        for (const d of diagnostics) {
            error(`[${d.category}] "${d.pattern}": ${d.reason}`);
        }
        log(`\n✖ ${diagnostics.length} invalid pattern(s).`);
        process.exit(1);
    }

    success(`${ruleSet.categories.length} categories, all patterns valid.`);
}
