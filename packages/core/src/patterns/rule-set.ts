/**
 * Category rule set construction.
 *
 * Compile failures are collected instead of aborting: the rule set is built from the
 * valid subset and every bad pattern is reported once in `diagnostics`.
 */

import { compilePattern, patternMatches } from './compile.js';
import type { CategoryDefinition, PatternDiagnostic } from '../types/index.js';
import type { CompiledCategory, RuleSet, RuleSetBuild } from './types.js';

/**
 * Build an ordered rule set from raw category definitions.
 *
 * @param definitions - Categories in precedence order
 * @returns Rule set plus one diagnostic per pattern that failed to compile
 */
export function buildRuleSet(definitions: readonly CategoryDefinition[]): RuleSetBuild {
    const diagnostics: PatternDiagnostic[] = [];

    const categories: CompiledCategory[] = definitions.map((definition) => {
        const patterns = definition.patterns.map((raw) => {
            const compiled = compilePattern(raw);
            if (!compiled.valid) {
                diagnostics.push({
                    category: definition.name,
                    pattern: raw,
                    reason: compiled.reason,
                });
            }
            return compiled;
        });
        return { name: definition.name, patterns };
    });

    return { ruleSet: { categories }, diagnostics };
}

/**
 * First pattern of the category that matches the keyword, or null.
 * Stops at the first hit; later patterns are not evaluated.
 */
export function categoryMatches(category: CompiledCategory, keyword: string): string | null {
    const hit = category.patterns.find((compiled) => patternMatches(compiled, keyword));
    return hit ? hit.pattern : null;
}

/**
 * False when no category has a single valid pattern.
 * Not an error: every keyword then classifies as Uncategorized.
 */
export function hasActivePatterns(ruleSet: RuleSet): boolean {
    return ruleSet.categories.some((category) => category.patterns.some((p) => p.valid));
}
