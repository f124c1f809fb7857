/**
 * Pattern validation utilities for adding new patterns to a category set.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Results returned as data.
 */

import { compilePattern, patternMatches } from './compile.js';
import { classifyKeyword } from '../classifier/classify.js';
import { PATTERN_VALIDATION } from '../types/index.js';
import type { PatternValidationResult, RuleSet } from './types.js';

/**
 * Validate a pattern before adding it to a category.
 *
 * Syntax errors, empty and whitespace-only patterns are rejected. With a keyword sample, a pattern that matches
 * more than MAX_MATCH_PERCENT of it AND more than MAX_MATCHES_FOR_BROAD keywords gets a warning.
 *
 * @param pattern - Pattern string to validate
 * @param keywords - Optional keyword sample for the breadth check
 */
export function validatePattern(
    pattern: string,
    keywords?: readonly string[]
): PatternValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (pattern.trim() === '') {
        errors.push(`Invalid pattern "${pattern}": Pattern cannot be empty`);
        return { valid: false, errors, warnings };
    }

    const compiled = compilePattern(pattern);
    if (!compiled.valid) {
        errors.push(`Invalid pattern "${pattern}": ${compiled.reason}`);
        return { valid: false, errors, warnings };
    }

    // Syntax only without a sample
    if (!keywords || keywords.length === 0) {
        return { valid: true, errors, warnings };
    }

    const matchCount = keywords.filter((keyword) => patternMatches(compiled, keyword)).length;
    const matchPercent = matchCount / keywords.length;

    if (
        matchPercent > PATTERN_VALIDATION.MAX_MATCH_PERCENT &&
        matchCount > PATTERN_VALIDATION.MAX_MATCHES_FOR_BROAD
    ) {
        warnings.push(
            `Pattern "${pattern}" is too broad: matches ${matchCount} keywords ` +
            `(${(matchPercent * 100).toFixed(1)}% > ${PATTERN_VALIDATION.MAX_MATCH_PERCENT * 100}%)`
        );
    }

    return { valid: true, errors, warnings, matchCount, matchPercent };
}

/**
 * Names of categories that already claim keywords the new pattern would match.
 *
 * A pattern appended to `targetCategory` can only win keywords that no earlier category
 * takes. Categories declared at or after the first `targetCategory` entry are ignored.
 *
 * @returns Distinct category names, in declaration order
 */
export function findShadowingCategories(
    pattern: string,
    targetCategory: string,
    ruleSet: RuleSet,
    keywords: readonly string[]
): string[] {
    const compiled = compilePattern(pattern);
    if (!compiled.valid) return [];

    const targetPosition = ruleSet.categories.findIndex((c) => c.name === targetCategory);
    const earlier: RuleSet = {
        categories: targetPosition === -1
            ? ruleSet.categories
            : ruleSet.categories.slice(0, targetPosition),
    };

    const shadowing = new Set<string>();
    for (const keyword of keywords) {
        if (!patternMatches(compiled, keyword)) continue;
        const { matchedPattern, category } = classifyKeyword(keyword, earlier);
        if (matchedPattern !== null) {
            shadowing.add(category);
        }
    }

    const order = earlier.categories.map((c) => c.name);
    return [...shadowing].sort((a, b) => order.indexOf(a) - order.indexOf(b));
}
