/**
 * Keyword classification, first match wins.
 *
 * Categories are tried in declaration order, patterns inside a category in declaration order.
 * The first category with any matching pattern takes the keyword. When none match, the keyword
 * goes to the Uncategorized sentinel, which is applied only after every declared category.
 */

import { categoryMatches } from '../patterns/rule-set.js';
import { UNCATEGORIZED_BASKET_NAME } from '../types/index.js';
import type { ClassificationResult } from '../types/index.js';
import type { RuleSet } from '../patterns/types.js';

/**
 * Classify one keyword and record which pattern claimed it.
 */
export function classifyKeyword(keyword: string, ruleSet: RuleSet): ClassificationResult {
    for (const category of ruleSet.categories) {
        const matchedPattern = categoryMatches(category, keyword);
        if (matchedPattern !== null) {
            return { keyword, category: category.name, matchedPattern };
        }
    }

    return { keyword, category: UNCATEGORIZED_BASKET_NAME, matchedPattern: null };
}

/**
 * Category name for a keyword.
 */
export function classify(keyword: string, ruleSet: RuleSet): string {
    return classifyKeyword(keyword, ruleSet).category;
}

/**
 * Classify a batch, keeping input order and multiplicity.
 * Identical keywords are evaluated once per call.
 */
export function classifyAll(keywords: readonly string[], ruleSet: RuleSet): ClassificationResult[] {
    const memo = new Map<string, ClassificationResult>();

    return keywords.map((keyword) => {
        let result = memo.get(keyword);
        if (!result) {
            result = classifyKeyword(keyword, ruleSet);
            memo.set(keyword, result);
        }
        return { ...result };
    });
}
