/**
 * Basket building.
 *
 * Baskets are created on first occurrence while scanning keywords top to bottom, so basket
 * numbering follows the keyword list, not the category declaration order. A category that
 * claims no keyword gets no basket. Equal category names share one basket.
 */

import { classifyAll } from '../classifier/classify.js';
import { summarizeBaskets } from './stats.js';
import type { Basket, ClassificationResult } from '../types/index.js';
import type { RuleSet } from '../patterns/types.js';
import type { BasketCollection } from './types.js';

/**
 * Group already classified keywords into baskets.
 */
export function groupIntoBaskets(results: readonly ClassificationResult[]): Basket[] {
    const byName = new Map<string, Basket>();

    for (const { keyword, category } of results) {
        let basket = byName.get(category);
        if (!basket) {
            basket = { index: byName.size, name: category, keywords: [] };
            byName.set(category, basket);
        }
        basket.keywords.push(keyword);
    }

    return [...byName.values()];
}

/**
 * Classify keywords and build the ordered basket collection with its statistics.
 *
 * @param keywords - Keywords in input order
 * @param ruleSet - Compiled categories in precedence order
 */
export function buildBaskets(keywords: readonly string[], ruleSet: RuleSet): BasketCollection {
    const results = classifyAll(keywords, ruleSet);
    const baskets = groupIntoBaskets(results);
    const categoryCount = new Set(ruleSet.categories.map((c) => c.name)).size;

    return {
        baskets,
        results,
        stats: summarizeBaskets(baskets, results, categoryCount),
    };
}
