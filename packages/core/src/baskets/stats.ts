import type { Basket, BasketStats, ClassificationResult } from '../types/index.js';

/**
 * Aggregate counts for reporting.
 *
 * Unassigned keywords are those that fell through every category. A user category that happens
 * to be named "Uncategorized" still counts as assigned.
 */
export function summarizeBaskets(
    baskets: readonly Basket[],
    results: readonly ClassificationResult[],
    categoryCount: number
): BasketStats {
    const uncategorizedKeywords = results.filter((r) => r.matchedPattern === null).length;

    return {
        totalKeywords: results.length,
        basketCount: baskets.length,
        categoryCount,
        assignedKeywords: results.length - uncategorizedKeywords,
        uncategorizedKeywords,
        baskets: baskets.map(({ index, name, keywords }) => ({ index, name, count: keywords.length })),
    };
}
