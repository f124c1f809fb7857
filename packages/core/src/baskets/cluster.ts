/**
 * One-shot clustering entry point: validate inputs, compile, classify, build baskets.
 */

import { buildRuleSet } from '../patterns/rule-set.js';
import { buildBaskets } from './build.js';
import { MalformedInputError, formatZodIssues } from '../errors.js';
import { KeywordListSchema, CategoryDefinitionsSchema } from '../types/index.js';
import type { ClusterResult } from './types.js';

/**
 * Cluster keywords into baskets.
 *
 * Both inputs are validated first; a structurally invalid keyword list or category set throws
 * MalformedInputError and nothing is classified. Invalid patterns do not throw: they are listed
 * in `diagnostics` and the run uses the remaining valid patterns.
 *
 * @throws MalformedInputError
 */
export function clusterKeywords(keywords: unknown, definitions: unknown): ClusterResult {
    const keywordList = KeywordListSchema.safeParse(keywords);
    if (!keywordList.success) {
        throw new MalformedInputError('Invalid keyword list', formatZodIssues(keywordList.error));
    }

    const categories = CategoryDefinitionsSchema.safeParse(definitions);
    if (!categories.success) {
        throw new MalformedInputError('Invalid category definitions', formatZodIssues(categories.error));
    }

    const { ruleSet, diagnostics } = buildRuleSet(categories.data);
    return { ...buildBaskets(keywordList.data, ruleSet), diagnostics };
}
