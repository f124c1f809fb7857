import { buildRuleSet, buildBaskets, hasActivePatterns } from '@keyword-baskets/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 3: Classify
 * Compiles the categories and assigns every keyword to its first matching category.
 * Invalid patterns are skipped with a warning, or stop the run under --strict.
 */
export const classifyKeywords: PipelineStep = async (state) => {
    const { ruleSet, diagnostics } = buildRuleSet(state.definitions);

    for (const d of diagnostics) {
        const message = `Invalid pattern "${d.pattern}" in category "${d.category}": ${d.reason}`;
        if (state.options.strict) {
            state.errors.push({ step: 'classify', message, fatal: true });
        } else {
            state.warnings.push(message);
        }
    }

    if (state.options.strict && diagnostics.length > 0) {
        return state;
    }

    if (!hasActivePatterns(ruleSet)) {
        state.warnings.push('No valid patterns: every keyword will be Uncategorized.');
    }

    state.result = { ...buildBaskets(state.keywords, ruleSet), diagnostics };
    return state;
};
