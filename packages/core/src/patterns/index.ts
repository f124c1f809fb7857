/**
 * Patterns module: compilation, rule sets and validation.
 */

export { compilePattern, isValidPattern, patternMatches } from './compile.js';
export { buildRuleSet, categoryMatches, hasActivePatterns } from './rule-set.js';
export { validatePattern, findShadowingCategories } from './validate.js';
export type {
    CompiledPattern,
    CompiledCategory,
    RuleSet,
    RuleSetBuild,
    PatternValidationResult,
} from './types.js';
