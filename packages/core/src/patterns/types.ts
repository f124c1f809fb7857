/**
 * Internal types for pattern compilation and rule sets.
 */

import type { PatternDiagnostic } from '../types/index.js';

/**
 * A pattern string paired with its compiled matcher.
 * Invalid patterns keep their position in the category but never match.
 */
export type CompiledPattern =
    | { pattern: string; valid: true; matcher: RegExp }
    | { pattern: string; valid: false; reason: string };

/**
 * One category with its patterns in declaration order.
 */
export interface CompiledCategory {
    name: string;
    patterns: CompiledPattern[];
}

/**
 * Ordered categories. Position in the array is the precedence: earlier wins.
 */
export interface RuleSet {
    categories: CompiledCategory[];
}

/**
 * Result pair from building a rule set: best-effort rules plus every compile failure.
 */
export interface RuleSetBuild {
    ruleSet: RuleSet;
    diagnostics: PatternDiagnostic[];
}

/**
 * Result of validating a candidate pattern, optionally against a keyword sample.
 */
export interface PatternValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
    matchCount?: number;
    matchPercent?: number;
}
