/**
 * Pattern compilation.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Invalid regex is returned as data, never thrown.
 */

import { PATTERN_FLAGS } from '../types/index.js';
import type { CompiledPattern } from './types.js';

/**
 * Compile a raw pattern string into a case-insensitive matcher.
 *
 * The empty pattern is rejected: it would match every keyword and swallow everything
 * declared after it. Whitespace is an ordinary pattern (`' '` matches multi-word keywords).
 */
export function compilePattern(pattern: string): CompiledPattern {
    if (pattern === '') {
        return { pattern, valid: false, reason: 'Pattern cannot be empty' };
    }

    try {
        return { pattern, valid: true, matcher: new RegExp(pattern, PATTERN_FLAGS) };
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        return { pattern, valid: false, reason };
    }
}

/**
 * Test if a pattern compiles.
 */
export function isValidPattern(pattern: string): boolean {
    return compilePattern(pattern).valid;
}

/**
 * Find-anywhere match of a compiled pattern against a keyword.
 * Anchors (^, $) in the pattern itself still apply.
 */
export function patternMatches(compiled: CompiledPattern, keyword: string): boolean {
    return compiled.valid && compiled.matcher.test(keyword);
}
