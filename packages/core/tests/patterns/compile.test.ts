import { describe, it, expect } from 'vitest';
import { compilePattern, isValidPattern, patternMatches } from '../../src/patterns/compile.js';

describe('compilePattern', () => {
    it('compiles a valid pattern case-insensitively', () => {
        const compiled = compilePattern('shirt');
        expect(compiled.valid).toBe(true);
        expect(patternMatches(compiled, "Men's SHIRT")).toBe(true);
    });

    it('finds the pattern anywhere in the keyword', () => {
        const compiled = compilePattern('belt');
        expect(patternMatches(compiled, 'leather belt brown')).toBe(true);
    });

    it('respects explicit anchors', () => {
        const compiled = compilePattern('^belt$');
        expect(patternMatches(compiled, 'belt')).toBe(true);
        expect(patternMatches(compiled, 'leather belt')).toBe(false);
    });

    it('supports negative lookahead', () => {
        const compiled = compilePattern('shirt(?!.*dress)');
        expect(patternMatches(compiled, 't-shirt')).toBe(true);
        expect(patternMatches(compiled, 'shirt dress')).toBe(false);
    });

    it('supports alternation and wildcards', () => {
        const compiled = compilePattern('lederhosen.*men|mens');
        expect(patternMatches(compiled, 'lederhosen for men')).toBe(true);
        expect(patternMatches(compiled, 'mens jacket')).toBe(true);
        expect(patternMatches(compiled, 'dirndl')).toBe(false);
    });

    it('reports malformed patterns instead of throwing', () => {
        const compiled = compilePattern('(');
        expect(compiled.valid).toBe(false);
        if (!compiled.valid) {
            expect(compiled.pattern).toBe('(');
            expect(compiled.reason).toMatch(/Invalid regular expression/);
        }
    });

    it('rejects the empty pattern', () => {
        expect(compilePattern('')).toEqual({ pattern: '', valid: false, reason: 'Pattern cannot be empty' });
    });

    it('compiles whitespace as an ordinary pattern', () => {
        const compiled = compilePattern(' ');
        expect(compiled.valid).toBe(true);
        expect(patternMatches(compiled, 'leather belt')).toBe(true);
        expect(patternMatches(compiled, 'hat')).toBe(false);
    });

    it('never matches with an invalid pattern', () => {
        expect(patternMatches(compilePattern('[a-'), '[a-')).toBe(false);
    });

    it('gives the same answer on repeated tests of one matcher', () => {
        const compiled = compilePattern('cat');
        expect(patternMatches(compiled, 'cat food')).toBe(true);
        expect(patternMatches(compiled, 'cat food')).toBe(true);
        expect(patternMatches(compiled, 'cat food')).toBe(true);
    });
});

describe('isValidPattern', () => {
    it('returns true for valid patterns', () => {
        expect(isValidPattern('oktoberfest.*shoe')).toBe(true);
    });

    it('returns false for malformed patterns', () => {
        expect(isValidPattern('(unclosed')).toBe(false);
        expect(isValidPattern('*leading')).toBe(false);
    });
});
