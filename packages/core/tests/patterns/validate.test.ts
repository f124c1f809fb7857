import { describe, it, expect } from 'vitest';
import { validatePattern, findShadowingCategories } from '../../src/patterns/validate.js';
import { buildRuleSet } from '../../src/patterns/rule-set.js';

describe('validatePattern', () => {
    it('accepts a valid pattern without a sample', () => {
        expect(validatePattern('belt')).toEqual({ valid: true, errors: [], warnings: [] });
    });

    it('rejects a malformed pattern', () => {
        const result = validatePattern('(');
        expect(result.valid).toBe(false);
        expect(result.errors).toHaveLength(1);
        expect(result.errors[0]).toMatch(/^Invalid pattern "\(": /);
    });

    it('rejects an empty pattern', () => {
        const result = validatePattern('');
        expect(result.valid).toBe(false);
        expect(result.errors).toEqual(['Invalid pattern "": Pattern cannot be empty']);
    });

    it('rejects a whitespace-only pattern before adding it', () => {
        expect(validatePattern('  ')).toEqual({
            valid: false,
            errors: ['Invalid pattern "  ": Pattern cannot be empty'],
            warnings: [],
        });
    });

    it('warns when a pattern is too broad', () => {
        const keywords = ['belt a', 'belt b', 'belt c', 'belt d', 'shoe'];
        const result = validatePattern('belt', keywords);

        expect(result.valid).toBe(true);
        expect(result.matchCount).toBe(4);
        expect(result.matchPercent).toBe(0.8);
        expect(result.warnings).toEqual([
            'Pattern "belt" is too broad: matches 4 keywords (80.0% > 50%)',
        ]);
    });

    it('does not warn when the match count is small', () => {
        const result = validatePattern('belt', ['belt a', 'belt b', 'belt c', 'shoe']);
        expect(result.matchCount).toBe(3);
        expect(result.matchPercent).toBe(0.75);
        expect(result.warnings).toHaveLength(0);
    });
});

describe('findShadowingCategories', () => {
    const { ruleSet } = buildRuleSet([
        { name: 'A', patterns: ['cat'] },
        { name: 'B', patterns: ['dog'] },
        { name: 'C', patterns: ['fish'] },
    ]);
    const keywords = ['cat food', 'dog toy', 'cat toy', 'bird seed'];

    it('lists earlier categories that already take matching keywords', () => {
        expect(findShadowingCategories('cat|dog', 'C', ruleSet, keywords)).toEqual(['A', 'B']);
    });

    it('ignores the target category and everything after it', () => {
        expect(findShadowingCategories('cat|dog', 'B', ruleSet, keywords)).toEqual(['A']);
    });

    it('treats an unknown target as a new last category', () => {
        expect(findShadowingCategories('dog|cat', 'New', ruleSet, keywords)).toEqual(['A', 'B']);
    });

    it('returns nothing for an invalid pattern', () => {
        expect(findShadowingCategories('(', 'C', ruleSet, keywords)).toEqual([]);
    });

    it('returns nothing when no earlier category claims the matches', () => {
        expect(findShadowingCategories('seed', 'C', ruleSet, keywords)).toEqual([]);
    });
});
