import { describe, it, expect } from 'vitest';
import { buildRuleSet, categoryMatches, hasActivePatterns } from '../../src/patterns/rule-set.js';
import type { CategoryDefinition } from '../../src/types/index.js';

describe('buildRuleSet', () => {
    it('preserves category and pattern order', () => {
        const definitions: CategoryDefinition[] = [
            { name: 'Shoes', patterns: ['shoe', 'boot'] },
            { name: 'Accessories', patterns: ['belt', 'suspender'] },
        ];

        const { ruleSet, diagnostics } = buildRuleSet(definitions);

        expect(diagnostics).toHaveLength(0);
        expect(ruleSet.categories.map((c) => c.name)).toEqual(['Shoes', 'Accessories']);
        expect(ruleSet.categories[1].patterns.map((p) => p.pattern)).toEqual(['belt', 'suspender']);
    });

    it('collects one diagnostic per invalid pattern and keeps the valid ones', () => {
        const { ruleSet, diagnostics } = buildRuleSet([
            { name: 'Broken', patterns: ['(', 'belt'] },
            { name: 'Also Broken', patterns: ['[x'] },
        ]);

        expect(diagnostics.map((d) => [d.category, d.pattern])).toEqual([
            ['Broken', '('],
            ['Also Broken', '[x'],
        ]);
        expect(diagnostics[0].reason).not.toBe('');
        expect(categoryMatches(ruleSet.categories[0], 'leather belt')).toBe('belt');
    });

    it('keeps duplicate category names as separate entries', () => {
        const { ruleSet } = buildRuleSet([
            { name: 'Dup', patterns: ['a'] },
            { name: 'Dup', patterns: ['b'] },
        ]);
        expect(ruleSet.categories).toHaveLength(2);
    });

    it('does not mutate the definitions', () => {
        const definitions: CategoryDefinition[] = [{ name: 'Shoes', patterns: ['shoe'] }];
        const copy = structuredClone(definitions);
        buildRuleSet(definitions);
        expect(definitions).toEqual(copy);
    });
});

describe('categoryMatches', () => {
    const { ruleSet } = buildRuleSet([{ name: 'Shirts', patterns: ['(', 'shirt', 'tee'] }]);
    const shirts = ruleSet.categories[0];

    it('returns the first matching pattern', () => {
        expect(categoryMatches(shirts, 'shirt or tee')).toBe('shirt');
        expect(categoryMatches(shirts, 'graphic tee')).toBe('tee');
    });

    it('returns null when nothing matches', () => {
        expect(categoryMatches(shirts, 'leather belt')).toBeNull();
    });
});

describe('hasActivePatterns', () => {
    it('is false for an empty rule set', () => {
        expect(hasActivePatterns(buildRuleSet([]).ruleSet)).toBe(false);
    });

    it('is false when every pattern is invalid', () => {
        expect(hasActivePatterns(buildRuleSet([{ name: 'X', patterns: ['('] }]).ruleSet)).toBe(false);
    });

    it('is true when at least one pattern compiles', () => {
        expect(hasActivePatterns(buildRuleSet([{ name: 'X', patterns: ['(', 'x'] }]).ruleSet)).toBe(true);
    });
});
