import { describe, it, expect } from 'vitest';
import { parseCategoryDefinitions } from '../../src/parser/categories.js';
import { MalformedInputError } from '../../src/errors.js';

describe('parseCategoryDefinitions', () => {
    describe('mapping form', () => {
        it('reads name -> patterns in file order', () => {
            const yaml = `
# Checked top to bottom
Men Shoes & Socks:
  - lederhosen.*shoe
  - 'shirt(?!.*dress)'
Accessories:
  - suspender
  - belt
`;
            expect(parseCategoryDefinitions(yaml)).toEqual([
                { name: 'Men Shoes & Socks', patterns: ['lederhosen.*shoe', 'shirt(?!.*dress)'] },
                { name: 'Accessories', patterns: ['suspender', 'belt'] },
            ]);
        });

        it('keeps integer-like names in declared order', () => {
            const yaml = `
"2024":
  - new
Shoes:
  - shoe
10: ten
`;
            expect(parseCategoryDefinitions(yaml).map((d) => d.name)).toEqual(['2024', 'Shoes', '10']);
        });

        it('accepts a single string pattern', () => {
            expect(parseCategoryDefinitions('Shirts: shirt\n')).toEqual([
                { name: 'Shirts', patterns: ['shirt'] },
            ]);
        });

        it('treats an empty value as no patterns', () => {
            expect(parseCategoryDefinitions('Empty:\n')).toEqual([{ name: 'Empty', patterns: [] }]);
        });

        it('converts numeric patterns to text', () => {
            expect(parseCategoryDefinitions('Sizes:\n  - 42\n')).toEqual([{ name: 'Sizes', patterns: ['42'] }]);
        });

        it('keeps numeric-looking patterns exactly as written', () => {
            expect(parseCategoryDefinitions('Sizes:\n  - 1.10\n  - 007\n  - 1e3\n  - 0x1F\n  - true\n')).toEqual([
                { name: 'Sizes', patterns: ['1.10', '007', '1e3', '0x1F', 'true'] },
            ]);
            expect(parseCategoryDefinitions('Sizes: 1.10\n')).toEqual([{ name: 'Sizes', patterns: ['1.10'] }]);
        });

        it('keeps numeric-looking names exactly as written', () => {
            expect(parseCategoryDefinitions('1.50: [a]\n007: [b]\n').map((d) => d.name)).toEqual(['1.50', '007']);
        });

        it('keeps unquoted JSON numbers as written', () => {
            expect(parseCategoryDefinitions('{"Sizes": [1.10, 0.50]}')).toEqual([
                { name: 'Sizes', patterns: ['1.10', '0.50'] },
            ]);
        });

        it('reads JSON', () => {
            const json = '{"Men Clothing": ["lederhosen.*men|mens"], "Accessories": ["belt"]}';
            expect(parseCategoryDefinitions(json)).toEqual([
                { name: 'Men Clothing', patterns: ['lederhosen.*men|mens'] },
                { name: 'Accessories', patterns: ['belt'] },
            ]);
        });

        it('reads JSON escapes in patterns', () => {
            expect(parseCategoryDefinitions('{"Sizes": ["size \\\\d+"]}')).toEqual([
                { name: 'Sizes', patterns: ['size \\d+'] },
            ]);
        });

        it('unwraps a top-level categories key', () => {
            expect(parseCategoryDefinitions('categories:\n  A: [a]\n  B: [b]\n')).toEqual([
                { name: 'A', patterns: ['a'] },
                { name: 'B', patterns: ['b'] },
            ]);
        });

        it('keeps a category literally named categories', () => {
            expect(parseCategoryDefinitions('categories: [x, y]\n')).toEqual([
                { name: 'categories', patterns: ['x', 'y'] },
            ]);
        });
    });

    describe('sequence form', () => {
        it('reads a list of { name, patterns }', () => {
            const yaml = `
- name: A
  patterns: [a, b]
- name: B
  patterns: c
- name: C
`;
            expect(parseCategoryDefinitions(yaml)).toEqual([
                { name: 'A', patterns: ['a', 'b'] },
                { name: 'B', patterns: ['c'] },
                { name: 'C', patterns: [] },
            ]);
        });

        it('reads the list under a categories key', () => {
            expect(parseCategoryDefinitions('categories:\n  - name: A\n    patterns: [a]\n')).toEqual([
                { name: 'A', patterns: ['a'] },
            ]);
        });

        it('keeps numeric-looking names and patterns as written', () => {
            expect(parseCategoryDefinitions('- name: 007\n  patterns: [1.10, 0x1F]\n')).toEqual([
                { name: '007', patterns: ['1.10', '0x1F'] },
            ]);
        });

        it('keeps duplicate names', () => {
            const yaml = '- name: A\n  patterns: [a]\n- name: A\n  patterns: [b]\n';
            expect(parseCategoryDefinitions(yaml)).toHaveLength(2);
        });
    });

    it('returns no categories for an empty document', () => {
        expect(parseCategoryDefinitions('')).toEqual([]);
        expect(parseCategoryDefinitions('# nothing yet\n')).toEqual([]);
    });

    describe('malformed input', () => {
        it('rejects syntax errors', () => {
            expect(() => parseCategoryDefinitions('A: [unclosed')).toThrow(
                /^Category definitions are not valid YAML or JSON/
            );
        });

        it('rejects a scalar document', () => {
            expect(() => parseCategoryDefinitions('just text')).toThrow(
                'Category definitions must be a mapping of name to patterns or a list of { name, patterns }'
            );
        });

        it('rejects nested mappings as patterns', () => {
            try {
                parseCategoryDefinitions('A:\n  nested: map\nB: [b]\n');
                expect.unreachable();
            } catch (e) {
                expect(e).toBeInstanceOf(MalformedInputError);
                if (e instanceof MalformedInputError) {
                    expect(e.issues).toEqual(['A: patterns must be a string or a list of strings']);
                }
            }
        });

        it('rejects sequence items without a name', () => {
            expect(() => parseCategoryDefinitions('- patterns: [a]\n')).toThrow(/categories\[0\]\.name/);
        });

        it('rejects nested lists as patterns in the sequence form', () => {
            try {
                parseCategoryDefinitions('- name: A\n  patterns: [[a]]\n');
                expect.unreachable();
            } catch (e) {
                expect(e).toBeInstanceOf(MalformedInputError);
                if (e instanceof MalformedInputError) {
                    expect(e.issues).toEqual(['categories[0].patterns: patterns must be a string or a list of strings']);
                }
            }
        });
    });
});
