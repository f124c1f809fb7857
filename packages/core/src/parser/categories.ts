/**
 * Category definition parser (YAML, and JSON as a YAML subset).
 *
 * Works on the YAML document tree rather than plain JS objects: object keys that look like
 * integers ("10", "2024") would otherwise be re-ordered, and category order is precedence.
 * Names and patterns are taken as the text written, never as resolved numbers or booleans.
 *
 * Accepted shapes:
 *
 * ```yaml
 * Accessories:            # mapping of name -> patterns
 *   - belt
 *   - suspender
 * Men Shirts: shirt       # single pattern
 *
 * categories:             # the same mapping, or a sequence, under "categories"
 *   - name: Accessories
 *     patterns: [belt]
 * ```
 */

import { parseDocument, isMap, isSeq, isScalar } from 'yaml';
import type { YAMLMap, YAMLSeq } from 'yaml';
import { MalformedInputError } from '../errors.js';
import type { CategoryDefinition } from '../types/index.js';

const WRAPPER_KEY = 'categories';

const PATTERNS_SHAPE = 'patterns must be a string or a list of strings';

/**
 * Text of a scalar node as written in the file. Numbers and booleans keep their source
 * text (`1.10`, `007`, `0x1F` stay as typed). Null and non-scalar nodes give null.
 */
function scalarText(node: unknown): string | null {
    if (!isScalar(node)) return null;
    if (typeof node.value === 'string') return node.value;
    if (node.value === null || node.value === undefined) return null;
    return node.source ? node.source : String(node.value);
}

function keyText(key: unknown): string | null {
    return typeof key === 'string' ? key : scalarText(key);
}

function isEmptyValue(node: unknown): boolean {
    return node === null || node === undefined || (isScalar(node) && (node.value === null || node.value === undefined));
}

/**
 * Patterns of one category: a list of scalars, a single scalar, or nothing.
 * Returns null when the node has any other shape.
 */
function readPatterns(node: unknown): string[] | null {
    if (isEmptyValue(node)) return [];

    if (isSeq(node)) {
        const patterns: string[] = [];
        for (const item of node.items) {
            const text = scalarText(item);
            if (text === null) return null;
            patterns.push(text);
        }
        return patterns;
    }

    const single = scalarText(node);
    return single === null ? null : [single];
}

function pairValue(map: YAMLMap, key: string): unknown {
    return map.items.find((pair) => keyText(pair.key) === key)?.value;
}

/**
 * A lone `categories:` key wrapping a mapping or a sequence of mappings is unwrapped.
 * `categories: [pattern, ...]` stays a category literally named "categories".
 */
function unwrap(root: unknown): unknown {
    if (!isMap(root) || root.items.length !== 1) return root;

    const [pair] = root.items;
    if (keyText(pair.key) !== WRAPPER_KEY) return root;

    const inner = pair.value;
    if (isMap(inner) || (isSeq(inner) && inner.items.length > 0 && inner.items.every((item) => isMap(item)))) {
        return inner;
    }
    return root;
}

function fromMapping(map: YAMLMap, issues: string[]): CategoryDefinition[] {
    const definitions: CategoryDefinition[] = [];

    map.items.forEach((pair, position) => {
        const name = keyText(pair.key);
        if (name === null || name === '') {
            issues.push(`Category at position ${position + 1} has no name`);
            return;
        }

        const patterns = readPatterns(pair.value);
        if (patterns === null) {
            issues.push(`${name}: ${PATTERNS_SHAPE}`);
            return;
        }

        definitions.push({ name, patterns });
    });

    return definitions;
}

function fromSequence(seq: YAMLSeq, issues: string[]): CategoryDefinition[] {
    const definitions: CategoryDefinition[] = [];

    seq.items.forEach((item, position) => {
        const path = `categories[${position}]`;
        if (!isMap(item)) {
            issues.push(`${path}: Expected a mapping with name and patterns`);
            return;
        }

        const name = scalarText(pairValue(item, 'name'));
        if (name === null || name === '') {
            issues.push(`${path}.name: Category name cannot be empty`);
            return;
        }

        const patterns = readPatterns(pairValue(item, 'patterns'));
        if (patterns === null) {
            issues.push(`${path}.patterns: ${PATTERNS_SHAPE}`);
            return;
        }

        definitions.push({ name, patterns });
    });

    return definitions;
}

/**
 * Parse category definitions, preserving category and pattern order exactly as written.
 * An empty document yields no categories.
 *
 * @throws MalformedInputError on syntax errors or an unsupported shape
 */
export function parseCategoryDefinitions(text: string): CategoryDefinition[] {
    const doc = parseDocument(text);
    if (doc.errors.length > 0) {
        throw new MalformedInputError(
            'Category definitions are not valid YAML or JSON',
            doc.errors.map((e) => e.message)
        );
    }

    const root = unwrap(doc.contents);
    if (root === null || root === undefined) {
        return [];
    }

    const issues: string[] = [];
    let definitions: CategoryDefinition[];

    if (isMap(root)) {
        definitions = fromMapping(root, issues);
    } else if (isSeq(root)) {
        definitions = fromSequence(root, issues);
    } else {
        throw new MalformedInputError(
            'Category definitions must be a mapping of name to patterns or a list of { name, patterns }'
        );
    }

    if (issues.length > 0) {
        throw new MalformedInputError('Invalid category definitions', issues);
    }

    return definitions;
}
