import { parseDocument, isMap, isSeq, isScalar } from 'yaml';
import type { Document, Pair, YAMLMap, YAMLSeq } from 'yaml';
import { readFile, writeFile } from 'node:fs/promises';

const WRAPPER_KEY = 'categories';

export interface AppendResult {
    /** True when the category did not exist and was added at the end. */
    created: boolean;
}

function isMissingFile(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Scalar text as written: `007:` is category "007", not 7.
 */
function scalarText(node: unknown): string | null {
    if (typeof node === 'string') return node;
    if (!isScalar(node)) return null;
    if (typeof node.value === 'string') return node.value;
    if (node.value === null || node.value === undefined) return null;
    return node.source ? node.source : String(node.value);
}

/**
 * Same unwrapping rule as the category parser: a lone `categories:` key holding
 * a mapping or a list of `{ name, patterns }` entries.
 */
function categoriesRoot(root: unknown): unknown {
    if (!isMap(root) || root.items.length !== 1) return root;
    const [pair] = root.items;
    if (scalarText(pair.key) !== WRAPPER_KEY) return root;

    const inner = pair.value;
    if (isMap(inner) || (isSeq(inner) && inner.items.length > 0 && inner.items.every((item) => isMap(item)))) {
        return inner;
    }
    return root;
}

/**
 * Existing patterns value -> value with the new pattern appended.
 * Returns false when the value has a shape patterns cannot take.
 */
function appendToPatterns(
    doc: Document,
    current: unknown,
    pattern: string,
    replace: (value: unknown) => void
): boolean {
    if (isSeq(current)) {
        current.add(doc.createNode(pattern));
        return true;
    }
    if (current === null || current === undefined) {
        replace(doc.createNode([pattern]));
        return true;
    }
    if (isScalar(current)) {
        const existing = scalarText(current);
        replace(doc.createNode(existing === null ? [pattern] : [existing, pattern]));
        return true;
    }
    return false;
}

function appendToMapping(doc: Document, map: YAMLMap, category: string, pattern: string, filePath: string): AppendResult {
    const pair = map.items.find((item: Pair) => scalarText(item.key) === category);
    if (!pair) {
        map.items.push(doc.createPair(category, [pattern]));
        return { created: true };
    }

    const ok = appendToPatterns(doc, pair.value, pattern, (value) => {
        pair.value = value;
    });
    if (!ok) {
        throw new Error(`Invalid YAML structure in ${filePath}: patterns of "${category}" must be a list.`);
    }
    return { created: false };
}

function appendToSequence(doc: Document, seq: YAMLSeq, category: string, pattern: string, filePath: string): AppendResult {
    for (const item of seq.items) {
        if (!isMap(item)) continue;
        const namePair = item.items.find((pair) => scalarText(pair.key) === 'name');
        if (!namePair || scalarText(namePair.value) !== category) continue;

        const patternsPair = item.items.find((pair) => scalarText(pair.key) === 'patterns');
        const ok = appendToPatterns(doc, patternsPair?.value, pattern, (value) => {
            item.set('patterns', value);
        });
        if (!ok) {
            throw new Error(`Invalid YAML structure in ${filePath}: patterns of "${category}" must be a list.`);
        }
        return { created: false };
    }

    seq.add(doc.createNode({ name: category, patterns: [pattern] }));
    return { created: true };
}

/**
 * Appends a pattern to a category in a YAML (or JSON) category file while preserving comments.
 * The category is created at the end when it does not exist; a missing file is created.
 */
export async function appendPatternToYaml(filePath: string, category: string, pattern: string): Promise<AppendResult> {
    let content = '';
    try {
        content = await readFile(filePath, 'utf8');
    } catch (err) {
        if (isMissingFile(err)) {
            content = '# Keyword categories, in precedence order\n';
        } else {
            throw err;
        }
    }

    const doc = parseDocument(content);
    if (doc.errors.length > 0) {
        throw new Error(`Invalid YAML in ${filePath}: ${doc.errors[0].message}`);
    }

    const root = categoriesRoot(doc.contents);
    let result: AppendResult;

    if (root === null || root === undefined) {
        doc.set(category, [pattern]);
        result = { created: true };
    } else if (isMap(root)) {
        result = appendToMapping(doc, root, category, pattern, filePath);
    } else if (isSeq(root)) {
        result = appendToSequence(doc, root, category, pattern, filePath);
    } else {
        throw new Error(`Invalid YAML structure in ${filePath}: expected a mapping of categories.`);
    }

    await writeFile(filePath, doc.toString());
    return result;
}
