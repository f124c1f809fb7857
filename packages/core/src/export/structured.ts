/**
 * Structured (nested) export and its parser.
 *
 * Keys are "Basket {index}"; values carry the basket name and its keywords. Key insertion order
 * is basket order, which JSON preserves because the keys are not integer-like.
 */

import { MalformedInputError, formatZodIssues } from '../errors.js';
import { STRUCTURED_KEY_PREFIX, StructuredExportSchema } from '../types/index.js';
import type { Basket, StructuredExport } from '../types/index.js';

/**
 * Label used for a basket in structured and text exports.
 */
export function basketKey(index: number): string {
    return `${STRUCTURED_KEY_PREFIX}${index}`;
}

export function toStructured(baskets: readonly Basket[]): StructuredExport {
    const structured: StructuredExport = {};
    for (const basket of baskets) {
        structured[basketKey(basket.index)] = {
            name: basket.name,
            keywords: [...basket.keywords],
        };
    }
    return structured;
}

export function toJson(baskets: readonly Basket[]): string {
    return JSON.stringify(toStructured(baskets), null, 2);
}

/**
 * Rebuild baskets from a structured export (JSON text or an already parsed object).
 *
 * @throws MalformedInputError when the JSON is unreadable or not the expected shape
 */
export function parseStructuredExport(input: unknown): Basket[] {
    let data: unknown = input;
    if (typeof input === 'string') {
        try {
            data = JSON.parse(input);
        } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            throw new MalformedInputError('Structured export is not valid JSON', [reason]);
        }
    }

    const parsed = StructuredExportSchema.safeParse(data);
    if (!parsed.success) {
        throw new MalformedInputError('Invalid structured export', formatZodIssues(parsed.error));
    }

    return Object.entries(parsed.data).map(([key, value]) => ({
        index: Number(key.slice(STRUCTURED_KEY_PREFIX.length)),
        name: value.name,
        keywords: [...value.keywords],
    }));
}
