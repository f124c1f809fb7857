import { TEXT_EXPORT } from '../types/index.js';
import type { Basket } from '../types/index.js';
import { basketKey } from './structured.js';

/**
 * Human-readable export.
 *
 * ```
 * Basket 0: Accessories
 *   - leather belt
 *
 * Basket 1: Uncategorized
 *   - men's shirt
 *
 * ```
 */
export function toReadableText(baskets: readonly Basket[]): string {
    const nl = TEXT_EXPORT.LINE_BREAK;
    return baskets
        .map((basket) => {
            const lines = [
                `${basketKey(basket.index)}: ${basket.name}`,
                ...basket.keywords.map((keyword) => `${TEXT_EXPORT.KEYWORD_PREFIX}${keyword}`),
            ];
            return lines.join(nl) + nl + nl;
        })
        .join('');
}
