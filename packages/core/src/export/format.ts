import { toCsv } from './tabular.js';
import { toReadableText } from './text.js';
import { toJson } from './structured.js';
import type { Basket, ExportFormat } from '../types/index.js';

/**
 * Serialize baskets in one of the supported formats. Never mutates the input.
 */
export function formatExport(baskets: readonly Basket[], format: ExportFormat): string {
    switch (format) {
        case 'csv':
            return toCsv(baskets);
        case 'txt':
            return toReadableText(baskets);
        case 'json':
            return toJson(baskets);
    }
}
