/**
 * Tabular export: one row per (basket, keyword), basket then keyword order.
 */

import * as XLSX from 'xlsx';
import { TABULAR_COLUMNS } from '../types/index.js';
import type { Basket, TabularRow } from '../types/index.js';

export function toTabularRows(baskets: readonly Basket[]): TabularRow[] {
    return baskets.flatMap((basket) =>
        basket.keywords.map((keyword) => ({
            basket: basket.index,
            basketName: basket.name,
            keyword,
        }))
    );
}

/**
 * CSV with header `Basket,Basket Name,Keyword`.
 * Written through SheetJS so fields holding commas, quotes or line breaks are quoted.
 */
export function toCsv(baskets: readonly Basket[]): string {
    const rows = toTabularRows(baskets).map((row) => [row.basket, row.basketName, row.keyword]);
    const sheet = XLSX.utils.aoa_to_sheet([[...TABULAR_COLUMNS], ...rows]);
    return XLSX.utils.sheet_to_csv(sheet);
}
