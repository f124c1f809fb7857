import type { Workbook } from 'exceljs';
import { toTabularRows, type ClusterResult } from '@keyword-baskets/core';
import { createWorkbook, addTableSheet } from './utils.js';

/**
 * Workbook with one sheet per view of a run:
 * - Summary: basket sizes, in basket order
 * - Keywords: one row per keyword, same rows as baskets.csv
 * - Invalid Patterns: only when some pattern failed to compile
 */
export function generateBasketsExcel(result: ClusterResult): Workbook {
    const workbook = createWorkbook();

    addTableSheet(
        workbook,
        'Summary',
        [
            { header: 'Basket', key: 'index' },
            { header: 'Basket Name', key: 'name' },
            { header: 'Keywords Count', key: 'count' },
        ],
        result.stats.baskets
    );

    addTableSheet(
        workbook,
        'Keywords',
        [
            { header: 'Basket', key: 'basket' },
            { header: 'Basket Name', key: 'basketName' },
            { header: 'Keyword', key: 'keyword' },
        ],
        toTabularRows(result.baskets)
    );

    if (result.diagnostics.length > 0) {
        addTableSheet(
            workbook,
            'Invalid Patterns',
            [
                { header: 'Category', key: 'category' },
                { header: 'Pattern', key: 'pattern' },
                { header: 'Reason', key: 'reason' },
            ],
            result.diagnostics
        );
    }

    return workbook;
}
