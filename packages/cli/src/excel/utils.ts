import exceljs from 'exceljs';
import type { Fill, Font, Workbook, Worksheet } from 'exceljs';

export interface TableColumn<K extends string> {
    header: string;
    key: K;
}

type TableRow<K extends string> = Record<K, string | number>;

const HEADER_FONT: Partial<Font> = { bold: true, color: { argb: 'FFFFFFFF' }, size: 11 };
const HEADER_FILL: Fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF4472C4' } };

const MIN_WIDTH = 10;
const MAX_WIDTH = 80;

export function createWorkbook(): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'Keyword Baskets';
    workbook.created = new Date();
    return workbook;
}

function columnWidth<K extends string>(column: TableColumn<K>, rows: readonly TableRow<K>[]): number {
    const longest = rows.reduce(
        (max, row) => Math.max(max, String(row[column.key]).length),
        column.header.length
    );
    return Math.min(Math.max(longest + 2, MIN_WIDTH), MAX_WIDTH);
}

/**
 * Adds a sheet holding one table: blue header row frozen at the top, columns sized to their content.
 */
export function addTableSheet<K extends string>(
    workbook: Workbook,
    name: string,
    columns: readonly TableColumn<K>[],
    rows: readonly TableRow<K>[]
): Worksheet {
    const sheet = workbook.addWorksheet(name, {
        views: [{ state: 'frozen', xSplit: 0, ySplit: 1 }],
    });

    sheet.columns = columns.map(column => ({
        header: column.header,
        key: column.key,
        width: columnWidth(column, rows),
    }));

    for (const row of rows) {
        sheet.addRow(row);
    }

    sheet.getRow(1).eachCell(cell => {
        cell.font = HEADER_FONT;
        cell.fill = HEADER_FILL;
        cell.alignment = { vertical: 'middle', horizontal: 'center' };
    });

    return sheet;
}
