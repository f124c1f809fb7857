/**
 * Keyword table parser.
 *
 * Format:
 * - CSV (any single-character separator) or an .xlsx workbook (first sheet)
 * - First row is the header; the keyword column defaults to "Keyword"
 * - Cells are read as text, never coerced to numbers or dates
 * - Empty keyword cells are skipped, everything else is trimmed and kept in order
 */

import * as XLSX from 'xlsx';
import { MalformedInputError } from '../errors.js';
import { KEYWORD_INPUT } from '../types/index.js';

export interface KeywordParseOptions {
    column?: string;
    separator?: string;
}

export interface KeywordParseResult {
    keywords: string[];
    warnings: string[];
    skippedRows: number;
}

const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04];

function isZipArchive(bytes: Uint8Array): boolean {
    return ZIP_SIGNATURE.every((byte, i) => bytes[i] === byte);
}

function readWorkbook(data: ArrayBuffer | Uint8Array, separator: string): XLSX.WorkBook {
    const bytes = data instanceof Uint8Array ? data : new Uint8Array(data);

    if (isZipArchive(bytes)) {
        return XLSX.read(bytes, { type: 'array' });
    }

    // Decode text ourselves so UTF-8 without a BOM survives; TextDecoder drops a leading BOM.
    const text = new TextDecoder('utf-8').decode(bytes);

    // SheetJS sniffs the format from the first characters ("<" reads as HTML/XML, "ID" as SYLK).
    // A leading Excel `sep=` line pins delimited text and its separator.
    return XLSX.read(`sep=${separator}\n${text}`, { type: 'string', raw: true });
}

/**
 * Parse a keyword table.
 *
 * @param data - File contents
 * @param options - Keyword column name and CSV separator
 * @returns Keywords in file order, with warnings and skip count
 * @throws MalformedInputError when the file is unreadable, the column is missing or no keyword remains
 */
export function parseKeywords(
    data: ArrayBuffer | Uint8Array,
    options: KeywordParseOptions = {}
): KeywordParseResult {
    const column = options.column ?? KEYWORD_INPUT.DEFAULT_COLUMN;
    const separator = options.separator ?? KEYWORD_INPUT.DEFAULT_SEPARATOR;

    if (separator.length !== 1) {
        throw new MalformedInputError(`Separator must be a single character (got "${separator}")`);
    }

    let workbook: XLSX.WorkBook;
    try {
        workbook = readWorkbook(data, separator);
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new MalformedInputError('Keyword file could not be read', [reason]);
    }

    const sheet = workbook.Sheets[workbook.SheetNames[0]];
    const table = sheet
        ? XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, blankrows: false, defval: '' })
        : [];

    if (table.length === 0) {
        throw new MalformedInputError('Keyword file is empty');
    }

    const header = table[0].map((cell) => String(cell).trim());
    const columnIndex = header.indexOf(column);
    if (columnIndex === -1) {
        throw new MalformedInputError(
            `Missing required column "${column}"`,
            [`Found: ${header.join(', ')}`]
        );
    }

    const keywords: string[] = [];
    let skippedRows = 0;

    for (const row of table.slice(1)) {
        const value = String(row[columnIndex] ?? '').trim();
        if (value === '') {
            skippedRows++;
            continue;
        }
        keywords.push(value);
    }

    if (keywords.length === 0) {
        throw new MalformedInputError(`No keywords found in column "${column}"`);
    }

    const warnings: string[] = [];
    if (skippedRows) {
        warnings.push(`Skipped ${skippedRows} rows with an empty "${column}" value`);
    }

    return { keywords, warnings, skippedRows };
}
