/**
 * Brokerage activity export parser.
 *
 * Format:
 * - CSV format
 * - DYNAMIC header row: account summary preamble before the table
 * - Header row starts with "Date", "Account"
 * - Data region ends at the first fully empty row (footer notes follow)
 * - Repeated "Price"/"Amount" columns are suffixed with a numeral
 *
 * Values are kept as raw text; normalization happens per generator.
 */

import * as XLSX from 'xlsx';
import type { BrokerageRow, ParseResult } from '../types/index.js';
import {
    BrokerageRowSchema,
    HeaderNotFoundError,
    MissingColumnError,
    REQUIRED_COLUMNS,
} from '../types/index.js';
import { normalizeHeader } from '../utils/normalize.js';
import { isEmptyRow, stripBom } from '../utils/csv.js';

/**
 * Find header row: first two cells are exactly "Date" and "Account".
 */
export function findHeaderRow(rows: readonly unknown[][]): number {
    for (let i = 0; i < rows.length; i++) {
        const first = stripBom(String(rows[i][0] ?? '')).trim();
        const second = String(rows[i][1] ?? '').trim();
        if (first === 'Date' && second === 'Account') {
            return i;
        }
    }
    throw new HeaderNotFoundError();
}

/**
 * Parse a brokerage activity export.
 *
 * @param data - File contents as ArrayBuffer
 * @returns ParseResult with validated rows and warnings
 */
export function parseBrokerageExport(data: ArrayBuffer): ParseResult {
    // raw: keep "(1,234.50)" and "01/02/2024" as text
    const workbook = XLSX.read(data, { type: 'array', raw: true });
    const sheet = workbook.Sheets[workbook.SheetNames[0]];
    const rawRows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
        header: 1,
        raw: false,
        defval: '',
        blankrows: true,
    });

    const headerRowIndex = findHeaderRow(rawRows);
    const headers = rawRows[headerRowIndex].map((cell, i) => {
        const text = String(cell ?? '');
        return normalizeHeader(i === 0 ? stripBom(text) : text);
    });

    const warnings: string[] = [];
    const present = new Set(headers);
    const required = Object.values(REQUIRED_COLUMNS);
    const missing = required.filter((col) => !present.has(col));
    if (missing.length > 0) {
        throw new MissingColumnError(missing, headers.filter((h) => h !== ''));
    }

    for (const name of required) {
        const count = headers.filter((h) => h === name).length;
        if (count > 1) {
            warnings.push(`Column "${name}" appears ${count} times; using the last one`);
        }
    }

    const rows: BrokerageRow[] = [];
    for (const cells of rawRows.slice(headerRowIndex + 1)) {
        if (isEmptyRow(cells)) {
            break;
        }
        rows.push(toRow(headers, cells));
    }

    return { rows, preambleRows: headerRowIndex, warnings };
}

/**
 * Zip normalized headers with cells; later duplicate columns win.
 */
function toRow(headers: readonly string[], cells: readonly unknown[]): BrokerageRow {
    const record: Record<string, string> = {};
    headers.forEach((header, i) => {
        record[header] = String(cells[i] ?? '');
    });

    return BrokerageRowSchema.parse({
        date: record[REQUIRED_COLUMNS.date],
        account: record[REQUIRED_COLUMNS.account],
        activity: record[REQUIRED_COLUMNS.activity],
        description: record[REQUIRED_COLUMNS.description],
        cusip: record[REQUIRED_COLUMNS.cusip],
        symbol: record[REQUIRED_COLUMNS.symbol],
        quantity: record[REQUIRED_COLUMNS.quantity],
        price: record[REQUIRED_COLUMNS.price],
        amount: record[REQUIRED_COLUMNS.amount],
    });
}
