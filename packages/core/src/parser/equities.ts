/**
 * Equity reference dataset parser.
 *
 * Format:
 * - CSV or XLSX, first sheet
 * - Optional header row with a "ticker" or "symbol" column
 * - Without a header, the first column holds the tickers
 *
 * Any ticker listed is an equity; everything else is treated as a fund.
 */

import * as XLSX from 'xlsx';
import { stripBom } from '../utils/csv.js';

const TICKER_HEADERS = ['ticker', 'symbol'];

/**
 * Parse the set of equity tickers.
 *
 * @param data - File contents as ArrayBuffer
 */
export function parseEquityTickers(data: ArrayBuffer): Set<string> {
    const workbook = XLSX.read(data, { type: 'array', raw: true });
    const sheet = workbook.Sheets[workbook.SheetNames[0]];
    const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: false, defval: '' });

    const tickers = new Set<string>();
    if (rows.length === 0) {
        return tickers;
    }

    const header = rows[0].map((cell) => stripBom(String(cell ?? '')).trim().toLowerCase());
    const headerColumn = header.findIndex((h) => TICKER_HEADERS.includes(h));
    const column = headerColumn === -1 ? 0 : headerColumn;
    const dataRows = headerColumn === -1 ? rows : rows.slice(1);

    for (const [i, row] of dataRows.entries()) {
        const raw = String(row[column] ?? '');
        const ticker = (i === 0 && headerColumn === -1 ? stripBom(raw) : raw).trim();
        if (ticker) {
            tickers.add(ticker);
        }
    }
    return tickers;
}
