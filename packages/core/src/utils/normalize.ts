/**
 * Field normalization for brokerage export values.
 *
 * All functions take raw cell text and return strings; Decimal is used
 * only inside the computation.
 */

import { Decimal } from 'decimal.js';
import { PRICE_DECIMALS } from '../types/index.js';

const UNSIGNED_NUMBER = /^(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const SIGNED_NUMBER = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const NUMBERED_HEADER = /^(price|amount)/i;

/**
 * Normalize a currency cell to a signed two-decimal string.
 *
 * - Empty → null (no amount supplied, distinct from zero)
 * - "(12.50)" and "-12.50" are negative
 * - "$" and thousands separators are stripped
 * - Exponent notation ("1E3") is accepted
 * - Unparseable text → "0.00", reported through `warnings` when given
 * - `invert` flips the final sign
 *
 * @param value - Raw cell text
 * @param invert - Flip sign after all other rules
 * @param warnings - Optional sink for the lenient-fallback warning
 */
export function normalizeCurrency(value: string, invert = false, warnings?: string[]): string | null {
    let s = value.trim();
    if (!s) {
        return null;
    }

    let negative = false;
    if (s.startsWith('(') && s.endsWith(')')) {
        negative = true;
        s = s.slice(1, -1);
    }
    s = s.replace(/[$,]/g, '').trim();
    if (s.startsWith('-')) {
        negative = true;
        s = s.replace(/^-+/, '').trim();
    }

    if (!UNSIGNED_NUMBER.test(s)) {
        warnings?.push(`Could not parse amount "${value.trim()}", using 0.00`);
        return '0.00';
    }

    if (invert) {
        negative = !negative;
    }
    const num = new Decimal(s);
    return (negative && !num.isZero() ? num.negated() : num).toFixed(2);
}

/**
 * Normalize a quantity cell: trim and strip thousands separators.
 * Sign and decimal form are kept verbatim.
 */
export function normalizeQuantity(value: string): string {
    return value.trim().replace(/,/g, '');
}

/**
 * Normalize a header cell. Repeated "Price"/"Amount" columns carry a
 * trailing numeral ("Price 2", "Amount3") that is dropped.
 */
export function normalizeHeader(header: string): string {
    const h = header.trim();
    if (NUMBERED_HEADER.test(h)) {
        return h.replace(/\s*\d+$/, '');
    }
    return h;
}

/**
 * True when the text is a signed decimal number, exponent allowed.
 */
export function isNumeric(value: string): boolean {
    return SIGNED_NUMBER.test(value.trim());
}

/**
 * Unit price from quantity and amount: |amount| / |quantity|.
 *
 * @returns Price with 9 fraction digits, or "0.00" when either operand
 *          is non-numeric or quantity is zero
 */
export function computePrice(quantity: string, amount: string): string {
    if (!isNumeric(quantity) || !isNumeric(amount)) {
        return '0.00';
    }
    const q = new Decimal(quantity.trim()).abs();
    if (q.isZero()) {
        return '0.00';
    }
    const a = new Decimal(amount.trim()).abs();
    return a.dividedBy(q).toFixed(PRICE_DECIMALS);
}

/**
 * Escape the five reserved markup characters.
 */
export function escapeMarkup(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;');
}
