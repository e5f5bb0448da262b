import { describe, it, expect } from 'vitest';
import {
    normalizeCurrency,
    normalizeQuantity,
    normalizeHeader,
    computePrice,
    isNumeric,
    escapeMarkup,
} from '../../src/utils/normalize.js';

describe('normalizeCurrency', () => {
    it('treats parentheses as negative and strips separators', () => {
        expect(normalizeCurrency('(1,234.50)')).toBe('-1234.50');
    });

    it('inverts the sign when requested', () => {
        expect(normalizeCurrency('$1,234.50', true)).toBe('-1234.50');
        expect(normalizeCurrency('-5', true)).toBe('5.00');
    });

    it('returns null for empty input', () => {
        expect(normalizeCurrency('')).toBeNull();
        expect(normalizeCurrency('   ')).toBeNull();
    });

    it('handles a leading minus before or after the currency symbol', () => {
        expect(normalizeCurrency('-$5')).toBe('-5.00');
        expect(normalizeCurrency('$-5')).toBe('-5.00');
    });

    it('keeps a minus inside parentheses negative', () => {
        expect(normalizeCurrency('(-5)')).toBe('-5.00');
    });

    it('pads to two fraction digits', () => {
        expect(normalizeCurrency('12.5')).toBe('12.50');
        expect(normalizeCurrency('.5')).toBe('0.50');
        expect(normalizeCurrency(' 7 ')).toBe('7.00');
    });

    it('accepts exponent notation', () => {
        expect(normalizeCurrency('1E3')).toBe('1000.00');
        expect(normalizeCurrency('(1.5e-1)')).toBe('-0.15');
    });

    it('falls back to 0.00 for unparseable text and reports it', () => {
        const warnings: string[] = [];
        expect(normalizeCurrency('n/a', false, warnings)).toBe('0.00');
        expect(warnings).toEqual(['Could not parse amount "n/a", using 0.00']);
    });

    it('falls back silently without a warning sink', () => {
        expect(normalizeCurrency('abc')).toBe('0.00');
    });

    it('is idempotent on its own output', () => {
        for (const value of ['(1,234.50)', '$99', '-0.5', '12', '$1,000,000.25']) {
            const once = normalizeCurrency(value);
            expect(once).not.toBeNull();
            if (once !== null) {
                expect(normalizeCurrency(once)).toBe(once);
            }
        }
    });
});

describe('normalizeQuantity', () => {
    it('trims and strips thousands separators', () => {
        expect(normalizeQuantity(' 1,000.5 ')).toBe('1000.5');
    });

    it('preserves sign and decimal form', () => {
        expect(normalizeQuantity('-10')).toBe('-10');
        expect(normalizeQuantity('0.12345')).toBe('0.12345');
    });

    it('returns empty string for blank input', () => {
        expect(normalizeQuantity('  ')).toBe('');
    });
});

describe('normalizeHeader', () => {
    it('strips trailing numerals from Price and Amount columns', () => {
        expect(normalizeHeader('Price 2')).toBe('Price');
        expect(normalizeHeader('Amount3')).toBe('Amount');
    });

    it('leaves other headers alone apart from trimming', () => {
        expect(normalizeHeader(' Quantity ')).toBe('Quantity');
        expect(normalizeHeader('Account 2')).toBe('Account 2');
    });
});

describe('computePrice', () => {
    it('divides absolute amount by absolute quantity', () => {
        expect(computePrice('10', '-100.00')).toBe('10.000000000');
        expect(computePrice('-4', '10.00')).toBe('2.500000000');
    });

    it('rounds to nine fraction digits', () => {
        expect(computePrice('3', '10')).toBe('3.333333333');
    });

    it('returns 0.00 for zero quantity', () => {
        expect(computePrice('0', '10')).toBe('0.00');
    });

    it('returns 0.00 for non-numeric operands', () => {
        expect(computePrice('abc', '10')).toBe('0.00');
        expect(computePrice('10', '')).toBe('0.00');
    });
});

describe('isNumeric', () => {
    it('accepts signed decimals', () => {
        expect(isNumeric('-1.5')).toBe(true);
        expect(isNumeric('+3')).toBe(true);
    });

    it('accepts exponent notation', () => {
        expect(isNumeric('-2.5E2')).toBe(true);
        expect(isNumeric('1e')).toBe(false);
    });

    it('rejects text and empty strings', () => {
        expect(isNumeric('')).toBe(false);
        expect(isNumeric('1,000')).toBe(false);
    });
});

describe('escapeMarkup', () => {
    it('escapes all five reserved characters', () => {
        expect(escapeMarkup(`A&B <C> "D" 'E'`)).toBe('A&amp;B &lt;C&gt; &quot;D&quot; &apos;E&apos;');
    });
});
