import { describe, it, expect } from 'vitest';
import { isEmptyRow, stripBom } from '../../src/utils/csv.js';

describe('stripBom', () => {
    it('removes a leading byte order mark', () => {
        expect(stripBom('\uFEFFDate')).toBe('Date');
    });

    it('leaves other text untouched', () => {
        expect(stripBom('Date\uFEFF')).toBe('Date\uFEFF');
        expect(stripBom('')).toBe('');
    });
});

describe('isEmptyRow', () => {
    it('is true for blank and whitespace-only cells', () => {
        expect(isEmptyRow([])).toBe(true);
        expect(isEmptyRow(['', '  ', undefined, null])).toBe(true);
    });

    it('is false when any cell has content', () => {
        expect(isEmptyRow(['', 'x'])).toBe(false);
    });
});
