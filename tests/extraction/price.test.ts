import { describe, expect, it } from 'vitest';
import { parsePrice } from '@/extraction/price';

describe('parsePrice', () => {
    it('strips currency symbols and thousands separators', () => {
        expect(parsePrice('$1,234.50')).toBe(1234.5);
        expect(parsePrice('  £19.99 ')).toBe(19.99);
        expect(parsePrice('€ 1 299')).toBe(1299);
    });

    it('keeps text that is not an amount', () => {
        expect(parsePrice('Contact for price')).toBe('Contact for price');
        expect(parsePrice(' Now $5.00 ')).toBe('Now $5.00');
    });

    it('accepts only plain decimal notation', () => {
        expect(parsePrice('0x10')).toBe('0x10');
        expect(parsePrice('1e3')).toBe('1e3');
        expect(parsePrice('$0b11')).toBe('$0b11');
        expect(parsePrice('-2.50')).toBe(-2.5);
    });

    it('returns a bare symbol unchanged', () => {
        expect(parsePrice('$')).toBe('$');
    });
});
