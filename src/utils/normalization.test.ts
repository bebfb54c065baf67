import { describe, expect, it } from 'vitest';
import { isNull, normalizeNumber, toTitleCase } from './normalization';

describe('isNull', () => {
    it.each(['', 'nan', 'NaN', 'None', 'none', 'NaT', 'null', 'NULL', '  none  '])('treats %j as a placeholder', (value) => {
        expect(isNull(value)).toBe(true);
    });

    it('treats absent values as null', () => {
        expect(isNull(null)).toBe(true);
        expect(isNull(undefined)).toBe(true);
    });

    it('keeps real values', () => {
        expect(isNull('0')).toBe(false);
        expect(isNull('Nancy')).toBe(false);
        expect(isNull('nullable')).toBe(false);
    });
});

describe('normalizeNumber', () => {
    it('expands scientific notation into an integer string', () => {
        expect(normalizeNumber('1.2E+11')).toBe('120000000000');
        expect(normalizeNumber('9.87654321e+09')).toBe('9876543210');
    });

    it('returns values without notation trimmed but otherwise untouched', () => {
        expect(normalizeNumber(' 450000 ')).toBe('450000');
        expect(normalizeNumber('john@x.com')).toBe('john@x.com');
    });

    it('keeps the original string when the notation does not parse', () => {
        expect(normalizeNumber('1e+')).toBe('1e+');
        expect(normalizeNumber('ref-e+12')).toBe('ref-e+12');
    });
});

describe('toTitleCase', () => {
    it('capitalizes each word', () => {
        expect(toTitleCase('self employed')).toBe('Self Employed');
        expect(toTitleCase('JOHN SMITH')).toBe('John Smith');
        expect(toTitleCase('home renovation')).toBe('Home Renovation');
    });
});
