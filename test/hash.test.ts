import { describe, expect, it } from 'vitest';

import { Entry } from '../src/entry';
import { areEqual, hashValue, isStructural, stringify } from '../src/hash';

describe('hashValue', () => {
    it('uses the integer itself for 32-bit integers', () => {
        expect(hashValue(42)).toBe(42);
        expect(hashValue(-7)).toBe(-7);
        expect(hashValue(0)).toBe(0);
    });

    it('gives fixed codes to null, undefined and booleans', () => {
        expect(hashValue(null)).toBe(0);
        expect(hashValue(undefined)).toBe(0);
        expect(hashValue(true)).toBe(1231);
        expect(hashValue(false)).toBe(1237);
    });

    it('hashes floats and strings to unsigned 32-bit values', () => {
        for (const v of [0.5, -1.25, 1e300, 'abc', '']) {
            const h = hashValue(v);
            expect(Number.isInteger(h)).toBe(true);
            expect(h).toBeGreaterThanOrEqual(0);
            expect(h).toBeLessThan(2 ** 32);
        }
    });

    it('hashes arrays by content, recursively', () => {
        expect(hashValue([1, [2, 3]])).toBe(hashValue([1, [2, 3]]));
        expect(hashValue([1, 2])).not.toBe(hashValue([2, 1]));
    });

    it('hashes Dates by time and bigints like their decimal form', () => {
        expect(hashValue(new Date(5))).toBe(5);
        expect(hashValue(10n)).toBe(hashValue('10'));
    });

    it('delegates to Structural objects', () => {
        const entry = new Entry(1, 2);
        expect(hashValue(entry)).toBe(entry.hashCode);
    });

    it('keeps a stable identity hash for plain objects', () => {
        const obj = { a: 1 };
        expect(hashValue(obj)).toBe(hashValue(obj));
    });
});

describe('areEqual', () => {
    it('compares arrays deeply', () => {
        expect(areEqual([1, [2, 'x']], [1, [2, 'x']])).toBe(true);
        expect(areEqual([1, 2], [1, 2, 3])).toBe(false);
        expect(areEqual([1, [2]], [1, [3]])).toBe(false);
        expect(areEqual([1], 1)).toBe(false);
    });

    it('treats NaN as equal to itself', () => {
        expect(areEqual(NaN, NaN)).toBe(true);
        expect(areEqual(NaN, 0)).toBe(false);
        expect(areEqual(0, -0)).toBe(true);
    });

    it('compares Dates by time', () => {
        expect(areEqual(new Date(5), new Date(5))).toBe(true);
        expect(areEqual(new Date(5), new Date(6))).toBe(false);
    });

    it('uses identity for plain objects', () => {
        const obj = { a: 1 };
        expect(areEqual(obj, obj)).toBe(true);
        expect(areEqual({ a: 1 }, { a: 1 })).toBe(false);
    });
});

describe('stringify', () => {
    it('renders nested arrays with brackets', () => {
        expect(stringify([1, [2, 'x']])).toBe('[1, [2, x]]');
        expect(stringify([])).toBe('[]');
    });

    it('falls back to String for everything else', () => {
        expect(stringify(3)).toBe('3');
        expect(stringify(null)).toBe('null');
        expect(stringify(new Entry('k', 'v'))).toBe('k: v');
    });
});

describe('isStructural', () => {
    it('recognises objects with hashCode and equals', () => {
        expect(isStructural(new Entry(1, 2))).toBe(true);
        expect(isStructural({ hashCode: 1, equals: () => true })).toBe(true);
        expect(isStructural({ hashCode: '1', equals: () => true })).toBe(false);
        expect(isStructural([1])).toBe(false);
        expect(isStructural(null)).toBe(false);
    });
});
