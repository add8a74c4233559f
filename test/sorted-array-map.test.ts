import { describe, expect, it } from 'vitest';

import {
    IndexOutOfRangeError,
    InvalidArgumentError,
    KeyNotFoundError,
    UnderflowError,
    UnorderedKeyTypeError,
} from '../src/errors';
import { SortedArrayMap } from '../src/sorted-array-map';
import { randomOps } from './support';

function letters(): SortedArrayMap<number, string> {
    const map = new SortedArrayMap<number, string>(4);
    map.put(5, 'e');
    map.put(2, 'b');
    map.put(8, 'h');
    map.put(1, 'a');
    return map;
}

describe('SortedArrayMap', () => {
    // ========================================================================
    // ORDERED QUERIES
    // ========================================================================

    it('keeps keys sorted and answers floor, ceil, rank and select', () => {
        const map = letters();
        expect([...map.keys()]).toEqual([1, 2, 5, 8]);
        expect([...map.values()]).toEqual(['a', 'b', 'e', 'h']);
        expect(map.floor(3)).toBe(2);
        expect(map.ceil(3)).toBe(5);
        expect(map.rank(5)).toBe(2);
        expect(map.select(2)).toBe(5);
    });

    it('returns exact matches from floor and ceil, undefined past the ends', () => {
        const map = letters();
        expect(map.floor(5)).toBe(5);
        expect(map.ceil(5)).toBe(5);
        expect(map.floor(0)).toBeUndefined();
        expect(map.ceil(9)).toBeUndefined();
        expect(map.rank(0)).toBe(0);
        expect(map.rank(9)).toBe(4);
    });

    it('satisfies rank(select(i)) == i', () => {
        const map = letters();
        for (let i = 0; i < map.size; i++) expect(map.rank(map.select(i))).toBe(i);
    });

    it('rejects ranks outside [0, size)', () => {
        const map = letters();
        expect(() => map.select(-1)).toThrow(IndexOutOfRangeError);
        expect(() => map.select(4)).toThrow('index 4 out of bounds for length 4');
        expect(() => map.select(1.5)).toThrow(IndexOutOfRangeError);
    });

    it('finds and deletes the extremes', () => {
        const map = letters();
        expect(map.min()).toBe(1);
        expect(map.max()).toBe(8);
        map.deleteMin();
        map.deleteMax();
        expect([...map.keys()]).toEqual([2, 5]);
    });

    it('underflows when empty', () => {
        const map = new SortedArrayMap<number, string>();
        expect(() => map.min()).toThrow("can't find minimum, map is empty");
        expect(() => map.max()).toThrow("can't find maximum, map is empty");
        expect(() => map.deleteMin()).toThrow(UnderflowError);
        expect(() => map.deleteMax()).toThrow("can't delete maximum, map is empty");
    });

    it('iterates inclusive key ranges', () => {
        const map = letters();
        expect([...map.keys(2, 6)]).toEqual([2, 5]);
        expect([...map.keys(0, 100)]).toEqual([1, 2, 5, 8]);
        expect([...map.entries(2, 5)].map(e => e.toTuple())).toEqual([[2, 'b'], [5, 'e']]);
        expect([...map.keys(3, 4)]).toEqual([]);
        expect([...map.keys(9, 1)]).toEqual([]);
    });

    it('validates range bounds at the call', () => {
        const map = new SortedArrayMap<number | null, string>();
        expect(() => map.keys(null, 3)).toThrow("param 'low' cannot be null");
        expect(() => map.entries(1, null)).toThrow("param 'high' cannot be null");
    });

    // ========================================================================
    // MAP OPERATIONS
    // ========================================================================

    it('gets, updates and falls back', () => {
        const map = letters();
        expect(map.get(8)).toBe('h');
        expect(map.put(8, 'H')).toBe(false);
        expect(map.get(8)).toBe('H');
        expect(map.size).toBe(4);
        expect(map.get(7, 'none')).toBe('none');
        expect(map.get(7, undefined)).toBeUndefined();
        expect(() => map.get(7)).toThrow(KeyNotFoundError);
        expect(() => map.get(7)).toThrow("key '7' doesn't exist in map");
    });

    it('deletes idempotently', () => {
        const map = letters();
        expect(map.delete(2)).toBe(true);
        expect(map.delete(2)).toBe(false);
        expect(map.delete(42)).toBe(false);
        expect(map.size).toBe(3);
        expect(map.contains(2)).toBe(false);
    });

    it('rejects null keys', () => {
        const map = new SortedArrayMap<number | null, string>();
        expect(() => map.put(null, 'x')).toThrow(InvalidArgumentError);
        expect(() => map.get(null)).toThrow("param 'key' cannot be null");
        expect(map.size).toBe(0);
    });

    it('fails on the first key that has no natural order', () => {
        const map = new SortedArrayMap<{ id: number }, string>();
        expect(() => map.put({ id: 1 }, 'x')).toThrow(UnorderedKeyTypeError);
        expect(map.size).toBe(0);
    });

    it('orders by an injected comparator', () => {
        const byId = (a: { id: number }, b: { id: number }) => a.id - b.id;
        const map = new SortedArrayMap<{ id: number }, string>(byId);
        map.put({ id: 3 }, 'c');
        map.put({ id: 1 }, 'a');
        map.put({ id: 3 }, 'C');
        expect(map.comparator).toBe(byId);
        expect(map.size).toBe(2);
        expect([...map.values()]).toEqual(['a', 'C']);
        expect(map.get({ id: 3 })).toBe('C');

        const descending = new SortedArrayMap<number, string>(2, (a, b) => b - a);
        for (const k of [1, 3, 2]) descending.put(k, String(k));
        expect([...descending.keys()]).toEqual([3, 2, 1]);
        expect(descending.capacity).toBe(4);
    });

    it('has no comparator when ordering naturally', () => {
        expect(new SortedArrayMap<string, number>().comparator).toBeUndefined();
    });

    // ========================================================================
    // CAPACITY
    // ========================================================================

    it('doubles when full and halves at quarter occupancy', () => {
        const map = new SortedArrayMap<number, number>(4);
        for (let k = 1; k <= 4; k++) map.put(k, k);
        expect(map.capacity).toBe(4);
        map.put(5, 5);
        expect(map.capacity).toBe(8);
        for (let k = 6; k <= 9; k++) map.put(k, k);
        expect(map.capacity).toBe(16);

        for (let k = 1; k <= 5; k++) map.delete(k);
        expect(map.capacity).toBe(8);
        expect([...map.keys()]).toEqual([6, 7, 8, 9]);

        map.delete(6);
        map.delete(7);
        expect(map.capacity).toBe(4);
        expect([...map.entries()].map(e => e.toTuple())).toEqual([[8, 8], [9, 9]]);

        map.delete(8);
        map.delete(9);
        expect(map.capacity).toBe(4);
        expect(map.isEmpty()).toBe(true);
    });

    it('rejects invalid capacities', () => {
        expect(() => new SortedArrayMap<number, number>(0)).toThrow('invalid capacity: 0');
        expect(() => new SortedArrayMap<number, number>(2.5)).toThrow(InvalidArgumentError);
    });

    it('clears back to the initial capacity', () => {
        const map = new SortedArrayMap<number, number>(2);
        for (let k = 0; k < 10; k++) map.put(k, k);
        map.clear();
        expect(map.size).toBe(0);
        expect(map.capacity).toBe(2);
        expect([...map.keys()]).toEqual([]);
    });

    it('stays sorted under a random mix of puts and deletes', () => {
        const map = new SortedArrayMap<number, number>(4);
        const reference = new Map<number, number>();
        randomOps(1500, 64, 7, (op, key, value) => {
            if (op === 'put') {
                expect(map.put(key, value)).toBe(!reference.has(key));
                reference.set(key, value);
            } else {
                expect(map.delete(key)).toBe(reference.delete(key));
            }
            const keys = [...map.keys()];
            for (let i = 1; i < keys.length; i++) expect(keys[i - 1]).toBeLessThan(keys[i]);
            expect(map.size).toBe(reference.size);
        });
        for (const [key, value] of reference) expect(map.get(key)).toBe(value);
    });

    // ========================================================================
    // COPIES AND FORMATTING
    // ========================================================================

    it('copies independently', () => {
        const map = letters();
        const copy = map.copy();
        copy.put(9, 'i');
        copy.delete(1);
        expect([...map.keys()]).toEqual([1, 2, 5, 8]);
        expect([...copy.keys()]).toEqual([2, 5, 8, 9]);
        expect(copy.equals(map)).toBe(false);
        expect(map.copy().equals(map)).toBe(true);
    });

    it('deep copies values through the copy function', () => {
        const map = new SortedArrayMap<number, number[]>();
        map.put(1, [1, 2]);
        const copy = map.deepcopy(k => k, v => [...v]);
        expect(copy.get(1)).toEqual([1, 2]);
        expect(copy.get(1)).not.toBe(map.get(1));
        expect(copy).toBeInstanceOf(SortedArrayMap);
    });

    it('rejects a key copy that returns null', () => {
        const map = new SortedArrayMap<number | null, string>();
        map.put(1, 'a');
        expect(() => map.deepcopy(() => null, v => v)).toThrow("'keyCopyFn' returned null");
    });

    it('renders as [size]{ k: v, ... }', () => {
        expect(letters().toString()).toBe('[4]{ 1: a, 2: b, 5: e, 8: h }');
        expect(new SortedArrayMap<number, string>().toString()).toBe('[0]{ }');
    });

    it('restarts every iteration of keys()', () => {
        const keys = letters().keys();
        expect([...keys]).toEqual([1, 2, 5, 8]);
        expect([...keys]).toEqual([1, 2, 5, 8]);
    });
});
