/**
 * @module ordering
 * @description
 * Key ordering for the ordered maps: the natural order of a key kind, or an
 * injected comparator, plus the binary search both array and tree maps rely on.
 */

import { UnorderedKeyTypeError } from './errors';

// ============================================================================
// 1. TYPE DEFINITIONS
// ============================================================================

/** Negative if a < b, positive if a > b, 0 if equal. */
export type Comparator<K> = (a: K, b: K) => number;

/** Objects that define their own total order. */
export interface Comparable<T> {
    compareTo(other: T): number;
}

/**
 * Outcome of a binary search. When the key is absent, `insertionPoint` is the
 * index at which it would have to be inserted to keep the range sorted
 * (0 to length inclusive).
 */
export type SearchResult =
    | { readonly found: true; readonly index: number }
    | { readonly found: false; readonly insertionPoint: number };

// ============================================================================
// 2. NATURAL ORDER
// ============================================================================

function isComparable(v: unknown): v is Comparable<unknown> {
    return typeof v === 'object' && v !== null
        && 'compareTo' in v && typeof v.compareTo === 'function';
}

/**
 * Natural ordering of keys.
 * Supported kinds, each only against itself:
 * numbers, strings, bigints, booleans, Dates and {@link Comparable} objects.
 * @throws UnorderedKeyTypeError for any other pairing.
 */
export function naturalOrder(a: unknown, b: unknown): number {
    if (typeof a === 'number' && typeof b === 'number') {
        // NaN sorts above everything, and equals itself
        if (a !== a) return b !== b ? 0 : 1;
        if (b !== b) return -1;
        return a < b ? -1 : (a > b ? 1 : 0);
    }
    if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : (a > b ? 1 : 0);
    if (typeof a === 'bigint' && typeof b === 'bigint') return a < b ? -1 : (a > b ? 1 : 0);
    if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
    if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
    if (isComparable(a) && isComparable(b)) return a.compareTo(b);

    throw new UnorderedKeyTypeError(a, b);
}

/**
 * Rejects a key `naturalOrder` could never order, even against its own kind.
 * Lets an empty map fail on its first key instead of its second.
 * @throws UnorderedKeyTypeError
 */
export function assertNaturallyOrdered(key: unknown): void {
    const t = typeof key;
    if (t === 'number' || t === 'string' || t === 'bigint' || t === 'boolean') return;
    if (key instanceof Date || isComparable(key)) return;
    throw new UnorderedKeyTypeError(key);
}

/**
 * Picks the comparator an ordered map will use for its whole lifetime.
 * Without an explicit comparator the natural order applies; its failure on
 * unorderable keys surfaces lazily, at the first comparison.
 */
export function resolveComparator<K>(comparator?: Comparator<K>): Comparator<K> {
    return comparator ?? naturalOrder;
}

// ============================================================================
// 3. BINARY SEARCH
// ============================================================================

/**
 * Searches `keys[0..length)`, which must be sorted by `compare`.
 * @complexity O(log n)
 */
export function binarySearch<K>(
    keys: ReadonlyArray<K>,
    length: number,
    key: K,
    compare: Comparator<K>
): SearchResult {
    let lo = 0;
    let hi = length - 1;
    while (lo <= hi) {
        const mid = (lo + hi) >>> 1;
        const cmp = compare(keys[mid], key);
        if (cmp < 0) lo = mid + 1;
        else if (cmp > 0) hi = mid - 1;
        else return { found: true, index: mid };
    }
    return { found: false, insertionPoint: lo };
}
