/**
 * @module map
 * @description
 * The associative-map contract every map in the library implements, and the
 * algorithms they share (equality, hashing, printing, deep copy).
 * The shared algorithms work on entry sequences only, so each map keeps its
 * own storage layout.
 */

import { Entry } from './entry';
import { InvalidArgumentError, UnorderedKeyTypeError } from './errors';
import { Structural, areEqual } from './hash';
import { Comparator } from './ordering';

// ============================================================================
// 1. CONTRACTS
// ============================================================================

/** A pure function returning a deep copy of its argument. */
export type CopyFn<T> = (original: T) => T;

/**
 * Associates keys with values. Keys are unique under structural equality
 * (or under the comparator, for ordered maps) and may not be null/undefined.
 *
 * @template K Key type.
 * @template V Value type.
 */
export interface MapLike<K, V> extends Structural, Iterable<Entry<K, V>> {
    /** Number of key-value pairs in the map. */
    readonly size: number;

    isEmpty(): boolean;

    /** Removes every entry and restores the initial capacity. */
    clear(): void;

    contains(key: K): boolean;

    /**
     * @throws KeyNotFoundError If `key` does not exist in the map.
     */
    get(key: K): V;

    /** Returns `fallback` instead of throwing when `key` does not exist. */
    get<F>(key: K, fallback: F): V | F;

    /**
     * Inserts the pair, or updates the value when `key` already exists.
     * @returns `true` if a new key was inserted, `false` if only the value changed.
     */
    put(key: K, value: V): boolean;

    /**
     * Removes `key` and its value. Deleting an absent key is not an error.
     * @returns `true` if the map shrank.
     */
    delete(key: K): boolean;

    /** Shallow copy: independent storage, shared keys and values. */
    copy(): MapLike<K, V>;

    /**
     * Copy whose keys and values are produced by the given copy functions.
     * @throws InvalidArgumentError If either copy function is missing.
     */
    deepcopy(keyCopyFn: CopyFn<K>, valueCopyFn: CopyFn<V>): MapLike<K, V>;

    /** Every call to `[Symbol.iterator]` starts a fresh, lazy walk. */
    keys(): Iterable<K>;
    values(): Iterable<V>;
    entries(): Iterable<Entry<K, V>>;

    toString(): string;
}

/**
 * A map whose keys are kept in ascending order, either natural or given by a
 * comparator fixed at construction. Iteration follows that order.
 */
export interface OrderedMapLike<K, V> extends MapLike<K, V> {
    /** The injected comparator, `undefined` when natural ordering is used. */
    readonly comparator: Comparator<K> | undefined;

    /** @throws UnderflowError If the map is empty. */
    min(): K;

    /** @throws UnderflowError If the map is empty. */
    max(): K;

    /** Greatest key less than or equal to `key`; `undefined` if there is none. */
    floor(key: K): K | undefined;

    /** Least key greater than or equal to `key`; `undefined` if there is none. */
    ceil(key: K): K | undefined;

    /** Number of keys strictly less than `key`. */
    rank(key: K): number;

    /** @throws IndexOutOfRangeError If `rank` is not in `[0, size)`. */
    select(rank: number): K;

    /** @throws UnderflowError If the map is empty. */
    deleteMin(): void;

    /** @throws UnderflowError If the map is empty. */
    deleteMax(): void;

    keys(): Iterable<K>;
    /** Keys from `ceil(low)` up to and including `floor(high)`. */
    keys(low: K, high: K): Iterable<K>;

    entries(): Iterable<Entry<K, V>>;
    /** Entries from `ceil(low)` up to and including `floor(high)`. */
    entries(low: K, high: K): Iterable<Entry<K, V>>;

    copy(): OrderedMapLike<K, V>;
    deepcopy(keyCopyFn: CopyFn<K>, valueCopyFn: CopyFn<V>): OrderedMapLike<K, V>;
}

export function isMapLike(v: unknown): v is MapLike<unknown, unknown> {
    return typeof v === 'object' && v !== null
        && 'size' in v && typeof v.size === 'number'
        && 'entries' in v && typeof v.entries === 'function'
        && 'get' in v && typeof v.get === 'function'
        && 'put' in v && typeof v.put === 'function';
}

export function isOrderedMapLike<K, V>(m: MapLike<K, V>): m is OrderedMapLike<K, V> {
    return 'select' in m && typeof m.select === 'function'
        && 'rank' in m && typeof m.rank === 'function';
}

// ============================================================================
// 2. SHARED ALGORITHMS
// ============================================================================

const MISSING: unique symbol = Symbol('missing');

/**
 * Symmetric structural equality: two maps are equal when they hold
 * structurally equal entries, whatever their implementation or comparator.
 * Each side must contain the other, so the answer does not depend on which
 * map's lookup rules run first.
 * @complexity O(n) lookups into each map.
 */
export function mapEquals(a: MapLike<unknown, unknown>, b: MapLike<unknown, unknown>): boolean {
    if (a === b) return true;
    if (a.size !== b.size) return false;
    return containsAll(a, b) && containsAll(b, a);
}

/**
 * True when every entry of `walked` is in `probed` under a structurally equal
 * key. An ordered map matches keys by its comparator, so the key it holds is
 * checked as well. A key `probed` cannot order counts as absent.
 */
function containsAll(walked: MapLike<unknown, unknown>, probed: MapLike<unknown, unknown>): boolean {
    try {
        for (const entry of walked.entries()) {
            if (isOrderedMapLike(probed) && !areEqual(probed.floor(entry.key), entry.key)) return false;
            const value = probed.get(entry.key, MISSING);
            if (value === MISSING || !areEqual(entry.value, value)) return false;
        }
    } catch (e) {
        if (e instanceof UnorderedKeyTypeError) return false;
        throw e;
    }
    return true;
}

/** Order-independent hash (XOR of entry hashes), consistent with {@link mapEquals}. */
export function mapHashCode(entries: Iterable<Entry<unknown, unknown>>): number {
    let h = 0;
    for (const entry of entries) h ^= entry.hashCode;
    return h;
}

/** Renders `[size]{ k1: v1, k2: v2 }`. */
export function mapToString(size: number, entries: Iterable<Entry<unknown, unknown>>): string {
    if (size === 0) return '[0]{ }';
    const parts: string[] = [];
    for (const entry of entries) parts.push(entry.toString());
    return `[${size}]{ ${parts.join(', ')} }`;
}

/**
 * Fills the empty map `target` with copies of `source`'s entries.
 * @throws InvalidArgumentError If either copy function is missing.
 */
export function deepcopyInto<K, V, M extends MapLike<K, V>>(
    source: Iterable<Entry<K, V>>,
    target: M,
    keyCopyFn: CopyFn<K>,
    valueCopyFn: CopyFn<V>
): M {
    requireCopyFns(keyCopyFn, valueCopyFn);
    for (const entry of source) {
        const key = keyCopyFn(entry.key);
        if (key === null || key === undefined) throw new InvalidArgumentError(`'keyCopyFn' returned ${key}`);
        target.put(key, valueCopyFn(entry.value));
    }
    return target;
}

export function requireCopyFns(keyCopyFn: unknown, valueCopyFn: unknown): void {
    if (typeof keyCopyFn !== 'function') throw InvalidArgumentError.nullParam('keyCopyFn');
    if (typeof valueCopyFn !== 'function') throw InvalidArgumentError.nullParam('valueCopyFn');
}

/** @throws InvalidArgumentError Unless `capacity` is a positive integer. */
export function requireCapacity(capacity: number): void {
    if (!Number.isInteger(capacity) || capacity <= 0) {
        throw new InvalidArgumentError(`invalid capacity: ${capacity}`);
    }
}

/** Wraps a walk so that every iteration of the result starts over. */
export function restartable<T>(walk: () => Iterator<T>): Iterable<T> {
    return { [Symbol.iterator]: walk };
}
