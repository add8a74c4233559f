/**
 * @module sorted-array-map
 * @description
 * Ordered symbol table over two parallel arrays (keys, values) kept sorted by
 * key. Lookups are binary searches; inserts and deletes shift the tail.
 *
 * Invariants:
 * - `keys[i] < keys[i + 1]` under the active comparator for all `i < size - 1`.
 * - `size <= capacity`. The arrays double when full and halve when occupancy
 *   drops to a quarter (never below the initial capacity).
 * - The rank of a key is its index.
 */

import { Entry } from './entry';
import {
    IndexOutOfRangeError,
    KeyNotFoundError,
    UnderflowError,
    requireNonNull,
} from './errors';
import {
    CopyFn,
    OrderedMapLike,
    deepcopyInto,
    isMapLike,
    mapEquals,
    mapHashCode,
    mapToString,
    requireCapacity,
    restartable,
} from './map';
import {
    Comparator,
    SearchResult,
    assertNaturallyOrdered,
    binarySearch,
    resolveComparator,
} from './ordering';

const INIT_CAPACITY = 4;

/**
 * A Map that keeps its keys sorted in arrays.
 *
 * Keys must have a natural order (numbers, strings, bigints, booleans, Dates,
 * or objects with `compareTo`), or a comparator must be supplied. Otherwise
 * order-dependent operations throw `UnorderedKeyTypeError`.
 *
 * @template K Key type. Never null/undefined.
 * @template V Value type.
 */
export class SortedArrayMap<K, V> implements OrderedMapLike<K, V> {
    private readonly _comparator: Comparator<K> | undefined;
    private readonly _compare: Comparator<K>;
    private readonly _initialCapacity: number;
    private _keys: K[];
    private _values: V[];
    private _length = 0;

    /**
     * @param comparator Orders the keys; natural ordering when omitted.
     */
    constructor(comparator?: Comparator<K>);
    /**
     * @param capacity   Initial capacity of the backing arrays (default 4).
     * @param comparator Orders the keys; natural ordering when omitted.
     * @throws InvalidArgumentError If `capacity` is not a positive integer.
     */
    constructor(capacity: number, comparator?: Comparator<K>);
    constructor(capacityOrComparator: number | Comparator<K> = INIT_CAPACITY, comparator?: Comparator<K>) {
        const capacity = typeof capacityOrComparator === 'number' ? capacityOrComparator : INIT_CAPACITY;
        requireCapacity(capacity);

        this._comparator = typeof capacityOrComparator === 'function' ? capacityOrComparator : comparator;
        this._compare = resolveComparator(this._comparator);
        this._initialCapacity = capacity;
        this._keys = new Array<K>(capacity);
        this._values = new Array<V>(capacity);
    }

    // ========================================================================
    // BASIC OPERATIONS
    // ========================================================================

    get size(): number { return this._length; }
    get capacity(): number { return this._keys.length; }
    get comparator(): Comparator<K> | undefined { return this._comparator; }
    isEmpty(): boolean { return this._length === 0; }

    clear(): void {
        this._keys = new Array<K>(this._initialCapacity);
        this._values = new Array<V>(this._initialCapacity);
        this._length = 0;
    }

    /** @complexity O(log n) */
    contains(key: K): boolean {
        return this.search(key).found;
    }

    // ========================================================================
    // MAP OPERATIONS
    // ========================================================================

    /** @complexity O(log n) */
    get(key: K): V;
    get<F>(key: K, fallback: F): V | F;
    get(key: K, ...fallback: [] | [unknown]): unknown {
        const result = this.search(key);
        if (result.found) return this._values[result.index];
        if (fallback.length === 1) return fallback[0];
        throw new KeyNotFoundError(key);
    }

    /**
     * Updates in place when the key exists (O(log n)); otherwise inserts at the
     * insertion point, shifting every greater key one slot right (O(n)).
     */
    put(key: K, value: V): boolean {
        const result = this.search(key);
        if (result.found) {
            this._values[result.index] = value;
            return false;
        }

        if (this._length === this._keys.length) this.resize(this._keys.length * 2);

        const i = result.insertionPoint;
        for (let j = this._length; j > i; j--) {
            this._keys[j] = this._keys[j - 1];
            this._values[j] = this._values[j - 1];
        }
        this._keys[i] = key;
        this._values[i] = value;
        this._length++;
        return true;
    }

    /** @complexity O(n) */
    delete(key: K): boolean {
        const result = this.search(key);
        if (!result.found) return false;
        this.removeAt(result.index);
        return true;
    }

    // ========================================================================
    // ORDERED OPERATIONS
    // ========================================================================

    min(): K {
        if (this._length === 0) throw new UnderflowError('find minimum');
        return this._keys[0];
    }

    max(): K {
        if (this._length === 0) throw new UnderflowError('find maximum');
        return this._keys[this._length - 1];
    }

    floor(key: K): K | undefined {
        const i = this.floorIndex(key);
        return i === undefined ? undefined : this._keys[i];
    }

    ceil(key: K): K | undefined {
        const i = this.ceilIndex(key);
        return i === undefined ? undefined : this._keys[i];
    }

    rank(key: K): number {
        const result = this.search(key);
        return result.found ? result.index : result.insertionPoint;
    }

    select(rank: number): K {
        if (!Number.isInteger(rank) || rank < 0 || rank >= this._length) {
            throw new IndexOutOfRangeError(rank, this._length);
        }
        return this._keys[rank];
    }

    deleteMin(): void {
        if (this._length === 0) throw new UnderflowError('delete minimum');
        this.removeAt(0);
    }

    deleteMax(): void {
        if (this._length === 0) throw new UnderflowError('delete maximum');
        this.removeAt(this._length - 1);
    }

    // ========================================================================
    // DUPLICATION
    // ========================================================================

    copy(): SortedArrayMap<K, V> {
        const cp = new SortedArrayMap<K, V>(this._initialCapacity, this._comparator);
        cp._keys = this._keys.slice();
        cp._values = this._values.slice();
        cp._length = this._length;
        return cp;
    }

    deepcopy(keyCopyFn: CopyFn<K>, valueCopyFn: CopyFn<V>): SortedArrayMap<K, V> {
        const cp = new SortedArrayMap<K, V>(this._initialCapacity, this._comparator);
        return deepcopyInto(this, cp, keyCopyFn, valueCopyFn);
    }

    // ========================================================================
    // ITERATION (ascending key order)
    // ========================================================================

    keys(): Iterable<K>;
    keys(low: K, high: K): Iterable<K>;
    keys(...range: [] | [K, K]): Iterable<K> {
        const bounds = this.checkRange(range);
        return restartable(() => this.walk(bounds, i => this._keys[i]));
    }

    values(): Iterable<V> {
        return restartable(() => this.walk(undefined, i => this._values[i]));
    }

    entries(): Iterable<Entry<K, V>>;
    entries(low: K, high: K): Iterable<Entry<K, V>>;
    entries(...range: [] | [K, K]): Iterable<Entry<K, V>> {
        const bounds = this.checkRange(range);
        return restartable(() => this.walk(bounds, i => new Entry(this._keys[i], this._values[i])));
    }

    [Symbol.iterator](): Iterator<Entry<K, V>> {
        return this.walk(undefined, i => new Entry(this._keys[i], this._values[i]));
    }

    get hashCode(): number { return mapHashCode(this); }
    equals(other: unknown): boolean { return isMapLike(other) && mapEquals(this, other); }
    toString(): string { return mapToString(this._length, this); }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }

    // ========================================================================
    // HELPERS
    // ========================================================================

    /**
     * Binary search over `keys[0..size)`.
     * @throws InvalidArgumentError If `key` is null/undefined.
     * @throws UnorderedKeyTypeError If the key cannot be ordered.
     */
    private search(key: K): SearchResult {
        requireNonNull(key, 'key');
        if (this._comparator === undefined) assertNaturallyOrdered(key);
        return binarySearch(this._keys, this._length, key, this._compare);
    }

    private floorIndex(key: K): number | undefined {
        const result = this.search(key);
        if (result.found) return result.index;
        return result.insertionPoint === 0 ? undefined : result.insertionPoint - 1;
    }

    private ceilIndex(key: K): number | undefined {
        const result = this.search(key);
        if (result.found) return result.index;
        return result.insertionPoint === this._length ? undefined : result.insertionPoint;
    }

    /** Shifts everything after `index` one slot left, then shrinks if sparse. */
    private removeAt(index: number): void {
        for (let j = index + 1; j < this._length; j++) {
            this._keys[j - 1] = this._keys[j];
            this._values[j - 1] = this._values[j];
        }
        this._length--;
        delete this._keys[this._length];
        delete this._values[this._length];

        const capacity = this._keys.length;
        if (this._length === Math.floor(capacity / 4) && capacity > this._initialCapacity) {
            this.resize(Math.max(this._initialCapacity, Math.floor(capacity / 2)));
        }
    }

    private resize(capacity: number): void {
        const keys = new Array<K>(capacity);
        const values = new Array<V>(capacity);
        for (let i = 0; i < this._length; i++) {
            keys[i] = this._keys[i];
            values[i] = this._values[i];
        }
        this._keys = keys;
        this._values = values;
    }

    /** Validates a `(low, high)` range eagerly, so misuse fails at the call. */
    private checkRange(range: [] | [K, K]): [K, K] | undefined {
        if (range.length === 0) return undefined;
        requireNonNull(range[0], 'low');
        requireNonNull(range[1], 'high');
        if (this._comparator === undefined) {
            assertNaturallyOrdered(range[0]);
            assertNaturallyOrdered(range[1]);
        }
        return range;
    }

    /** Walks `ceil(low)..floor(high)` inclusive, or everything without bounds. */
    private *walk<R>(bounds: [K, K] | undefined, project: (index: number) => R): Generator<R> {
        let from = 0;
        let to = this._length - 1;
        if (bounds !== undefined) {
            from = this.ceilIndex(bounds[0]) ?? this._length;
            to = this.floorIndex(bounds[1]) ?? -1;
        }
        for (let i = from; i <= to; i++) yield project(i);
    }
}
