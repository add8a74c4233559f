/**
 * @module chaining-hash-map
 * @description
 * Hash table with separate chaining. Each slot of the bucket array is either
 * empty or a small {@link UnorderedArrayMap} holding the colliding entries.
 *
 * Invariants:
 * - Every key lives in bucket `hash(key) mod capacity`.
 * - No bucket is ever left empty; it is dropped instead.
 * - `size` is the sum of the bucket sizes.
 *
 * Resizing (a full rehash into a new bucket array) is decided before hashing:
 * `put` doubles when `size == capacity`, `delete` halves when
 * `size == capacity / 4` (never below the initial capacity).
 * All costs below assume uniform hashing.
 */

import { Entry } from './entry';
import { KeyNotFoundError, requireNonNull } from './errors';
import { hashValue } from './hash';
import {
    CopyFn,
    MapLike,
    deepcopyInto,
    isMapLike,
    mapEquals,
    mapHashCode,
    mapToString,
    requireCapacity,
    restartable,
} from './map';
import { UnorderedArrayMap } from './unordered-array-map';

const INIT_CAPACITY = 4;
const BUCKET_CAPACITY = 2;

type Bucket<K, V> = UnorderedArrayMap<K, V> | undefined;

/**
 * Hash map whose colliding keys share an {@link UnorderedArrayMap} bucket.
 *
 * @template K Key type (hashed and compared structurally).
 * @template V Value type.
 */
export class ChainingHashMap<K, V> implements MapLike<K, V> {
    private readonly _initialCapacity: number;
    private _buckets: Bucket<K, V>[];
    private _length = 0;

    /**
     * @param capacity Initial number of buckets (default 4).
     * @throws InvalidArgumentError If `capacity` is not a positive integer.
     */
    constructor(capacity: number = INIT_CAPACITY) {
        requireCapacity(capacity);
        this._initialCapacity = capacity;
        this._buckets = emptyBuckets(capacity);
    }

    get size(): number { return this._length; }
    /** Number of buckets. */
    get capacity(): number { return this._buckets.length; }
    isEmpty(): boolean { return this._length === 0; }

    clear(): void {
        this._buckets = emptyBuckets(this._initialCapacity);
        this._length = 0;
    }

    contains(key: K): boolean {
        requireNonNull(key, 'key');
        const bucket = this._buckets[this.hash(key)];
        return bucket !== undefined && bucket.contains(key);
    }

    get(key: K): V;
    get<F>(key: K, fallback: F): V | F;
    get(key: K, ...fallback: [] | [unknown]): unknown {
        requireNonNull(key, 'key');
        const bucket = this._buckets[this.hash(key)];
        if (bucket !== undefined) {
            return fallback.length === 1 ? bucket.get(key, fallback[0]) : bucket.get(key);
        }
        if (fallback.length === 1) return fallback[0];
        throw new KeyNotFoundError(key);
    }

    /** @complexity Amortized O(1). */
    put(key: K, value: V): boolean {
        requireNonNull(key, 'key');
        if (this._length === this._buckets.length) this.rehash(this._buckets.length * 2);

        const h = this.hash(key);
        let bucket = this._buckets[h];
        if (bucket === undefined) {
            bucket = new UnorderedArrayMap<K, V>(BUCKET_CAPACITY);
            this._buckets[h] = bucket;
        }

        const inserted = bucket.put(key, value);
        if (inserted) this._length++;
        return inserted;
    }

    /** @complexity Amortized O(1). */
    delete(key: K): boolean {
        requireNonNull(key, 'key');
        const capacity = this._buckets.length;
        if (this._length === Math.floor(capacity / 4) && capacity > this._initialCapacity) {
            this.rehash(Math.max(this._initialCapacity, Math.floor(capacity / 2)));
        }

        const h = this.hash(key);
        const bucket = this._buckets[h];
        if (bucket === undefined) return false;

        const deleted = bucket.delete(key);
        if (deleted) {
            if (bucket.isEmpty()) this._buckets[h] = undefined;
            this._length--;
        }
        return deleted;
    }

    copy(): ChainingHashMap<K, V> {
        const cp = new ChainingHashMap<K, V>(this._initialCapacity);
        cp._buckets = this._buckets.map(bucket => bucket?.copy());
        cp._length = this._length;
        return cp;
    }

    /** Keys may hash differently once copied, so every entry is re-inserted. */
    deepcopy(keyCopyFn: CopyFn<K>, valueCopyFn: CopyFn<V>): ChainingHashMap<K, V> {
        return deepcopyInto(this, new ChainingHashMap<K, V>(this._initialCapacity), keyCopyFn, valueCopyFn);
    }

    // Iteration: buckets in index order, each bucket in its own (insertion) order.

    keys(): Iterable<K> { return restartable(() => this.walk(bucket => bucket.keys())); }
    values(): Iterable<V> { return restartable(() => this.walk(bucket => bucket.values())); }
    entries(): Iterable<Entry<K, V>> { return restartable(() => this.walk(bucket => bucket.entries())); }

    [Symbol.iterator](): Iterator<Entry<K, V>> { return this.walk(bucket => bucket.entries()); }

    get hashCode(): number { return mapHashCode(this); }
    equals(other: unknown): boolean { return isMapLike(other) && mapEquals(this, other); }
    toString(): string { return mapToString(this._length, this); }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }

    /** Structural hash, masked non-negative, reduced to a bucket index. */
    private hash(key: K): number {
        return (hashValue(key) & 0x7fffffff) % this._buckets.length;
    }

    /**
     * Re-inserts every entry into a fresh bucket array of `capacity` buckets,
     * then swaps it in with a single assignment.
     * @complexity O(n)
     */
    private rehash(capacity: number): void {
        const resized = new ChainingHashMap<K, V>(capacity);
        for (const entry of this.entries()) resized.put(entry.key, entry.value);
        this._buckets = resized._buckets;
    }

    private *walk<R>(project: (bucket: UnorderedArrayMap<K, V>) => Iterable<R>): Generator<R> {
        for (const bucket of this._buckets) {
            if (bucket !== undefined) yield* project(bucket);
        }
    }
}

function emptyBuckets<K, V>(capacity: number): Bucket<K, V>[] {
    return new Array<Bucket<K, V>>(capacity).fill(undefined);
}
