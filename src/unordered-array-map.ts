/**
 * @module unordered-array-map
 * @description
 * Linear-scan map, also the bucket type of {@link ChainingHashMap}.
 */

import { Entry } from './entry';
import { KeyNotFoundError, requireNonNull } from './errors';
import { areEqual } from './hash';
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

const INIT_CAPACITY = 4;

/**
 * A small map over two parallel arrays, searched linearly.
 * Keys keep their insertion order. Meant for a handful of entries, such as
 * the colliding keys of one hash bucket.
 *
 * Growth doubles the arrays when full; they halve once occupancy drops to a
 * quarter, never below the initial capacity.
 *
 * @template K Key type (compared structurally).
 * @template V Value type.
 */
export class UnorderedArrayMap<K, V> implements MapLike<K, V> {
    private readonly _initialCapacity: number;
    private _keys: K[];
    private _values: V[];
    private _length = 0;

    constructor(capacity: number = INIT_CAPACITY) {
        requireCapacity(capacity);
        this._initialCapacity = capacity;
        this._keys = new Array<K>(capacity);
        this._values = new Array<V>(capacity);
    }

    get size(): number { return this._length; }
    get capacity(): number { return this._keys.length; }
    isEmpty(): boolean { return this._length === 0; }

    clear(): void {
        this._keys = new Array<K>(this._initialCapacity);
        this._values = new Array<V>(this._initialCapacity);
        this._length = 0;
    }

    /** @complexity O(n) */
    contains(key: K): boolean {
        requireNonNull(key, 'key');
        return this.indexOf(key) >= 0;
    }

    get(key: K): V;
    get<F>(key: K, fallback: F): V | F;
    get(key: K, ...fallback: [] | [unknown]): unknown {
        requireNonNull(key, 'key');
        const i = this.indexOf(key);
        if (i >= 0) return this._values[i];
        if (fallback.length === 1) return fallback[0];
        throw new KeyNotFoundError(key);
    }

    /** @complexity O(n) */
    put(key: K, value: V): boolean {
        requireNonNull(key, 'key');
        const i = this.indexOf(key);
        if (i >= 0) {
            this._values[i] = value;
            return false;
        }

        if (this._length === this._keys.length) this.resize(this._keys.length * 2);
        this._keys[this._length] = key;
        this._values[this._length++] = value;
        return true;
    }

    /** @complexity O(n) */
    delete(key: K): boolean {
        requireNonNull(key, 'key');
        const i = this.indexOf(key);
        if (i < 0) return false;

        for (let j = i + 1; j < this._length; j++) {
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
        return true;
    }

    copy(): UnorderedArrayMap<K, V> {
        const cp = new UnorderedArrayMap<K, V>(this._initialCapacity);
        cp._keys = this._keys.slice();
        cp._values = this._values.slice();
        cp._length = this._length;
        return cp;
    }

    deepcopy(keyCopyFn: CopyFn<K>, valueCopyFn: CopyFn<V>): UnorderedArrayMap<K, V> {
        return deepcopyInto(this, new UnorderedArrayMap<K, V>(this._initialCapacity), keyCopyFn, valueCopyFn);
    }

    keys(): Iterable<K> { return restartable(() => this.walk(i => this._keys[i])); }
    values(): Iterable<V> { return restartable(() => this.walk(i => this._values[i])); }
    entries(): Iterable<Entry<K, V>> {
        return restartable(() => this.walk(i => new Entry(this._keys[i], this._values[i])));
    }

    [Symbol.iterator](): Iterator<Entry<K, V>> { return this.walk(i => new Entry(this._keys[i], this._values[i])); }

    get hashCode(): number { return mapHashCode(this); }
    equals(other: unknown): boolean { return isMapLike(other) && mapEquals(this, other); }
    toString(): string { return mapToString(this._length, this); }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }

    private indexOf(key: K): number {
        for (let i = 0; i < this._length; i++) {
            if (areEqual(this._keys[i], key)) return i;
        }
        return -1;
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

    private *walk<R>(project: (index: number) => R): Generator<R> {
        for (let i = 0; i < this._length; i++) yield project(i);
    }
}
