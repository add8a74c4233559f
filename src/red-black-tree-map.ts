/**
 * @module red-black-tree-map
 * @description
 * Ordered map over `functional-red-black-tree`. The tree stores one
 * {@link Entry} per key; updates swap in a new entry at the same position.
 */

import createRBTree from 'functional-red-black-tree';

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
    restartable,
} from './map';
import { Comparator, assertNaturallyOrdered, resolveComparator } from './ordering';

type EntryTree<K, V> = ReturnType<typeof createRBTree<K, Entry<K, V>>>;

/**
 * Ordered map over a persistent red-black tree.
 * Every mutation swaps in a new root, so iteration walks an immutable snapshot
 * and `copy()` shares the tree instead of duplicating it.
 *
 * Same key policy as {@link SortedArrayMap}: natural order unless a comparator
 * is given, null/undefined keys rejected.
 *
 * @complexity O(log n) for every keyed operation, including `rank` and `select`.
 * @template K Key type.
 * @template V Value type.
 */
export class RedBlackTreeMap<K, V> implements OrderedMapLike<K, V> {
    private readonly _comparator: Comparator<K> | undefined;
    private readonly _compare: Comparator<K>;
    private _tree: EntryTree<K, V>;

    constructor(comparator?: Comparator<K>) {
        this._comparator = comparator;
        this._compare = resolveComparator(comparator);
        this._tree = this.emptyTree();
    }

    get size(): number { return this._tree.length; }
    get comparator(): Comparator<K> | undefined { return this._comparator; }
    isEmpty(): boolean { return this._tree.length === 0; }

    clear(): void {
        this._tree = this.emptyTree();
    }

    contains(key: K): boolean {
        this.checkKey(key);
        return this._tree.find(key).valid;
    }

    get(key: K): V;
    get<F>(key: K, fallback: F): V | F;
    get(key: K, ...fallback: [] | [unknown]): unknown {
        this.checkKey(key);
        const entry = this._tree.get(key);
        if (entry !== undefined) return entry.value;
        if (fallback.length === 1) return fallback[0];
        throw new KeyNotFoundError(key);
    }

    put(key: K, value: V): boolean {
        this.checkKey(key);
        const it = this._tree.find(key);
        const current = it.value;
        if (current !== undefined) {
            this._tree = it.update(new Entry(current.key, value));
            return false;
        }
        this._tree = this._tree.insert(key, new Entry(key, value));
        return true;
    }

    delete(key: K): boolean {
        this.checkKey(key);
        const it = this._tree.find(key);
        if (!it.valid) return false;
        this._tree = it.remove();
        return true;
    }

    min(): K {
        const entry = this._tree.begin.value;
        if (entry === undefined) throw new UnderflowError('find minimum');
        return entry.key;
    }

    max(): K {
        const entry = this._tree.end.value;
        if (entry === undefined) throw new UnderflowError('find maximum');
        return entry.key;
    }

    floor(key: K): K | undefined {
        this.checkKey(key);
        return this._tree.le(key).value?.key;
    }

    ceil(key: K): K | undefined {
        this.checkKey(key);
        return this._tree.ge(key).value?.key;
    }

    rank(key: K): number {
        this.checkKey(key);
        const it = this._tree.ge(key);
        return it.valid ? it.index : this._tree.length;
    }

    select(rank: number): K {
        const length = this._tree.length;
        if (!Number.isInteger(rank) || rank < 0 || rank >= length) throw new IndexOutOfRangeError(rank, length);
        const entry = this._tree.at(rank).value;
        if (entry === undefined) throw new IndexOutOfRangeError(rank, length);
        return entry.key;
    }

    deleteMin(): void {
        const it = this._tree.begin;
        if (!it.valid) throw new UnderflowError('delete minimum');
        this._tree = it.remove();
    }

    deleteMax(): void {
        const it = this._tree.end;
        if (!it.valid) throw new UnderflowError('delete maximum');
        this._tree = it.remove();
    }

    copy(): RedBlackTreeMap<K, V> {
        const cp = new RedBlackTreeMap<K, V>(this._comparator);
        cp._tree = this._tree;
        return cp;
    }

    deepcopy(keyCopyFn: CopyFn<K>, valueCopyFn: CopyFn<V>): RedBlackTreeMap<K, V> {
        return deepcopyInto(this, new RedBlackTreeMap<K, V>(this._comparator), keyCopyFn, valueCopyFn);
    }

    keys(): Iterable<K>;
    keys(low: K, high: K): Iterable<K>;
    keys(...range: [] | [K, K]): Iterable<K> {
        const bounds = this.checkRange(range);
        return restartable(() => this.walk(bounds, entry => entry.key));
    }

    values(): Iterable<V> {
        return restartable(() => this.walk(undefined, entry => entry.value));
    }

    entries(): Iterable<Entry<K, V>>;
    entries(low: K, high: K): Iterable<Entry<K, V>>;
    entries(...range: [] | [K, K]): Iterable<Entry<K, V>> {
        const bounds = this.checkRange(range);
        return restartable(() => this.walk(bounds, entry => entry));
    }

    [Symbol.iterator](): Iterator<Entry<K, V>> {
        return this.walk(undefined, entry => entry);
    }

    get hashCode(): number { return mapHashCode(this); }
    equals(other: unknown): boolean { return isMapLike(other) && mapEquals(this, other); }
    toString(): string { return mapToString(this.size, this); }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }

    private emptyTree(): EntryTree<K, V> {
        return createRBTree<K, Entry<K, V>>((a, b) => this._compare(a, b));
    }

    private checkKey(key: K): void {
        requireNonNull(key, 'key');
        if (this._comparator === undefined) assertNaturallyOrdered(key);
    }

    private checkRange(range: [] | [K, K]): [K, K] | undefined {
        if (range.length === 0) return undefined;
        requireNonNull(range[0], 'low');
        requireNonNull(range[1], 'high');
        this.checkKey(range[0]);
        this.checkKey(range[1]);
        return range;
    }

    /** Walks the current snapshot from `ceil(low)` while keys stay `<= high`. */
    private *walk<R>(bounds: [K, K] | undefined, project: (entry: Entry<K, V>) => R): Generator<R> {
        const tree = this._tree;
        const it = bounds === undefined ? tree.begin : tree.ge(bounds[0]);
        for (; it.valid; it.next()) {
            const entry = it.value;
            if (entry === undefined) return;
            if (bounds !== undefined && this._compare(entry.key, bounds[1]) > 0) return;
            yield project(entry);
        }
    }
}
