/**
 * @module probing-hash-map
 * @description
 * Hash table with open addressing and linear probing.
 *
 * Architecture:
 * - Table: one array of slots. A slot is empty, a live node, or a tombstone.
 * - Probing: from `hash(key)` forward, wrapping at the end of the table.
 * - Deletion: a deleted slot becomes a tombstone when the next slot is
 *   occupied, so probe chains running through it stay intact. When the next
 *   slot is empty no chain can depend on it and the slot is simply cleared.
 * - Tombstones are revived by later inserts, and a rehash discards them all.
 *
 * Resizing is decided before probing: `put` doubles once
 * `size >= loadFactor * capacity`; `delete` halves once
 * `size <= capacity / 4` (never below the initial capacity).
 */

import { Entry } from './entry';
import {
    InvalidArgumentError,
    InvariantViolationError,
    KeyNotFoundError,
    requireNonNull,
} from './errors';
import { areEqual, hashValue } from './hash';
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
const LOAD_FACTOR = 0.7;
const SHRINK_LOAD = 0.25;

// ============================================================================
// 1. SLOTS
// ============================================================================

/** Marks a slot whose entry was deleted while a probe chain ran through it. */
const TOMBSTONE: unique symbol = Symbol('tombstone');

interface ProbeNode<K, V> {
    readonly key: K;
    value: V;
}

type Slot<K, V> = ProbeNode<K, V> | typeof TOMBSTONE | undefined;

/** Outcome of probing for an insert: the live node holding the key, or where to put it. */
type InsertProbe<K, V> =
    | { readonly exists: true; readonly node: ProbeNode<K, V> }
    | { readonly exists: false; readonly index: number };

function isLive<K, V>(slot: Slot<K, V>): slot is ProbeNode<K, V> {
    return slot !== undefined && slot !== TOMBSTONE;
}

// ============================================================================
// 2. PROBING HASH MAP
// ============================================================================

/**
 * @template K Key type (hashed and compared structurally).
 * @template V Value type.
 */
export class ProbingHashMap<K, V> implements MapLike<K, V> {
    private readonly _initialCapacity: number;
    private readonly _loadFactor: number;
    private _table: Slot<K, V>[];
    private _length = 0;

    /**
     * @param capacity   Initial number of slots (default 4).
     * @param loadFactor Occupancy that triggers growth, in `(0.25, 1]` (default 0.7).
     * @throws InvalidArgumentError On a non-positive capacity or out-of-range load factor.
     */
    constructor(capacity: number = INIT_CAPACITY, loadFactor: number = LOAD_FACTOR) {
        requireCapacity(capacity);
        if (!(loadFactor > SHRINK_LOAD && loadFactor <= 1)) {
            throw new InvalidArgumentError(`'loadFactor' is not in range (0.25, 1]: ${loadFactor}`);
        }

        this._initialCapacity = capacity;
        this._loadFactor = loadFactor;
        this._table = emptyTable(capacity);
    }

    get size(): number { return this._length; }
    /** Number of slots in the table. */
    get capacity(): number { return this._table.length; }
    get loadFactor(): number { return this._loadFactor; }
    isEmpty(): boolean { return this._length === 0; }

    clear(): void {
        this._table = emptyTable(this._initialCapacity);
        this._length = 0;
    }

    contains(key: K): boolean {
        requireNonNull(key, 'key');
        return this.probeToFind(this.hash(key), key) !== undefined;
    }

    get(key: K): V;
    get<F>(key: K, fallback: F): V | F;
    get(key: K, ...fallback: [] | [unknown]): unknown {
        requireNonNull(key, 'key');
        const node = this.probeToFind(this.hash(key), key);
        if (node !== undefined) return node.value;
        if (fallback.length === 1) return fallback[0];
        throw new KeyNotFoundError(key);
    }

    /** @complexity Amortized O(1). */
    put(key: K, value: V): boolean {
        requireNonNull(key, 'key');
        if (this._length >= this._loadFactor * this._table.length) this.rehash(this._table.length * 2);

        const probe = this.probeToInsert(this.hash(key), key);
        if (probe.exists) {
            probe.node.value = value;
            return false;
        }

        // Either a fresh node in an empty slot, or a revived tombstone
        this._table[probe.index] = { key, value };
        this._length++;
        return true;
    }

    /** @complexity Amortized O(1). */
    delete(key: K): boolean {
        requireNonNull(key, 'key');
        const capacity = this._table.length;
        if (this._length <= SHRINK_LOAD * capacity && capacity > this._initialCapacity) {
            this.rehash(Math.max(this._initialCapacity, Math.floor(capacity / 2)));
        }

        const index = this.probeToFindIndex(this.hash(key), key);
        if (index === undefined) return false;

        this._table[index] = this._table[this.nextIndex(index)] === undefined ? undefined : TOMBSTONE;
        this._length--;
        return true;
    }

    /** Snapshot of the table as is, tombstones included. */
    copy(): ProbingHashMap<K, V> {
        const cp = new ProbingHashMap<K, V>(this._initialCapacity, this._loadFactor);
        cp._table = this._table.map(slot => isLive(slot) ? { key: slot.key, value: slot.value } : slot);
        cp._length = this._length;
        return cp;
    }

    deepcopy(keyCopyFn: CopyFn<K>, valueCopyFn: CopyFn<V>): ProbingHashMap<K, V> {
        const cp = new ProbingHashMap<K, V>(this._initialCapacity, this._loadFactor);
        return deepcopyInto(this, cp, keyCopyFn, valueCopyFn);
    }

    // Iteration: slot order, skipping empty slots and tombstones.

    keys(): Iterable<K> { return restartable(() => this.walk(node => node.key)); }
    values(): Iterable<V> { return restartable(() => this.walk(node => node.value)); }
    entries(): Iterable<Entry<K, V>> {
        return restartable(() => this.walk(node => new Entry(node.key, node.value)));
    }

    [Symbol.iterator](): Iterator<Entry<K, V>> { return this.walk(node => new Entry(node.key, node.value)); }

    get hashCode(): number { return mapHashCode(this); }
    equals(other: unknown): boolean { return isMapLike(other) && mapEquals(this, other); }
    toString(): string { return mapToString(this._length, this); }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }

    // ========================================================================
    // HELPERS
    // ========================================================================

    private hash(key: K): number {
        return (hashValue(key) & 0x7fffffff) % this._table.length;
    }

    private nextIndex(index: number): number {
        return index === this._table.length - 1 ? 0 : index + 1;
    }

    private probeToFind(start: number, key: K): ProbeNode<K, V> | undefined {
        const index = this.probeToFindIndex(start, key);
        if (index === undefined) return undefined;
        const slot = this._table[index];
        return isLive(slot) ? slot : undefined;
    }

    /**
     * Scans from `start` until an empty slot (absent) or the live node holding
     * `key`. Tombstones do not stop the scan.
     */
    private probeToFindIndex(start: number, key: K): number | undefined {
        const table = this._table;
        for (let i = start, n = 0; n < table.length; n++, i = this.nextIndex(i)) {
            const slot = table[i];
            if (slot === undefined) return undefined;
            if (slot !== TOMBSTONE && areEqual(slot.key, key)) return i;
        }
        return undefined;
    }

    /**
     * Scans from `start` for the live node holding `key`. The scan runs past
     * tombstones up to the first empty slot, so a key stored beyond a tombstone
     * is updated, not duplicated. The first tombstone seen is the preferred
     * insertion slot.
     * @throws InvariantViolationError If the whole table holds other live keys.
     */
    private probeToInsert(start: number, key: K): InsertProbe<K, V> {
        const table = this._table;
        let tombstone: number | undefined;
        for (let i = start, n = 0; n < table.length; n++, i = this.nextIndex(i)) {
            const slot = table[i];
            if (slot === undefined) return { exists: false, index: tombstone ?? i };
            if (slot === TOMBSTONE) {
                if (tombstone === undefined) tombstone = i;
            } else if (areEqual(slot.key, key)) {
                return { exists: true, node: slot };
            }
        }
        if (tombstone !== undefined) return { exists: false, index: tombstone };

        // Unreachable while the growth policy holds
        throw new InvariantViolationError(
            `no free slot among ${table.length} (size ${this._length}, load factor ${this._loadFactor})`
        );
    }

    /**
     * Places every live node into a fresh table of `capacity` slots, discarding
     * tombstones. Nodes are placed directly, so the growth rule of `put` never
     * runs mid-rehash.
     * @complexity O(n)
     */
    private rehash(capacity: number): void {
        const nodes = [...this.walk(node => node)];
        this._table = emptyTable(capacity);
        for (const node of nodes) {
            const probe = this.probeToInsert(this.hash(node.key), node.key);
            if (!probe.exists) this._table[probe.index] = node;
        }
    }

    private *walk<R>(project: (node: ProbeNode<K, V>) => R): Generator<R> {
        for (const slot of this._table) {
            if (isLive(slot)) yield project(slot);
        }
    }
}

function emptyTable<K, V>(capacity: number): Slot<K, V>[] {
    return new Array<Slot<K, V>>(capacity).fill(undefined);
}
