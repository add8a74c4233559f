import { Structural, areEqual, hashValue, stringify } from './hash';

/**
 * An immutable key-value pair, as produced by map iteration.
 * Equality and hash are structural, so array keys and values compare by content.
 *
 * @template K Key type.
 * @template V Value type.
 */
export class Entry<K, V> implements Structural {
    readonly #key: K;
    readonly #value: V;

    constructor(key: K, value: V) {
        this.#key = key;
        this.#value = value;
    }

    get key(): K { return this.#key; }
    get value(): V { return this.#value; }

    get hashCode(): number {
        return (Math.imul(hashValue(this.#key), 31) ^ hashValue(this.#value)) | 0;
    }

    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof Entry)) return false;
        return areEqual(this.#key, other.key) && areEqual(this.#value, other.value);
    }

    /** Returns the pair as a `[key, value]` tuple, the shape the built-in Map uses. */
    toTuple(): [K, V] { return [this.#key, this.#value]; }

    toString(): string {
        return `${stringify(this.#key)}: ${stringify(this.#value)}`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
