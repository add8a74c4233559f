import { stringify } from './hash';

// Root error of the library
export class CollectionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CollectionError';
    }
}

/** A required argument was null/undefined or outside its allowed range. */
export class InvalidArgumentError extends CollectionError {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidArgumentError';
    }

    static nullParam(paramName: string): InvalidArgumentError {
        return new InvalidArgumentError(`param '${paramName}' cannot be null`);
    }
}

export class KeyNotFoundError extends CollectionError {
    readonly key: unknown;

    constructor(key: unknown) {
        super(`key '${stringify(key)}' doesn't exist in map`);
        this.name = 'KeyNotFoundError';
        this.key = key;
    }
}

export class UnderflowError extends CollectionError {
    constructor(operation: string) {
        super(`can't ${operation}, map is empty`);
        this.name = 'UnderflowError';
    }
}

export class IndexOutOfRangeError extends CollectionError {
    constructor(index: number, length: number) {
        super(`index ${index} out of bounds for length ${length}`);
        this.name = 'IndexOutOfRangeError';
    }
}

/**
 * Keys could not be ordered: no comparator was supplied and the keys have no
 * natural order (or two keys of different kinds were compared).
 * Raised before any mutation, so the map that raised it is left unchanged.
 */
export class UnorderedKeyTypeError extends CollectionError {
    constructor(key: unknown, ...others: unknown[]) {
        super(
            `${[key, ...others].map(k => `'${stringify(k)}'`).join(' and ')} cannot be ordered: ` +
            `no natural ordering and no comparator was provided during construction`
        );
        this.name = 'UnorderedKeyTypeError';
    }
}

/** An internal invariant was broken. Never expected in correct operation. */
export class InvariantViolationError extends CollectionError {
    constructor(message: string) {
        super(message);
        this.name = 'InvariantViolationError';
    }
}

/** Throws {@link InvalidArgumentError} when `value` is null or undefined. */
export function requireNonNull<T>(value: T, paramName: string): asserts value is NonNullable<T> {
    if (value === null || value === undefined) throw InvalidArgumentError.nullParam(paramName);
}
