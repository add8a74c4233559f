/**
 * @module hash
 * @description
 * Value semantics shared by every map in the library.
 * Keys and values are compared and hashed by content, not by reference:
 * - Numbers: integer fast path, floats mixed through their IEEE-754 bits.
 * - Strings: FNV-1a.
 * - Arrays: element-wise (recursively), so `[1, [2]]` equals `[1, [2]]`.
 * - Objects implementing {@link Structural}: delegate to `.hashCode` / `.equals`.
 * - Anything else: identity.
 */

// ============================================================================
// 1. TYPE DEFINITIONS
// ============================================================================

/**
 * Interface for objects that support Value Semantics.
 * Anything implementing it can be used as a key in the hash based maps.
 */
export interface Structural {
    /** Hash code consistent with {@link Structural.equals}. */
    readonly hashCode: number;

    /** Checks deep equality with another object. */
    equals(other: unknown): boolean;
}

export function isStructural(v: unknown): v is Structural {
    return typeof v === 'object' && v !== null
        && 'hashCode' in v && typeof v.hashCode === 'number'
        && 'equals' in v && typeof v.equals === 'function';
}

// ============================================================================
// 2. HASH ENGINE
// ============================================================================

const FNV_PRIME = 16777619;
const FNV_OFFSET = 2166136261;
const floatBuffer = new ArrayBuffer(8);
const view = new DataView(floatBuffer);

/** Identity hashes for objects without value semantics. */
const identities = new WeakMap<object, number>();
let nextIdentity = 1;

function hashNumber(val: number): number {
    // Integer Fast Path
    if ((val | 0) === val) return val | 0;
    view.setFloat64(0, val, true);
    let h = FNV_OFFSET;
    h ^= view.getInt32(0, true);
    h = Math.imul(h, FNV_PRIME);
    h ^= view.getInt32(4, true);
    h = Math.imul(h, FNV_PRIME);
    return h >>> 0;
}

function hashString(str: string): number {
    let h = FNV_OFFSET;
    const len = str.length;
    for (let i = 0; i < len; i++) {
        h ^= str.charCodeAt(i);
        h = Math.imul(h, FNV_PRIME);
    }
    return h >>> 0;
}

function identityHash(obj: object): number {
    let h = identities.get(obj);
    if (h === undefined) {
        h = hashNumber(nextIdentity++);
        identities.set(obj, h);
    }
    return h;
}

/**
 * Computes a 32-bit hash code for any value.
 * Equal values (per {@link areEqual}) always produce equal hashes.
 */
export function hashValue(v: unknown): number {
    if (v === null || v === undefined) return 0;
    if (typeof v === 'number') return hashNumber(v);
    if (typeof v === 'string') return hashString(v);
    if (typeof v === 'boolean') return v ? 1231 : 1237;
    if (typeof v === 'bigint') return hashString(v.toString());
    if (typeof v === 'symbol') return hashString(v.description ?? '');

    // Recursive Hash for Arrays
    if (Array.isArray(v)) {
        let h = FNV_OFFSET;
        for (let i = 0; i < v.length; i++) {
            h ^= hashValue(v[i]);
            h = Math.imul(h, FNV_PRIME);
        }
        return h >>> 0;
    }

    if (v instanceof Date) return hashNumber(v.getTime());
    if (isStructural(v)) return v.hashCode;
    return identityHash(v);
}

// ============================================================================
// 3. EQUALITY
// ============================================================================

/**
 * Determines deep equality between two values.
 * NaN equals NaN, so a NaN key can be found again.
 */
export function areEqual(a: unknown, b: unknown): boolean {
    if (a === b) return true;
    if (typeof a === 'number' && typeof b === 'number') return a !== a && b !== b;

    if (Array.isArray(a)) {
        if (!Array.isArray(b) || a.length !== b.length) return false;
        for (let i = 0; i < a.length; i++) {
            if (!areEqual(a[i], b[i])) return false;
        }
        return true;
    }

    if (a instanceof Date) return b instanceof Date && a.getTime() === b.getTime();
    if (isStructural(a)) return a.equals(b);
    return false;
}

// ============================================================================
// 4. FORMATTING
// ============================================================================

/** Human readable form of a key or value; arrays are rendered deeply. */
export function stringify(v: unknown): string {
    if (Array.isArray(v)) return `[${v.map(stringify).join(', ')}]`;
    return String(v);
}
