/**
 * @module value-maps
 * Associative maps with value semantics: array keys and {@link Structural}
 * objects are hashed and compared by content.
 *
 * - Ordered: {@link SortedArrayMap}, {@link RedBlackTreeMap}
 * - Hashed: {@link ChainingHashMap}, {@link ProbingHashMap}
 * - Small and linear: {@link UnorderedArrayMap}
 */

export { Entry } from './entry';
export {
    CollectionError,
    IndexOutOfRangeError,
    InvalidArgumentError,
    InvariantViolationError,
    KeyNotFoundError,
    UnderflowError,
    UnorderedKeyTypeError,
} from './errors';
export type { Structural } from './hash';
export { areEqual, hashValue, isStructural, stringify } from './hash';
export type { CopyFn, MapLike, OrderedMapLike } from './map';
export { isMapLike, isOrderedMapLike, mapEquals } from './map';
export type { Comparable, Comparator } from './ordering';
export { naturalOrder } from './ordering';

export { ChainingHashMap } from './chaining-hash-map';
export { ProbingHashMap } from './probing-hash-map';
export { RedBlackTreeMap } from './red-black-tree-map';
export { SortedArrayMap } from './sorted-array-map';
export { UnorderedArrayMap } from './unordered-array-map';
