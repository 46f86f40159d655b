/**
 * @module linked-ordered-set
 * Ordered set: unique members, caller-controlled order, O(1) membership,
 * positional insert, move and removal.
 */

export { OrderedSet, emptySet, singleton } from './ordered-set';
export type { Extracted, Visitor } from './ordered-set';
export { Tuple, getHashCode, areEqual, isStructural } from './hash';
export type { Structural } from './hash';
export {
    OrderedSetError,
    MarkNotFoundError,
    EmptySetError,
    FrozenSetError
} from './errors';
