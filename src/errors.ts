/** Base class of every error thrown by an OrderedSet. */
export class OrderedSetError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** The mark passed to `insert` or `move` is not a member. */
export class MarkNotFoundError extends OrderedSetError {
    constructor(public readonly mark: unknown, op: 'insert' | 'move' = 'insert') {
        super(`reference value for ${op} is not in the OrderedSet`);
    }
}

/** `front()` or `back()` was called on an empty set. */
export class EmptySetError extends OrderedSetError {
    constructor(op: string) {
        super(`Cannot read ${op} of an empty OrderedSet`);
    }
}

/** A mutator was called after `hashCode` froze the set. */
export class FrozenSetError extends OrderedSetError {
    constructor(op: string) {
        super(`InvalidOperation: Cannot ${op} a frozen OrderedSet.`);
    }
}
