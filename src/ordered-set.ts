import { EmptySetError, FrozenSetError, MarkNotFoundError } from './errors';
import { areEqual, getHashCode, type Structural } from './hash';
import { HashIndex } from './hash-index';
import { Sequence, type SequenceNode } from './sequence';

/**
 * Callback for {@link OrderedSet.range}. Returning anything other than
 * `undefined` stops the traversal and becomes its result.
 */
export type Visitor<T, R> = (index: number, value: T) => R | undefined;

/**
 * Result of {@link OrderedSet.pop} and {@link OrderedSet.shift}.
 * `ok` is false only when the set was empty, so an `undefined` member
 * still comes back as `[undefined, true]`.
 */
export type Extracted<T> = [value: T, ok: true] | [value: undefined, ok: false];

/**
 * A set that remembers order: unique members kept in a caller-controlled
 * sequence, with O(1) membership, positional insert, move and removal.
 *
 * * Architecture:
 * - Sequence: doubly linked nodes, the only source of order.
 * - Index: value -> node hash table, used to reject duplicates and to find
 *   splice points. Never consulted for order.
 *
 * * Equality of members follows {@link areEqual}: primitives by value,
 *   {@link Structural} objects by content, other objects by identity.
 *
 * * "Freeze-on-Hash": reading `hashCode` freezes the set, after which every
 *   mutator throws {@link FrozenSetError}. This is what lets an OrderedSet
 *   be a member of another OrderedSet or a field of a Tuple.
 *
 * Not synchronized. Mutating the set from inside a `range` visitor or while
 * iterating leaves the rest of the traversal undefined.
 *
 * @template T Member type.
 */
export class OrderedSet<T> implements Structural, Iterable<T> {
    readonly #sequence = new Sequence<T>();
    readonly #index: HashIndex<T, SequenceNode<T>>;
    #hashCode: number | null = null;
    #isFrozen = false;

    /**
     * Appends each initial value in order; later duplicates are dropped.
     */
    constructor(...initial: T[]) {
        this.#index = new HashIndex<T, SequenceNode<T>>(initial.length);
        for (const v of initial) this.append(v);
    }

    static from<U>(values: Iterable<U>): OrderedSet<U> {
        const set = new OrderedSet<U>();
        for (const v of values) set.append(v);
        return set;
    }

    /**
     * Mutators call this again after hashing a new value: hashing the set
     * itself (or a structure that reads its hash) freezes it mid-call.
     */
    #checkFrozen(op: string): void {
        if (this.#isFrozen) throw new FrozenSetError(op);
    }

    get size(): number { return this.#sequence.length; }
    get isFrozen(): boolean { return this.#isFrozen; }
    isEmpty(): boolean { return this.#sequence.length === 0; }

    /** O(1) index lookup. */
    has(value: T): boolean { return this.#index.has(value); }

    /**
     * First member.
     * @throws EmptySetError if the set is empty. See {@link peekFront}.
     */
    front(): T {
        const node = this.#sequence.front();
        if (!node) throw new EmptySetError('front');
        return node.value;
    }

    /**
     * Last member.
     * @throws EmptySetError if the set is empty. See {@link peekBack}.
     */
    back(): T {
        const node = this.#sequence.back();
        if (!node) throw new EmptySetError('back');
        return node.value;
    }

    peekFront(): T | undefined { return this.#sequence.front()?.value; }
    peekBack(): T | undefined { return this.#sequence.back()?.value; }

    // --- Mutation ---

    /** Adds `value` at the back. Returns false if it was already a member. */
    append(value: T): boolean {
        this.#checkFrozen('append to');
        if (this.#index.has(value)) return false;
        this.#checkFrozen('append to');
        this.#index.set(value, this.#sequence.pushBack(value));
        return true;
    }

    /** Adds `value` at the front. Returns false if it was already a member. */
    prepend(value: T): boolean {
        this.#checkFrozen('prepend to');
        if (this.#index.has(value)) return false;
        this.#checkFrozen('prepend to');
        this.#index.set(value, this.#sequence.pushFront(value));
        return true;
    }

    /**
     * Adds `value` immediately after (or before) `mark`.
     * An existing member is never repositioned: use {@link move} for that.
     * @returns True if `value` was added, false if it was already a member.
     * @throws MarkNotFoundError if `mark` is not a member; nothing changes.
     */
    insert(value: T, mark: T, after: boolean): boolean {
        this.#checkFrozen('insert into');
        const markNode = this.#index.get(mark);
        if (markNode === undefined) throw new MarkNotFoundError(mark, 'insert');
        if (this.#index.has(value)) return false;
        this.#checkFrozen('insert into');

        const node = after
            ? this.#sequence.insertAfter(value, markNode)
            : this.#sequence.insertBefore(value, markNode);
        this.#index.set(value, node);
        return true;
    }

    /**
     * Repositions the member `value` immediately after (or before) `mark`.
     * Does nothing if `value` is not a member or is `mark` itself.
     * @throws MarkNotFoundError if `mark` is not a member; nothing changes.
     */
    move(value: T, mark: T, after: boolean): void {
        this.#checkFrozen('move within');
        const markNode = this.#index.get(mark);
        if (markNode === undefined) throw new MarkNotFoundError(mark, 'move');

        const node = this.#index.get(value);
        if (node === undefined || node === markNode) return;

        // Same node object: the index entry stays valid
        if (after) this.#sequence.moveAfter(node, markNode);
        else this.#sequence.moveBefore(node, markNode);
    }

    /** Removes `value`, keeping the relative order of the rest. */
    remove(value: T): boolean {
        this.#checkFrozen('remove from');
        const node = this.#index.get(value);
        if (node === undefined) return false;
        this.#sequence.remove(node);
        this.#index.delete(value);
        return true;
    }

    /** Removes the last member: `[value, true]`, or `[undefined, false]` if empty. */
    pop(): Extracted<T> {
        this.#checkFrozen('pop from');
        const node = this.#sequence.back();
        return node ? this.#detach(node) : [undefined, false];
    }

    /** Removes the first member: `[value, true]`, or `[undefined, false]` if empty. */
    shift(): Extracted<T> {
        this.#checkFrozen('shift from');
        const node = this.#sequence.front();
        return node ? this.#detach(node) : [undefined, false];
    }

    #detach(node: SequenceNode<T>): Extracted<T> {
        this.#index.delete(node.value);
        return [this.#sequence.remove(node), true];
    }

    clear(): this {
        this.#checkFrozen('clear');
        this.#sequence.clear();
        this.#index.clear();
        return this;
    }

    // --- Traversal ---

    /**
     * Visits members front to back with their zero-based position.
     * Stops at the first visitor result that is not `undefined` and returns it.
     */
    range<R>(visit: Visitor<T, R>): R | undefined {
        let i = 0;
        for (let node = this.#sequence.front(); node; node = node.next) {
            const result = visit(i++, node.value);
            if (result !== undefined) return result;
        }
        return undefined;
    }

    /** Like {@link range}, back to front; position 0 is the last member. */
    rangeReverse<R>(visit: Visitor<T, R>): R | undefined {
        let i = 0;
        for (let node = this.#sequence.back(); node; node = node.prev) {
            const result = visit(i++, node.value);
            if (result !== undefined) return result;
        }
        return undefined;
    }

    /** Members front to back as a new array. */
    slice(): T[] {
        const out = new Array<T>(this.#sequence.length);
        this.range((i, v) => {
            out[i] = v;
            return undefined;
        });
        return out;
    }

    *values(): Generator<T> {
        for (const node of this.#sequence.nodes()) yield node.value;
    }

    *reversed(): Generator<T> {
        for (const node of this.#sequence.nodesReverse()) yield node.value;
    }

    [Symbol.iterator](): Iterator<T> { return this.values(); }

    // --- Value semantics ---

    /**
     * Order-sensitive hash of the members.
     * **Side Effect:** Freezes the set.
     */
    get hashCode(): number {
        if (this.#hashCode !== null) return this.#hashCode;
        let h = 1;
        for (const node of this.#sequence.nodes()) {
            h = (Math.imul(31, h) + getHashCode(node.value)) | 0;
        }
        this.#hashCode = h;
        this.#isFrozen = true;
        return h;
    }

    /** True if `other` is an OrderedSet holding equal members in the same order. */
    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof OrderedSet)) return false;
        if (this.size !== other.size) return false;
        // Only compare hashes that already exist; computing one would freeze
        if (this.#isFrozen && other.isFrozen && this.hashCode !== other.hashCode) return false;

        const itB = other.values();
        for (const a of this.values()) {
            const b = itB.next();
            if (b.done || !areEqual(a, b.value)) return false;
        }
        return true;
    }

    /** Mutable copy with the same order. The copy is NOT frozen. */
    clone(): OrderedSet<T> {
        const copy = new OrderedSet<T>();
        copy.#index.ensureCapacity(this.size);
        for (const node of this.#sequence.nodes()) copy.append(node.value);
        return copy;
    }

    toString(): string {
        return `{${this.slice().map(v => String(v)).join(', ')}}`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

/** Creates an empty OrderedSet. */
export function emptySet<T>(): OrderedSet<T> { return new OrderedSet<T>(); }

/** Creates an OrderedSet containing a single element. */
export function singleton<T>(el: T): OrderedSet<T> { return new OrderedSet<T>(el); }
