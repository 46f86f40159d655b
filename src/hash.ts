/**
 * @module hash
 * @description
 * Hashing and equality used by the ordered set's index.
 *
 * * Value semantics:
 * - Primitives compare by value (numbers by SameValueZero).
 * - Objects implementing {@link Structural} compare by content.
 * - Every other object compares by identity.
 *
 * * Contract: reading `.hashCode` of a structural value may freeze it
 *   (Immutable-after-Hash). The index reads it on insertion.
 */

// ============================================================================
// 1. TYPE DEFINITIONS
// ============================================================================

/**
 * Interface for objects that support Value Semantics.
 * Any object implementing this is deduplicated by content inside an OrderedSet.
 */
export interface Structural {
    /**
     * Returns the hash code of the object.
     * SIDE EFFECT: may freeze the object so the hash remains stable.
     */
    readonly hashCode: number;

    /** Checks deep equality with another object. */
    equals(other: unknown): boolean;
}

export function isStructural(val: unknown): val is Structural {
    if (typeof val !== 'object' || val === null) return false;
    return 'hashCode' in val && 'equals' in val && typeof val.equals === 'function';
}

// ============================================================================
// 2. HASH ENGINE
// ============================================================================

const FNV_PRIME = 0x01000193;
const FNV_OFFSET = 0x811c9dc5;

const floatBuffer = new ArrayBuffer(8);
const view = new DataView(floatBuffer);

const HASH_NULL = 0x6e756c6c;
const HASH_UNDEFINED = 0x756e6466;
const HASH_TRUE = 0x74727565;
const HASH_FALSE = 0x66616c73;
const HASH_NAN = 0x7ff80000;

/** Identity ids for objects without value semantics. */
const identities = new WeakMap<object, number>();
let nextIdentity = 1;

function identityOf(obj: object): number {
    let id = identities.get(obj);
    if (id === undefined) {
        id = nextIdentity++;
        identities.set(obj, id);
    }
    return id;
}

function mix(h: number): number {
    h = Math.imul((h >>> 16) ^ h, 0x45d9f3b);
    h = Math.imul((h >>> 16) ^ h, 0x45d9f3b);
    return (h >>> 16) ^ h;
}

/**
 * Integers are mixed directly, floats via their two IEEE-754 words.
 * `-0` hashes like `0` and every NaN hashes alike (SameValueZero).
 */
function hashNumber(val: number): number {
    if ((val | 0) === val) return mix(val | 0);
    if (val !== val) return HASH_NAN;
    view.setFloat64(0, val, true);
    let h = FNV_OFFSET;
    h ^= view.getInt32(0, true);
    h = Math.imul(h, FNV_PRIME);
    h ^= view.getInt32(4, true);
    h = Math.imul(h, FNV_PRIME);
    return h;
}

/** FNV-1a over UTF-16 code units. */
function hashString(str: string): number {
    let h = FNV_OFFSET;
    const len = str.length;
    for (let i = 0; i < len; i++) {
        h ^= str.charCodeAt(i);
        h = Math.imul(h, FNV_PRIME);
    }
    return h;
}

/**
 * Computes a 32-bit hash code for any value.
 * Structural objects delegate to `.hashCode`; other objects hash by identity.
 */
export function getHashCode(val: unknown): number {
    switch (typeof val) {
        case 'number': return hashNumber(val);
        case 'string': return hashString(val);
        case 'boolean': return val ? HASH_TRUE : HASH_FALSE;
        case 'undefined': return HASH_UNDEFINED;
        case 'bigint': return hashString(val.toString()) ^ 0x62;
        case 'symbol': return hashString(val.description ?? '') ^ 0x73;
        case 'function': return mix(identityOf(val));
        default:
            if (val === null) return HASH_NULL;
            // Recursive structures: accessing .hashCode may freeze them
            if (isStructural(val)) return val.hashCode;
            return mix(identityOf(val));
    }
}

/**
 * Equality matching {@link getHashCode}: SameValueZero for primitives,
 * `.equals` for structural objects, identity for everything else.
 */
export function areEqual(a: unknown, b: unknown): boolean {
    if (a === b) return true;
    if (typeof a === 'number' && typeof b === 'number') return a !== a && b !== b;
    if (isStructural(a) && isStructural(b)) return a.equals(b);
    return false;
}

// ============================================================================
// 3. TUPLE (Immutable)
// ============================================================================

/**
 * An immutable, fixed-length sequence of values compared by content.
 * Use it where a composite value must be deduplicated structurally.
 * @template T The type of the tuple elements array.
 */
export class Tuple<T extends unknown[] = unknown[]> implements Structural, Iterable<T[number]> {
    readonly #elements: ReadonlyArray<T[number]>;
    readonly #hashCode: number;

    /** Copies and freezes the input, then computes the hash once. */
    constructor(...elements: T) {
        this.#elements = Object.freeze(elements.slice());

        let h = 1;
        for (const e of this.#elements) {
            h = (Math.imul(h, 31) + getHashCode(e)) | 0;
        }
        this.#hashCode = h;
    }

    get length(): number { return this.#elements.length; }
    get raw(): ReadonlyArray<T[number]> { return this.#elements; }
    get hashCode(): number { return this.#hashCode; }

    /** Returns the element at the specified index. */
    get(index: number): T[number] | undefined { return this.#elements[index]; }

    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof Tuple)) return false;
        if (this.#hashCode !== other.hashCode) return false;
        if (this.length !== other.length) return false;

        for (let i = 0; i < this.length; i++) {
            if (!areEqual(this.#elements[i], other.raw[i])) return false;
        }
        return true;
    }

    *[Symbol.iterator](): Iterator<T[number]> { yield* this.#elements; }

    toString(): string {
        return `(${this.#elements.map(e => String(e)).join(', ')})`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
