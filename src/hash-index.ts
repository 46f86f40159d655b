import { areEqual, getHashCode } from './hash';

/**
 * Hash table behind the ordered set's membership index.
 *
 * Architecture: **Structure of Arrays (SoA)**
 * Instead of storing objects like `{ key, value }`, the index keeps parallel arrays:
 * - `_keys`: the keys.
 * - `_values`: the value at the same position.
 * - `_hashes`: the pre-calculated hash at the same position.
 *
 * A sparse `Uint32Array` slot table (open addressing, linear probing) maps a
 * hash to `position + 1` in the dense arrays; `0` marks an empty slot.
 *
 * @template K Key type, compared with {@link areEqual}.
 * @template V Stored value type.
 */
export class HashIndex<K, V> {

    // Dense storage (Parallel Arrays)
    private _keys: K[] = [];
    private _values: V[] = [];
    private _hashes: number[] = [];

    // Sparse slot table for O(1) lookup
    private _indices: Uint32Array;

    private _bucketCount: number;
    private _mask: number;

    private static readonly LOAD_FACTOR = 0.75;
    private static readonly MIN_BUCKETS = 16;

    constructor(capacity = 0) {
        this._bucketCount = HashIndex.MIN_BUCKETS;
        this._mask = this._bucketCount - 1;
        this._indices = new Uint32Array(this._bucketCount);
        if (capacity > 0) this.ensureCapacity(capacity);
    }

    get size(): number { return this._keys.length; }

    /** Grows the slot table so that `capacity` entries fit under the load factor. */
    ensureCapacity(capacity: number): void {
        if (capacity <= this._bucketCount * HashIndex.LOAD_FACTOR) return;

        let target = this._bucketCount;
        while (target * HashIndex.LOAD_FACTOR < capacity) target *= 2;

        this._bucketCount = target;
        this._mask = this._bucketCount - 1;
        this.rebuildSlots();
    }

    /** Re-hashing: only the slot table changes, the dense arrays stay put. */
    private rebuildSlots(): void {
        this._indices = new Uint32Array(this._bucketCount);
        for (let i = 0; i < this._hashes.length; i++) {
            this._indices[this.freeSlot(this._hashes[i])] = i + 1;
        }
    }

    private nextSlot(idx: number): number { return (idx + 1) & this._mask; }

    /** Steps from the ideal slot of `hash` to `slot`, wrapping around the table. */
    private distance(slot: number, hash: number): number { return (slot - hash) & this._mask; }

    /** First empty slot on the probe path of `hash`. */
    private freeSlot(hash: number): number {
        let idx = hash & this._mask;
        while (this._indices[idx] !== 0) idx = this.nextSlot(idx);
        return idx;
    }

    /** Returns the slot holding `key`, or -1. */
    private findSlot(key: K, h: number): number {
        let idx = h & this._mask;
        while (true) {
            const entry = this._indices[idx];
            if (entry === 0) return -1;

            const ptr = entry - 1;
            if (this._hashes[ptr] === h && areEqual(this._keys[ptr], key)) return idx;

            idx = this.nextSlot(idx);
        }
    }

    has(key: K): boolean {
        return this.findSlot(key, getHashCode(key)) !== -1;
    }

    get(key: K): V | undefined {
        const slot = this.findSlot(key, getHashCode(key));
        return slot === -1 ? undefined : this._values[this._indices[slot] - 1];
    }

    /**
     * Associates `value` with `key`, overwriting an existing entry.
     * @complexity Amortized O(1).
     */
    set(key: K, value: V): void {
        const h = getHashCode(key);
        const slot = this.findSlot(key, h);
        if (slot !== -1) {
            this._values[this._indices[slot] - 1] = value;
            return;
        }

        // Grow before appending: rebuildSlots only knows the stored hashes
        this.ensureCapacity(this._keys.length + 1);
        this._hashes.push(h);
        this._keys.push(key);
        this._values.push(value);
        this._indices[this.freeSlot(h)] = this._keys.length;
    }

    /**
     * Removes a key: its slot is cleared, then the last dense entry is
     * swapped into the freed position.
     * @complexity O(1)
     * @returns True if an entry was removed.
     */
    delete(key: K): boolean {
        if (this._keys.length === 0) return false;

        const h = getHashCode(key);
        const slot = this.findSlot(key, h);
        if (slot === -1) return false;

        const ptr = this._indices[slot] - 1;

        this.clearSlot(slot);

        // Keep the dense arrays gap-free: the tail entry takes position `ptr`
        const last = this._keys.length - 1;
        if (ptr < last) {
            this._keys[ptr] = this._keys[last];
            this._values[ptr] = this._values[last];
            this._hashes[ptr] = this._hashes[last];
            this.repointSlot(this._hashes[ptr], last + 1, ptr + 1);
        }
        this._keys.pop();
        this._values.pop();
        this._hashes.pop();
        return true;
    }

    /** The slot that stored dense position `from` now stores `to`. */
    private repointSlot(hash: number, from: number, to: number): void {
        let idx = hash & this._mask;
        while (this._indices[idx] !== from) idx = this.nextSlot(idx);
        this._indices[idx] = to;
    }

    /**
     * Empties `hole` without breaking lookups: each later entry of the run
     * whose probe path crosses the hole is pulled back into it, and its old
     * slot becomes the new hole.
     */
    private clearSlot(hole: number): void {
        for (let i = this.nextSlot(hole); this._indices[i] !== 0; i = this.nextSlot(i)) {
            const h = this._hashes[this._indices[i] - 1];
            if (this.distance(hole, h) < this.distance(i, h)) {
                this._indices[hole] = this._indices[i];
                hole = i;
            }
        }
        this._indices[hole] = 0;
    }

    clear(): void {
        this._keys = [];
        this._values = [];
        this._hashes = [];
        this._bucketCount = HashIndex.MIN_BUCKETS;
        this._mask = this._bucketCount - 1;
        this._indices = new Uint32Array(this._bucketCount);
    }
}
