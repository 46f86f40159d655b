import { describe, expect, it } from 'vitest';
import type { Structural } from '../src/hash';
import { HashIndex } from '../src/hash-index';

/** Key with a chosen hash so tests can build collision chains. */
class Key implements Structural {
    constructor(public readonly id: string, public readonly hashCode: number) {}
    equals(other: unknown): boolean {
        return other instanceof Key && other.id === this.id;
    }
}

describe('HashIndex', () => {
    it('stores, overwrites and deletes entries', () => {
        const index = new HashIndex<string, number>();
        index.set('a', 1);
        index.set('b', 2);
        index.set('a', 3);

        expect(index.size).toBe(2);
        expect(index.get('a')).toBe(3);
        expect(index.get('b')).toBe(2);
        expect(index.has('c')).toBe(false);
        expect(index.get('c')).toBeUndefined();

        expect(index.delete('a')).toBe(true);
        expect(index.delete('a')).toBe(false);
        expect(index.has('a')).toBe(false);
        expect(index.get('b')).toBe(2);
        expect(index.size).toBe(1);
    });

    it('returns false when deleting from an empty index', () => {
        expect(new HashIndex<number, number>().delete(1)).toBe(false);
    });

    it('keeps colliding keys reachable after deletes inside a collision run', () => {
        const index = new HashIndex<Key, string>();
        const a = new Key('a', 7);
        const b = new Key('b', 7);
        const c = new Key('c', 8);
        const d = new Key('d', 7);
        index.set(a, 'A');
        index.set(b, 'B');
        index.set(c, 'C');
        index.set(d, 'D');

        expect(index.delete(new Key('a', 7))).toBe(true);
        expect(index.has(a)).toBe(false);
        expect(index.get(b)).toBe('B');
        expect(index.get(c)).toBe('C');
        expect(index.get(d)).toBe('D');

        expect(index.delete(c)).toBe(true);
        expect(index.get(b)).toBe('B');
        expect(index.get(d)).toBe('D');
        expect(index.size).toBe(2);
    });

    it('wraps collision runs around the end of the slot table', () => {
        const index = new HashIndex<Key, number>();
        const keys = [new Key('x', 15), new Key('y', 15), new Key('z', -1), new Key('w', 0)];
        keys.forEach((k, i) => index.set(k, i));

        expect(index.delete(keys[0])).toBe(true);
        expect(index.get(keys[1])).toBe(1);
        expect(index.get(keys[2])).toBe(2);
        expect(index.get(keys[3])).toBe(3);
    });

    it('grows past its initial capacity', () => {
        const index = new HashIndex<number, number>();
        for (let i = 0; i < 1000; i++) index.set(i, i * 2);
        for (let i = 0; i < 1000; i += 2) index.delete(i);

        expect(index.size).toBe(500);
        for (let i = 0; i < 1000; i++) {
            expect(index.get(i)).toBe(i % 2 === 0 ? undefined : i * 2);
        }
    });

    it('accepts a capacity hint', () => {
        const index = new HashIndex<string, number>(100);
        for (let i = 0; i < 100; i++) index.set(`k${i}`, i);
        expect(index.size).toBe(100);
        expect(index.get('k42')).toBe(42);
    });

    it('clears every entry', () => {
        const index = new HashIndex<string, number>();
        index.set('a', 1);
        index.set('b', 2);

        index.clear();
        expect(index.size).toBe(0);
        expect(index.has('a')).toBe(false);
        index.set('a', 5);
        expect(index.get('a')).toBe(5);
    });

    it('stores undefined keys and values', () => {
        const index = new HashIndex<string | undefined, number | undefined>();
        index.set(undefined, 1);
        index.set('x', undefined);
        index.set('y', 2);

        expect(index.has(undefined)).toBe(true);
        expect(index.has('x')).toBe(true);
        expect(index.delete(undefined)).toBe(true);
        expect(index.get('y')).toBe(2);
        expect(index.has('x')).toBe(true);
    });
});
