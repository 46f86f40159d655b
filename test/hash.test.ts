import { describe, expect, it } from 'vitest';
import { OrderedSet, Tuple, areEqual, getHashCode, isStructural } from '../src/index';

describe('hash engine', () => {
    it('hashes primitives by value', () => {
        const str1 = 'hello';
        const str2 = 'hel' + 'lo';
        expect(getHashCode(str1)).toBe(getHashCode(str2));
        expect(getHashCode(1.5)).toBe(getHashCode(3 / 2));
        expect(getHashCode(10n)).toBe(getHashCode(BigInt(10)));
        expect(getHashCode(true)).not.toBe(getHashCode(false));
        expect(getHashCode(null)).not.toBe(getHashCode(undefined));
    });

    it('follows SameValueZero for numbers', () => {
        expect(getHashCode(0)).toBe(getHashCode(-0));
        expect(areEqual(0, -0)).toBe(true);
        expect(getHashCode(NaN)).toBe(getHashCode(0 / 0));
        expect(areEqual(NaN, NaN)).toBe(true);
        expect(areEqual(NaN, 0)).toBe(false);
        expect(areEqual(1, '1')).toBe(false);
    });

    it('compares plain objects by identity', () => {
        const a = { x: 1 };
        const b = { x: 1 };
        expect(areEqual(a, a)).toBe(true);
        expect(areEqual(a, b)).toBe(false);
        expect(getHashCode(a)).toBe(getHashCode(a));
        expect(areEqual([1], [1])).toBe(false);
    });

    it('recognises structural values', () => {
        expect(isStructural(new Tuple(1))).toBe(true);
        expect(isStructural(new OrderedSet(1))).toBe(true);
        expect(isStructural({ hashCode: 3, equals: () => true })).toBe(true);
        expect(isStructural({ hashCode: 3 })).toBe(false);
        expect(isStructural(null)).toBe(false);
        expect(isStructural('tuple')).toBe(false);
    });

    it('delegates to hashCode and equals of structural values', () => {
        const key = { hashCode: 1234, equals: (other: unknown) => other === 'anything' };
        expect(getHashCode(key)).toBe(1234);
        expect(areEqual(key, { hashCode: 1234, equals: () => false })).toBe(false);
    });
});

describe('Tuple', () => {
    it('is equal to another tuple with equal elements', () => {
        const t1 = new Tuple(1, 'a', new Tuple(2));
        const t2 = new Tuple(1, 'a', new Tuple(2));
        expect(t1.equals(t2)).toBe(true);
        expect(t1.hashCode).toBe(t2.hashCode);
        expect(areEqual(t1, t2)).toBe(true);
    });

    it('depends on element order and length', () => {
        expect(new Tuple(1, 2).equals(new Tuple(2, 1))).toBe(false);
        expect(new Tuple(1, 2).equals(new Tuple(1, 2, 3))).toBe(false);
        expect(new Tuple(1).equals([1])).toBe(false);
    });

    it('copies and freezes its elements', () => {
        const source: number[] = [1, 2, 3];
        const t = new Tuple(...source);
        source[0] = 99;
        expect(t.get(0)).toBe(1);
        expect(t.length).toBe(3);
        expect(Object.isFrozen(t.raw)).toBe(true);
        expect([...t]).toEqual([1, 2, 3]);
        expect(t.get(5)).toBeUndefined();
    });

    it('prints its elements', () => {
        expect(new Tuple(1, 'x', new Tuple(2, 3)).toString()).toBe('(1, x, (2, 3))');
    });
});
