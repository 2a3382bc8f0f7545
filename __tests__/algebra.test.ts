/**
 * Vector Algebra Tests
 * magnitude, normalize, dot, cross, scale, add/subtract and ordering
 */

import { describe, it, expect } from 'vitest';
import {
    NumericVector,
    dot,
    cross,
    add,
    subtract,
    scaled,
    distance,
    equals,
    notEquals,
    compare,
    lessThan,
    greaterThan,
    lessOrEqual,
    greaterOrEqual,
    SizeMismatchError,
    InvalidDimensionError,
} from '../index';
import { SeededRNG, arraysClose, isClose } from './test-utils';

// ==================== magnitude / normalize ====================

describe('magnitude', () => {
    it('should compute the Euclidean length', () => {
        expect(NumericVector.from([3, 4]).magnitude()).toBe(5);
    });

    it('should be 0 for an empty vector', () => {
        expect(NumericVector.empty().magnitude()).toBe(0);
    });

    it('should truncate for integer kinds', () => {
        expect(NumericVector.from([1, 1], 'int32').magnitude()).toBe(1);
    });

    it('should take the integer square root for bigint kinds', () => {
        expect(NumericVector.from([3n, 4n], 'int64').magnitude()).toBe(5n);
        expect(NumericVector.from([2n, 2n], 'uint64').magnitude()).toBe(2n);
    });
});

describe('normalize', () => {
    it('should scale to unit length', () => {
        const v = NumericVector.from([3, 4]);
        v.normalize();
        expect(arraysClose(v.toArray(), [0.6, 0.8])).toBe(true);
        expect(isClose(v.magnitude(), 1)).toBe(true);
    });

    it('should normalize float32 vectors', () => {
        const v = NumericVector.from([0, 0, 2], 'float32');
        v.normalize();
        expect(v.toArray()).toEqual([0, 0, 1]);
    });

    it('should leave a zero vector unchanged', () => {
        const v = NumericVector.from([0, 0, 0]);
        v.normalize();
        expect(v.toArray()).toEqual([0, 0, 0]);
    });

    it('should leave an empty vector unchanged', () => {
        const v = NumericVector.empty();
        v.normalize();
        expect(v.isEmpty).toBe(true);
    });
});

// ==================== dot ====================

describe('dot', () => {
    it('should sum element-wise products', () => {
        expect(dot(NumericVector.from([1, 2, 3]), NumericVector.from([4, 5, 6]))).toBe(32);
    });

    it('should be commutative', () => {
        const rng = new SeededRNG(5);
        for (let trial = 0; trial < 10; trial++) {
            const u = NumericVector.from(rng.nextIntArray(6, -10, 10));
            const v = NumericVector.from(rng.nextIntArray(6, -10, 10));
            expect(dot(u, v)).toBe(dot(v, u));
        }
    });

    it('should fail on size mismatch', () => {
        expect(() => dot(NumericVector.from([1, 2]), NumericVector.from([1, 2, 3]))).toThrow(SizeMismatchError);
    });

    it('should be 0 for two empty vectors', () => {
        expect(dot(NumericVector.empty(), NumericVector.empty())).toBe(0);
    });
});

// ==================== cross ====================

describe('cross', () => {
    it('should compute the 3-D cross product', () => {
        const w = cross(NumericVector.from([1, 2, 3]), NumericVector.from([4, 5, 6]));
        expect(w.toArray()).toEqual([-3, 6, -3]);
    });

    it('should follow the right-hand rule for unit vectors', () => {
        const x = NumericVector.from([1, 0, 0]);
        const y = NumericVector.from([0, 1, 0]);
        expect(cross(x, y).toArray()).toEqual([0, 0, 1]);
        expect(cross(y, x).toArray()).toEqual([0, 0, -1]);
    });

    it('should extend cyclically beyond three dimensions', () => {
        const u = NumericVector.from([1, 2, 3, 4]);
        const v = NumericVector.from([5, 6, 7, 8]);
        // w[3] = u[0] * v[1] - u[1] * v[0] = 6 - 10
        expect(cross(u, v).toArray()).toEqual([-4, 8, -4, -4]);
    });

    it('should work for bigint kinds', () => {
        const u = NumericVector.from([1n, 2n, 3n], 'int64');
        const v = NumericVector.from([4n, 5n, 6n], 'int64');
        expect(cross(u, v).toArray()).toEqual([-3n, 6n, -3n]);
    });

    it('should fail on size mismatch', () => {
        expect(() => cross(NumericVector.from([1, 2, 3]), NumericVector.from([1, 2, 3, 4]))).toThrow(
            SizeMismatchError
        );
    });

    it('should fail below three dimensions', () => {
        expect(() => cross(NumericVector.from([1, 2]), NumericVector.from([3, 4]))).toThrow(InvalidDimensionError);
    });
});

// ==================== scale / add / subtract ====================

describe('scale', () => {
    it('should multiply in place and return the vector', () => {
        const v = NumericVector.from([1, -2, 3]);
        expect(v.scale(2)).toBe(v);
        expect(v.toArray()).toEqual([2, -4, 6]);
    });

    it('should convert the scalar to the element kind first', () => {
        expect(NumericVector.from([3, 5], 'int32').scale(1.9).toArray()).toEqual([3, 5]);
        expect(NumericVector.from([4, 6], 'int16').scale(0.5).toArray()).toEqual([0, 0]);
        expect(NumericVector.from([2], 'uint8').scale(-1).toArray()).toEqual([254]);
    });

    it('should scale bigint kinds', () => {
        expect(NumericVector.from([2n, -3n], 'int64').scale(4n).toArray()).toEqual([8n, -12n]);
    });

    it('should leave the source untouched with scaled()', () => {
        const v = NumericVector.from([1, 2]);
        expect(scaled(v, 3).toArray()).toEqual([3, 6]);
        expect(v.toArray()).toEqual([1, 2]);
    });
});

describe('add / subtract', () => {
    const u = NumericVector.from([1, 2, 3]);
    const v = NumericVector.from([10, 20, 30]);

    it('should return a fresh sum without mutating the operands', () => {
        expect(add(u, v).toArray()).toEqual([11, 22, 33]);
        expect(u.toArray()).toEqual([1, 2, 3]);
        expect(v.toArray()).toEqual([10, 20, 30]);
    });

    it('should return a fresh difference', () => {
        expect(subtract(v, u).toArray()).toEqual([9, 18, 27]);
        expect(v.toArray()).toEqual([10, 20, 30]);
    });

    it('should fail on size mismatch', () => {
        expect(() => add(u, NumericVector.from([1]))).toThrow(SizeMismatchError);
        expect(() => subtract(u, NumericVector.from([1]))).toThrow(SizeMismatchError);
    });

    it('should mutate the receiver with addAssign / subtractAssign', () => {
        const w = NumericVector.from([1, 1, 1]);
        expect(w.addAssign(u)).toBe(w);
        expect(w.toArray()).toEqual([2, 3, 4]);
        w.subtractAssign(u);
        expect(w.toArray()).toEqual([1, 1, 1]);
    });

    it('should fail addAssign on size mismatch without mutating', () => {
        const w = NumericVector.from([1, 1]);
        expect(() => w.addAssign(u)).toThrow(SizeMismatchError);
        expect(w.toArray()).toEqual([1, 1]);
    });

    it('should compute distances', () => {
        expect(distance(NumericVector.from([1, 1]), NumericVector.from([4, 5]))).toBe(5);
    });

    it('should agree with the component-wise definition on random data', () => {
        const rng = new SeededRNG(9);
        const a = rng.nextArray(8, -1, 1);
        const b = rng.nextArray(8, -1, 1);
        const sum = add(NumericVector.from(a), NumericVector.from(b)).toArray();
        expect(arraysClose(sum, a.map((x, i) => x + b[i]))).toBe(true);
    });
});

// ==================== Equality & Ordering ====================

describe('equality', () => {
    it('should compare structurally, not by storage', () => {
        const a = NumericVector.from([1, 2, 3]);
        const b = NumericVector.from([1, 2, 3]);
        expect(equals(a, b)).toBe(true);
        expect(a.equals(b)).toBe(true);
        expect(notEquals(a, b)).toBe(false);
    });

    it('should detect a single differing element', () => {
        const a = NumericVector.from([1, 2, 3]);
        const b = NumericVector.from([1, 2, 4]);
        expect(equals(a, b)).toBe(false);
        expect(notEquals(a, b)).toBe(true);
    });

    it('should treat different lengths as unequal', () => {
        expect(equals(NumericVector.from([1, 2]), NumericVector.from([1, 2, 0]))).toBe(false);
    });

    it('should treat NaN elements as equal', () => {
        const a = NumericVector.from([1, Number.NaN]);
        expect(equals(a, a.clone())).toBe(true);
        expect(equals(a, NumericVector.from([1, 2]))).toBe(false);
    });

    it('should treat two empty vectors as equal', () => {
        expect(equals(NumericVector.empty(), NumericVector.empty())).toBe(true);
    });
});

describe('ordering', () => {
    const a = NumericVector.from([1, 2, 3]);
    const b = NumericVector.from([1, 3]);
    const prefix = NumericVector.from([1, 2]);

    it('should compare lexicographically', () => {
        expect(compare(a, b)).toBe(-1);
        expect(compare(b, a)).toBe(1);
        expect(compare(a, a.clone())).toBe(0);
    });

    it('should order a proper prefix first', () => {
        expect(lessThan(prefix, a)).toBe(true);
        expect(greaterThan(a, prefix)).toBe(true);
    });

    it('should define <= and >= as negated strict comparisons', () => {
        expect(lessOrEqual(a, b)).toBe(true);
        expect(lessOrEqual(a, a.clone())).toBe(true);
        expect(lessOrEqual(b, a)).toBe(false);
        expect(greaterOrEqual(b, a)).toBe(true);
        expect(greaterOrEqual(a, a.clone())).toBe(true);
        expect(greaterOrEqual(a, b)).toBe(false);
    });

    it('should order bigint vectors', () => {
        const x = NumericVector.from([1n, 9n], 'int64');
        const y = NumericVector.from([2n], 'int64');
        expect(lessThan(x, y)).toBe(true);
    });
});
