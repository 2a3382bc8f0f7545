/**
 * @module vector/operations
 * @description Free functions over NumericVector: algebra, concatenation and ordering
 *
 * Binary arithmetic here is pure and always returns a fresh vector. Use
 * `addAssign` / `subtractAssign` on the vector itself for in-place updates.
 */

import { InvalidDimensionError, SizeMismatchError } from '../core/errors';
import type { ElementKind, ElementOf } from './element-types';
import { NumericVector } from './numeric-vector';

// ==================== Vector Algebra ====================

/**
 * Sum of element-wise products
 */
export function dot<K extends ElementKind>(u: NumericVector<K>, v: NumericVector<K>): ElementOf<K> {
    return u.dot(v);
}

/**
 * Cross product of two vectors of equal length n >= 3.
 *
 * The first three components are the standard 3-D cross product of the first three
 * components. Each further component i follows the cyclic convention
 * `u[(i+1) % n] * v[(i+2) % n] - u[(i+2) % n] * v[(i+1) % n]`, which is a product
 * convention and not a generalized cross product in the algebraic sense.
 */
export function cross<K extends ElementKind>(u: NumericVector<K>, v: NumericVector<K>): NumericVector<K> {
    if (u.length !== v.length) {
        throw new SizeMismatchError(u.length, v.length, 'cross');
    }
    const n = u.length;
    if (n < 3) {
        throw new InvalidDimensionError(3, n, 'cross');
    }

    const { type } = u;
    const component = (i: number, j: number): ElementOf<K> =>
        type.subtract(type.multiply(u.get(i), v.get(j)), type.multiply(u.get(j), v.get(i)));

    const w = NumericVector.ofLength(n, u.kind);
    for (let i = 0; i < n; i++) {
        const width = i < 3 ? 3 : n;
        w.set(i, component((i + 1) % width, (i + 2) % width));
    }
    return w;
}

/**
 * Element-wise sum as a new vector
 */
export function add<K extends ElementKind>(u: NumericVector<K>, v: NumericVector<K>): NumericVector<K> {
    if (u.length !== v.length) {
        throw new SizeMismatchError(u.length, v.length, 'add');
    }
    return u.clone().addAssign(v);
}

/**
 * Element-wise difference as a new vector
 */
export function subtract<K extends ElementKind>(u: NumericVector<K>, v: NumericVector<K>): NumericVector<K> {
    if (u.length !== v.length) {
        throw new SizeMismatchError(u.length, v.length, 'subtract');
    }
    return u.clone().subtractAssign(v);
}

/**
 * Scaled copy: scalar * v
 */
export function scaled<K extends ElementKind>(v: NumericVector<K>, scalar: ElementOf<K>): NumericVector<K> {
    return v.clone().scale(scalar);
}

/**
 * Distance between two points: magnitude(u - v)
 */
export function distance<K extends ElementKind>(u: NumericVector<K>, v: NumericVector<K>): ElementOf<K> {
    return subtract(u, v).magnitude();
}

export function concat<K extends ElementKind>(a: NumericVector<K>, b: NumericVector<K>): NumericVector<K> {
    return NumericVector.concat(a, b);
}

// ==================== Equality & Ordering ====================

export function equals<K extends ElementKind>(u: NumericVector<K>, v: NumericVector<K>): boolean {
    return u.equals(v);
}

export function notEquals<K extends ElementKind>(u: NumericVector<K>, v: NumericVector<K>): boolean {
    return !u.equals(v);
}

/**
 * Lexicographic comparison returning -1, 0 or 1
 */
export function compare<K extends ElementKind>(u: NumericVector<K>, v: NumericVector<K>): number {
    return u.compareTo(v);
}

export function lessThan<K extends ElementKind>(u: NumericVector<K>, v: NumericVector<K>): boolean {
    return u.compareTo(v) < 0;
}

export function greaterThan<K extends ElementKind>(u: NumericVector<K>, v: NumericVector<K>): boolean {
    return lessThan(v, u);
}

export function lessOrEqual<K extends ElementKind>(u: NumericVector<K>, v: NumericVector<K>): boolean {
    return !lessThan(v, u);
}

export function greaterOrEqual<K extends ElementKind>(u: NumericVector<K>, v: NumericVector<K>): boolean {
    return !lessThan(u, v);
}
