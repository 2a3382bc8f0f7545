/**
 * @module vector/element-types
 * @description Arithmetic element kinds and their typed-array storage
 *
 * Each kind pairs an element type (`number` or `bigint`) with the typed array that
 * stores it. Arithmetic results are coerced back into the kind's range the same way
 * a write into its typed array would be, so `int32` sums wrap, `float32` rounds and
 * integer division truncates toward zero.
 */

import { InvalidArgumentError } from '../core/errors';

// ==================== Types ====================

export type Arithmetic = number | bigint;

/**
 * Element type of every supported kind
 */
export interface ElementTypeMap {
    float32: number;
    float64: number;
    int8: number;
    int16: number;
    int32: number;
    uint8: number;
    uint16: number;
    uint32: number;
    int64: bigint;
    uint64: bigint;
}

export type ElementKind = keyof ElementTypeMap;

/**
 * Kinds with floating-point semantics (the only ones `normalize` accepts)
 */
export type FloatKind = 'float32' | 'float64';

export type ElementOf<K extends ElementKind> = ElementTypeMap[K];

/**
 * Exact-size contiguous storage. Every typed array of the matching element type
 * satisfies this interface.
 */
export interface ElementBuffer<T extends Arithmetic> {
    readonly length: number;
    readonly buffer: ArrayBufferLike;
    [index: number]: T;
    set(array: ArrayLike<T>, offset?: number): void;
    fill(value: T, start?: number, end?: number): this;
    copyWithin(target: number, start: number, end?: number): this;
    subarray(begin?: number, end?: number): ElementBuffer<T>;
    slice(start?: number, end?: number): ElementBuffer<T>;
    sort(compareFn?: (a: T, b: T) => number): this;
}

/**
 * Arithmetic and storage capabilities of one element kind
 */
export interface ElementType<T extends Arithmetic> {
    readonly kind: ElementKind;
    readonly floating: boolean;
    readonly zero: T;
    readonly one: T;
    /** Zero-filled buffer of exactly `length` slots */
    allocate(length: number): ElementBuffer<T>;
    /** Whether `buffer` is this kind's typed array */
    owns(buffer: unknown): buffer is ElementBuffer<T>;
    isElement(value: unknown): value is T;
    /** Convert a plain number into this kind */
    fromNumber(value: number): T;
    add(a: T, b: T): T;
    subtract(a: T, b: T): T;
    multiply(a: T, b: T): T;
    /** Average of two elements, computed without wrapping the intermediate sum */
    midpoint(a: T, b: T): T;
    /** Divide by an element count, which may lie outside the kind's range */
    divideByCount(value: T, count: number): T;
    sqrt(value: T): T;
    compare(a: T, b: T): number;
}

type NumberArrayConstructor = new (length: number) => ElementBuffer<number>;
type BigIntArrayConstructor = new (length: number) => ElementBuffer<bigint>;

// ==================== Shared Helpers ====================

function compareValues<T extends Arithmetic>(a: T, b: T): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/**
 * Integer square root (Newton iteration)
 */
export function bigintSqrt(value: bigint): bigint {
    if (value < 0n) {
        throw new InvalidArgumentError(`Cannot take the square root of negative value ${value}`);
    }
    if (value < 2n) return value;

    let x = value;
    let y = (x + 1n) >> 1n;
    while (y < x) {
        x = y;
        y = (x + value / x) >> 1n;
    }
    return x;
}

// ==================== Number Kinds ====================

function numberElementType(
    kind: ElementKind,
    ArrayType: NumberArrayConstructor,
    floating: boolean
): ElementType<number> {
    const scratch = new ArrayType(1);
    const coerce = (value: number): number => {
        scratch[0] = value;
        return scratch[0];
    };

    return {
        kind,
        floating,
        zero: 0,
        one: 1,
        allocate: (length) => new ArrayType(length),
        owns: (buffer): buffer is ElementBuffer<number> => buffer instanceof ArrayType,
        isElement: (value): value is number => typeof value === 'number',
        fromNumber: coerce,
        add: (a, b) => coerce(a + b),
        subtract: (a, b) => coerce(a - b),
        multiply: (a, b) => coerce(a * b),
        midpoint: (a, b) => coerce(floating ? (a + b) / 2 : Math.trunc((a + b) / 2)),
        divideByCount: (value, count) => coerce(floating ? value / count : Math.trunc(value / count)),
        sqrt: (value) => coerce(floating ? Math.sqrt(value) : Math.trunc(Math.sqrt(value))),
        compare: compareValues,
    };
}

// ==================== BigInt Kinds ====================

function bigintElementType(
    kind: ElementKind,
    ArrayType: BigIntArrayConstructor,
    signed: boolean
): ElementType<bigint> {
    const coerce = (value: bigint): bigint => (signed ? BigInt.asIntN(64, value) : BigInt.asUintN(64, value));

    return {
        kind,
        floating: false,
        zero: 0n,
        one: 1n,
        allocate: (length) => new ArrayType(length),
        owns: (buffer): buffer is ElementBuffer<bigint> => buffer instanceof ArrayType,
        isElement: (value): value is bigint => typeof value === 'bigint',
        fromNumber: (value) => {
            if (!Number.isFinite(value)) {
                throw new InvalidArgumentError(`Cannot convert ${value} to ${kind}`);
            }
            return coerce(BigInt(Math.trunc(value)));
        },
        add: (a, b) => coerce(a + b),
        subtract: (a, b) => coerce(a - b),
        multiply: (a, b) => coerce(a * b),
        midpoint: (a, b) => coerce((a + b) / 2n),
        divideByCount: (value, count) => coerce(value / BigInt(count)),
        sqrt: bigintSqrt,
        compare: compareValues,
    };
}

// ==================== Registry ====================

export const ELEMENT_TYPES: { readonly [K in ElementKind]: ElementType<ElementOf<K>> } = {
    float32: numberElementType('float32', Float32Array, true),
    float64: numberElementType('float64', Float64Array, true),
    int8: numberElementType('int8', Int8Array, false),
    int16: numberElementType('int16', Int16Array, false),
    int32: numberElementType('int32', Int32Array, false),
    uint8: numberElementType('uint8', Uint8Array, false),
    uint16: numberElementType('uint16', Uint16Array, false),
    uint32: numberElementType('uint32', Uint32Array, false),
    int64: bigintElementType('int64', BigInt64Array, true),
    uint64: bigintElementType('uint64', BigUint64Array, false),
};

export const ELEMENT_KINDS: readonly ElementKind[] = [
    'float32',
    'float64',
    'int8',
    'int16',
    'int32',
    'uint8',
    'uint16',
    'uint32',
    'int64',
    'uint64',
];

export const DEFAULT_KIND = 'float64' satisfies ElementKind;

/**
 * Look up the element type of a kind
 */
export function elementType<K extends ElementKind>(kind: K): ElementType<ElementOf<K>> {
    return ELEMENT_TYPES[kind];
}

export function isElementKind(value: unknown): value is ElementKind {
    return ELEMENT_KINDS.some(kind => kind === value);
}

export function isFloatKind(kind: ElementKind): kind is FloatKind {
    return ELEMENT_TYPES[kind].floating;
}
