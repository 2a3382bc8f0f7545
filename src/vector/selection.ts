/**
 * @module vector/selection
 * @description In-place selection (nth-element) over element buffers
 */

import type { Arithmetic, ElementBuffer } from './element-types';

export type Comparator<T> = (a: T, b: T) => number;

function swap<T extends Arithmetic>(buffer: ElementBuffer<T>, i: number, j: number): void {
    const tmp = buffer[i];
    buffer[i] = buffer[j];
    buffer[j] = tmp;
}

/**
 * Index holding the median of buffer[a], buffer[b], buffer[c]
 */
function medianOfThree<T extends Arithmetic>(
    buffer: ElementBuffer<T>,
    a: number,
    b: number,
    c: number,
    compare: Comparator<T>
): number {
    const ab = compare(buffer[a], buffer[b]);
    const bc = compare(buffer[b], buffer[c]);
    if (ab <= 0) {
        if (bc <= 0) return b;
        return compare(buffer[a], buffer[c]) <= 0 ? c : a;
    }
    if (bc >= 0) return b;
    return compare(buffer[a], buffer[c]) <= 0 ? a : c;
}

/**
 * Lomuto partition of [lo, hi] around buffer[pivotIndex]; returns the pivot's final index
 */
function partition<T extends Arithmetic>(
    buffer: ElementBuffer<T>,
    lo: number,
    hi: number,
    pivotIndex: number,
    compare: Comparator<T>
): number {
    const pivot = buffer[pivotIndex];
    swap(buffer, pivotIndex, hi);

    let store = lo;
    for (let i = lo; i < hi; i++) {
        if (compare(buffer[i], pivot) < 0) {
            swap(buffer, store, i);
            store++;
        }
    }
    swap(buffer, store, hi);
    return store;
}

/**
 * Partially order `buffer` so that buffer[nth] holds the element a full sort would
 * put there, every element before it compares <= and every element after it >=.
 * Equal elements keep no particular order.
 */
export function nthElement<T extends Arithmetic>(
    buffer: ElementBuffer<T>,
    nth: number,
    compare: Comparator<T>
): void {
    let lo = 0;
    let hi = buffer.length - 1;

    while (hi > lo) {
        const mid = lo + ((hi - lo) >> 1);
        const pivotIndex = partition(buffer, lo, hi, medianOfThree(buffer, lo, mid, hi, compare), compare);

        if (pivotIndex === nth) return;
        if (nth < pivotIndex) {
            hi = pivotIndex - 1;
        } else {
            lo = pivotIndex + 1;
        }
    }
}

/**
 * Largest element of buffer[0, end)
 */
export function maxBefore<T extends Arithmetic>(buffer: ElementBuffer<T>, end: number, compare: Comparator<T>): T {
    let best = buffer[0];
    for (let i = 1; i < end; i++) {
        if (compare(buffer[i], best) > 0) best = buffer[i];
    }
    return best;
}
