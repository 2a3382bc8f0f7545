/**
 * @module vector/format
 * @description Printable representations of vectors and extremum results
 */

import { DEFAULT_FORMAT, type FormatOptions } from '../core/config';
import type { Arithmetic, ElementKind } from './element-types';
import type { Extremum, NumericVector } from './numeric-vector';

function formatElement(value: Arithmetic, precision: number | undefined): string {
    if (typeof value === 'number' && precision !== undefined) {
        return value.toFixed(precision);
    }
    return String(value);
}

/**
 * Render a vector as `[e0, e1, ..., en-1]`
 *
 * @example
 * ```typescript
 * formatVector(NumericVector.from([1, 2.5]));            // '[1, 2.5]'
 * formatVector(NumericVector.empty(), { empty: 'nullptr' }); // 'nullptr'
 * ```
 */
export function formatVector<K extends ElementKind>(
    vector: NumericVector<K>,
    options: Partial<FormatOptions> = {}
): string {
    const { empty, separator, precision } = { ...DEFAULT_FORMAT, ...options };
    if (vector.length === 0) {
        return empty;
    }

    const parts: string[] = [];
    for (const value of vector) {
        parts.push(formatElement(value, precision));
    }
    return `[${parts.join(separator)}]`;
}

/**
 * Render an index list as `[i0, i1, ...]`
 */
export function formatIndices(indices: readonly number[], separator: string = DEFAULT_FORMAT.separator): string {
    return `[${indices.join(separator)}]`;
}

/**
 * Render an extremum: the value itself, or the list of tied indices
 */
export function formatExtremum<T extends Arithmetic>(
    result: Extremum<T>,
    options: Partial<FormatOptions> = {}
): string {
    if (result.kind === 'indices') {
        return formatIndices(result.indices, options.separator);
    }
    return formatElement(result.value, options.precision);
}
