/**
 * @module vector/numeric-vector
 * @description Owning, resizable vector of arithmetic elements
 *
 * A vector exclusively owns a typed array sized exactly to its length; an empty
 * vector holds no buffer at all. Every structural edit that changes the length
 * allocates a fresh buffer and copies, so any view previously returned by `view()`
 * stops reflecting the vector after a resize, insert or erase.
 *
 * ## Usage Example
 * ```typescript
 * const v = NumericVector.from([3, 4]);
 * v.magnitude();          // 5
 * v.insert(1, 2, 0);      // [3, 0, 0, 4]
 *
 * const counts = NumericVector.ofLength(4, 'int32');
 * counts.set(0, 7);
 * counts.max();           // { kind: 'value', value: 7 }
 * ```
 */

import { getConfig } from '../core/config';
import {
    EmptyVectorError,
    ErrorCodes,
    InvalidArgumentError,
    InvalidRangeError,
    NumvecError,
    OutOfRangeError,
    SizeMismatchError,
} from '../core/errors';
import { EVENT_LEVELS, type VectorEventType } from '../core/logging';
import {
    DEFAULT_KIND,
    elementType,
    type Arithmetic,
    type ElementBuffer,
    type ElementKind,
    type ElementOf,
    type ElementType,
    type FloatKind,
} from './element-types';
import { formatVector } from './format';
import { maxBefore, nthElement, type Comparator } from './selection';

// ==================== Types ====================

/**
 * Outcome of a max/min query: the winning value when it is unique, otherwise the
 * ascending indices of every tied element
 */
export type Extremum<T extends Arithmetic> =
    | { readonly kind: 'value'; readonly value: T }
    | { readonly kind: 'indices'; readonly indices: readonly number[] };

// ==================== Helpers ====================

function emit(event: VectorEventType, operation: string, kind: ElementKind, previousLength: number, length: number): void {
    getConfig().logger.logEvent({
        event,
        level: EVENT_LEVELS[event],
        operation,
        kind,
        previousLength,
        length,
    });
}

function isIterable(value: unknown): value is Iterable<unknown> {
    return typeof value === 'object' && value !== null && Symbol.iterator in value;
}

function isSameValue(a: Arithmetic, b: Arithmetic): boolean {
    return a === b || (typeof a === 'number' && typeof b === 'number' && Number.isNaN(a) && Number.isNaN(b));
}

function checkCount(count: number, what: string): void {
    if (!Number.isSafeInteger(count) || count < 0) {
        throw new InvalidArgumentError(`${what} must be a non-negative integer, got ${count}`, { [what]: count });
    }
}

// ==================== NumericVector ====================

export class NumericVector<K extends ElementKind = typeof DEFAULT_KIND> implements Iterable<ElementOf<K>> {
    readonly kind: K;
    readonly type: ElementType<ElementOf<K>>;
    private storage: ElementBuffer<ElementOf<K>> | null;
    private size: number;

    private constructor(kind: K, storage: ElementBuffer<ElementOf<K>> | null) {
        this.kind = kind;
        this.type = elementType(kind);
        this.storage = storage !== null && storage.length > 0 ? storage : null;
        this.size = this.storage?.length ?? 0;
    }

    // ==================== Construction & Ownership ====================

    /**
     * Empty vector: length 0, no storage
     */
    static empty(): NumericVector;
    static empty<K extends ElementKind>(kind: K): NumericVector<K>;
    static empty(kind: ElementKind = DEFAULT_KIND): NumericVector<ElementKind> {
        return new NumericVector(kind, null);
    }

    /**
     * Vector of `length` zero-valued elements
     */
    static ofLength(length: number): NumericVector;
    static ofLength<K extends ElementKind>(length: number, kind: K): NumericVector<K>;
    static ofLength(length: number, kind: ElementKind = DEFAULT_KIND): NumericVector<ElementKind> {
        return NumericVector.allocate(kind, length, 'ofLength');
    }

    /**
     * Copy the elements of any iterable into a new vector
     */
    static from(values: Iterable<number>): NumericVector;
    static from<K extends ElementKind>(values: Iterable<ElementOf<K>>, kind: K): NumericVector<K>;
    static from(values: Iterable<Arithmetic>, kind: ElementKind = DEFAULT_KIND): NumericVector<ElementKind> {
        return NumericVector.collectInto(kind, values);
    }

    /**
     * Take ownership of a typed array without copying.
     *
     * The buffer's memory is transferred to the vector, which detaches the caller's
     * handle: it reads as length 0 afterwards and can no longer alias the vector.
     * A null or zero-length buffer yields an empty vector.
     */
    static adopt<K extends ElementKind>(kind: K, buffer: ElementBuffer<ElementOf<K>> | null): NumericVector<K> {
        if (buffer === null || buffer.length === 0) {
            return new NumericVector(kind, null);
        }

        const type = elementType(kind);
        if (!type.owns(buffer)) {
            throw new InvalidArgumentError(`Buffer is not a ${kind} typed array`, { kind });
        }
        const backing = buffer.buffer;
        if (!(backing instanceof ArrayBuffer)) {
            throw new InvalidArgumentError('Buffers backed by shared memory cannot be adopted', { kind });
        }

        const owned = structuredClone(buffer, { transfer: [backing] });
        emit('adopt', 'adopt', kind, 0, owned.length);
        return new NumericVector(kind, owned);
    }

    /**
     * Move `source` into a new vector; `source` is left empty
     */
    static move<K extends ElementKind>(source: NumericVector<K>): NumericVector<K> {
        return source.take();
    }

    /**
     * New vector holding `a`'s elements followed by `b`'s; neither input changes
     */
    static concat<K extends ElementKind>(a: NumericVector<K>, b: NumericVector<K>): NumericVector<K> {
        const result = NumericVector.allocate(a.kind, a.size + b.size, 'concat');
        if (result.storage !== null) {
            if (a.storage !== null) result.storage.set(a.storage);
            if (b.storage !== null) result.storage.set(b.storage, a.size);
        }
        return result;
    }

    private static allocate<K extends ElementKind>(kind: K, length: number, operation: string): NumericVector<K> {
        checkCount(length, 'length');
        const vector = new NumericVector(kind, null);
        vector.reallocate(length, vector.type.zero, operation);
        return vector;
    }

    private static collectInto<K extends ElementKind>(kind: K, values: Iterable<unknown>): NumericVector<K> {
        const vector = new NumericVector(kind, null);
        const items = vector.collect(values);
        vector.reallocate(items.length, vector.type.zero, 'from');
        vector.storage?.set(items);
        return vector;
    }

    /**
     * Move this vector's contents into a new vector and leave this one empty
     */
    take(): NumericVector<K> {
        const moved = new NumericVector(this.kind, this.storage);
        emit('move', 'take', this.kind, this.size, 0);
        this.storage = null;
        this.size = 0;
        return moved;
    }

    /**
     * Explicit deep copy into a freshly allocated buffer
     */
    clone(): NumericVector<K> {
        const copy = NumericVector.allocate(this.kind, this.size, 'clone');
        if (copy.storage !== null && this.storage !== null) {
            copy.storage.set(this.storage);
        }
        return copy;
    }

    /**
     * Exchange contents with another vector of the same kind
     */
    swap(other: NumericVector<K>): void {
        const storage = this.storage;
        const size = this.size;
        this.storage = other.storage;
        this.size = other.size;
        other.storage = storage;
        other.size = size;
        emit('move', 'swap', this.kind, size, this.size);
    }

    // ==================== Element Access ====================

    get length(): number {
        return this.size;
    }

    get isEmpty(): boolean {
        return this.size === 0;
    }

    /**
     * Bounds-checked read; fails unless 0 <= index < length
     */
    get(index: number): ElementOf<K> {
        return this.requireStorage(index)[index];
    }

    /**
     * Bounds-checked write; fails unless 0 <= index < length
     */
    set(index: number, value: ElementOf<K>): void {
        this.requireStorage(index)[index] = value;
    }

    /**
     * Read-only window over the live storage.
     * Invalidated by any later resize, insert, erase or clear.
     */
    view(): ArrayLike<ElementOf<K>> {
        return this.storage === null ? [] : this.storage.subarray();
    }

    *values(): IterableIterator<ElementOf<K>> {
        for (let i = 0; i < this.size && this.storage !== null; i++) {
            yield this.storage[i];
        }
    }

    *entries(): IterableIterator<[number, ElementOf<K>]> {
        for (let i = 0; i < this.size && this.storage !== null; i++) {
            yield [i, this.storage[i]];
        }
    }

    [Symbol.iterator](): IterableIterator<ElementOf<K>> {
        return this.values();
    }

    /**
     * Mutable traversal: replace every element with `fn(value, index)`
     */
    update(fn: (value: ElementOf<K>, index: number) => ElementOf<K>): this {
        const storage = this.storage;
        if (storage !== null) {
            for (let i = 0; i < this.size; i++) {
                storage[i] = fn(storage[i], i);
            }
        }
        return this;
    }

    /**
     * Sort in place by `compare` (natural order by default)
     */
    sort(compare: Comparator<ElementOf<K>> = this.type.compare): this {
        this.storage?.sort(compare);
        return this;
    }

    toArray(): ElementOf<K>[] {
        return Array.from(this.values());
    }

    // ==================== Structural Edits ====================

    /**
     * Drop every element and release the storage
     */
    clear(): this {
        this.reallocate(0, this.type.zero, 'clear');
        return this;
    }

    /**
     * Change the length. The common prefix is kept; only slots added when growing
     * receive `fill`.
     */
    resize(length: number, fill: ElementOf<K> = this.type.zero): this {
        checkCount(length, 'length');
        this.reallocate(length, fill, 'resize');
        return this;
    }

    /**
     * New vector holding the elements of [start, end)
     */
    subrange(start: number, end: number): NumericVector<K> {
        if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0) {
            throw new OutOfRangeError(start, this.size, `Invalid subrange [${start}, ${end})`);
        }
        if (start >= end) {
            throw new InvalidRangeError(start, end, this.size);
        }
        if (end > this.size) {
            throw new OutOfRangeError(end, this.size, `Subrange end ${end} exceeds vector length ${this.size}`);
        }

        const sub = NumericVector.allocate(this.kind, end - start, 'subrange');
        if (sub.storage !== null && this.storage !== null) {
            sub.storage.set(this.storage.subarray(start, end));
        }
        return sub;
    }

    /**
     * Insert before `pos` (0 <= pos <= length), shifting the tail right
     */
    insert(pos: number, value: ElementOf<K>): this;
    insert(pos: number, count: number, value: ElementOf<K>): this;
    insert(pos: number, values: Iterable<ElementOf<K>>): this;
    insert(pos: number, valueOrCount: unknown, value?: ElementOf<K>): this {
        if (!Number.isInteger(pos) || pos < 0 || pos > this.size) {
            throw new OutOfRangeError(pos, this.size, `Insert position ${pos} is out of range for vector of length ${this.size}`);
        }

        if (value !== undefined) {
            if (typeof valueOrCount !== 'number') {
                throw new InvalidArgumentError('Insert count must be a number', { count: valueOrCount });
            }
            checkCount(valueOrCount, 'count');
            const gap = this.openGap(pos, valueOrCount);
            gap?.fill(value, pos, pos + valueOrCount);
            return this;
        }

        if (this.type.isElement(valueOrCount)) {
            this.openGap(pos, 1)?.fill(valueOrCount, pos, pos + 1);
            return this;
        }

        if (isIterable(valueOrCount)) {
            const items = this.collect(valueOrCount);
            this.openGap(pos, items.length)?.set(items, pos);
            return this;
        }

        throw new InvalidArgumentError(`Cannot insert ${String(valueOrCount)} into a ${this.kind} vector`);
    }

    /**
     * Remove the element at `pos`, or the elements of [first, last)
     */
    erase(pos: number): this;
    erase(first: number, last: number): this;
    erase(first: number, last?: number): this {
        if (last === undefined) {
            if (!Number.isInteger(first) || first < 0 || first >= this.size) {
                throw new OutOfRangeError(first, this.size);
            }
            return this.closeGap(first, first + 1);
        }

        if (!Number.isInteger(first) || first < 0 || first >= this.size) {
            throw new OutOfRangeError(first, this.size);
        }
        if (!Number.isInteger(last) || last > this.size) {
            throw new OutOfRangeError(last, this.size, `Erase end ${last} exceeds vector length ${this.size}`);
        }
        if (first >= last) {
            throw new InvalidRangeError(first, last, this.size);
        }
        return this.closeGap(first, last);
    }

    // ==================== Reductions & Statistics ====================

    sum(): ElementOf<K> {
        let acc = this.type.zero;
        for (const value of this) acc = this.type.add(acc, value);
        return acc;
    }

    product(): ElementOf<K> {
        let acc = this.type.one;
        for (const value of this) acc = this.type.multiply(acc, value);
        return acc;
    }

    /**
     * sum / length, computed in the element type (integer kinds truncate)
     */
    mean(): ElementOf<K> {
        if (this.size === 0) {
            throw new EmptyVectorError('mean');
        }
        return this.type.divideByCount(this.sum(), this.size);
    }

    /**
     * Middle value; for even lengths, the average of the two middle values.
     * Works on a scratch copy, so the vector itself is not reordered.
     */
    median(): ElementOf<K> {
        const storage = this.storage;
        if (storage === null) {
            throw new EmptyVectorError('median');
        }

        const scratch = storage.slice();
        const middle = this.size >> 1;
        const compare = this.type.compare;
        nthElement(scratch, middle, compare);
        const upper = scratch[middle];
        if (this.size % 2 === 1) {
            return upper;
        }

        return this.type.midpoint(maxBefore(scratch, middle, compare), upper);
    }

    max(): Extremum<ElementOf<K>> {
        return this.extremum('max', (candidate, best) => this.type.compare(candidate, best) > 0);
    }

    min(): Extremum<ElementOf<K>> {
        return this.extremum('min', (candidate, best) => this.type.compare(candidate, best) < 0);
    }

    // ==================== Vector Algebra ====================

    /**
     * Euclidean length: sqrt(dot(this, this))
     */
    magnitude(): ElementOf<K> {
        return this.type.sqrt(this.dot(this));
    }

    /**
     * Scale to unit length in place. A zero vector is left unchanged.
     * Only floating kinds may be normalized.
     */
    normalize(this: NumericVector<FloatKind>): void {
        const magnitude = this.magnitude();
        if (magnitude === 0) {
            return;
        }
        this.scale(1 / magnitude);
    }

    dot(other: NumericVector<K>): ElementOf<K> {
        this.requireSameSize(other, 'dot');
        let acc = this.type.zero;
        if (this.storage !== null && other.storage !== null) {
            for (let i = 0; i < this.size; i++) {
                acc = this.type.add(acc, this.type.multiply(this.storage[i], other.storage[i]));
            }
        }
        return acc;
    }

    /**
     * Multiply every element by `scalar` in place. The scalar is first converted to
     * the element kind, so integer kinds truncate it: `scale(1.9)` on int32 is `scale(1)`.
     */
    scale(scalar: ElementOf<K>): this {
        const factor = typeof scalar === 'number' ? this.type.fromNumber(scalar) : scalar;
        return this.update(value => this.type.multiply(value, factor));
    }

    /**
     * In-place element-wise addition
     */
    addAssign(other: NumericVector<K>): this {
        return this.combine(other, 'addAssign', this.type.add);
    }

    /**
     * In-place element-wise subtraction
     */
    subtractAssign(other: NumericVector<K>): this {
        return this.combine(other, 'subtractAssign', this.type.subtract);
    }

    // ==================== Equality & Ordering ====================

    /**
     * Structural equality: same length and element-wise equal values.
     * NaN equals NaN here, as in `max`/`min` tie detection, so a vector always equals its clone.
     */
    equals(other: NumericVector<K>): boolean {
        if (this.size !== other.size) return false;
        for (let i = 0; i < this.size; i++) {
            if (!isSameValue(this.get(i), other.get(i))) return false;
        }
        return true;
    }

    /**
     * Lexicographic comparison: -1, 0 or 1. A proper prefix orders first.
     */
    compareTo(other: NumericVector<K>): number {
        const shared = Math.min(this.size, other.size);
        for (let i = 0; i < shared; i++) {
            const a = this.get(i);
            const b = other.get(i);
            if (this.type.compare(a, b) < 0) return -1;
            if (this.type.compare(b, a) < 0) return 1;
        }
        return Math.sign(this.size - other.size);
    }

    toString(): string {
        return formatVector(this, getConfig().format);
    }

    // ==================== Internals ====================

    /**
     * Replace the storage with an exact-size buffer holding the common prefix;
     * slots past the old length receive `fill`.
     */
    private reallocate(length: number, fill: ElementOf<K>, operation: string): void {
        const previousLength = this.size;
        if (length === previousLength) {
            return;
        }

        if (length === 0) {
            this.storage = null;
            this.size = 0;
            emit('release', operation, this.kind, previousLength, 0);
            return;
        }

        const next = this.type.allocate(length);
        const kept = Math.min(previousLength, length);
        if (this.storage !== null && kept > 0) {
            next.set(this.storage.subarray(0, kept));
        }
        if (length > kept) {
            next.fill(fill, kept);
        }

        this.storage = next;
        this.size = length;
        emit(previousLength === 0 ? 'allocate' : 'reallocate', operation, this.kind, previousLength, length);
    }

    /**
     * Grow by `count`, move the tail [pos, oldLength) back by `count` and return the
     * storage with the gap [pos, pos + count) ready to be written
     */
    private openGap(pos: number, count: number): ElementBuffer<ElementOf<K>> | null {
        if (count === 0) {
            return null;
        }
        const oldLength = this.size;
        this.reallocate(oldLength + count, this.type.zero, 'insert');
        const storage = this.requireStorage();
        storage.copyWithin(pos + count, pos, oldLength);
        return storage;
    }

    /**
     * Move the tail [last, length) onto `first` and shrink by the removed count
     */
    private closeGap(first: number, last: number): this {
        const storage = this.requireStorage();
        storage.copyWithin(first, last, this.size);
        this.reallocate(this.size - (last - first), this.type.zero, 'erase');
        return this;
    }

    private requireStorage(index?: number): ElementBuffer<ElementOf<K>> {
        if (index !== undefined && (!Number.isInteger(index) || index < 0 || index >= this.size)) {
            throw new OutOfRangeError(index, this.size);
        }
        if (this.storage === null) {
            if (index !== undefined) {
                throw new OutOfRangeError(index, this.size);
            }
            throw new NumvecError(ErrorCodes.INTERNAL_ERROR, 'Vector has no storage');
        }
        return this.storage;
    }

    private requireSameSize(other: NumericVector<K>, operation: string): void {
        if (this.size !== other.size) {
            throw new SizeMismatchError(this.size, other.size, operation);
        }
    }

    private collect(values: Iterable<unknown>): ElementOf<K>[] {
        const items: ElementOf<K>[] = [];
        for (const value of values) {
            if (!this.type.isElement(value)) {
                throw new InvalidArgumentError(`${String(value)} is not a ${this.kind} element`, { kind: this.kind });
            }
            items.push(value);
        }
        return items;
    }

    private combine(
        other: NumericVector<K>,
        operation: string,
        op: (a: ElementOf<K>, b: ElementOf<K>) => ElementOf<K>
    ): this {
        this.requireSameSize(other, operation);
        if (this.storage !== null && other.storage !== null) {
            for (let i = 0; i < this.size; i++) {
                this.storage[i] = op(this.storage[i], other.storage[i]);
            }
        }
        return this;
    }

    private extremum(
        operation: string,
        isBetter: (candidate: ElementOf<K>, best: ElementOf<K>) => boolean
    ): Extremum<ElementOf<K>> {
        const storage = this.storage;
        if (storage === null) {
            throw new EmptyVectorError(operation);
        }

        let best = storage[0];
        for (let i = 1; i < this.size; i++) {
            if (isBetter(storage[i], best)) best = storage[i];
        }

        const indices: number[] = [];
        for (let i = 0; i < this.size; i++) {
            if (isSameValue(storage[i], best)) indices.push(i);
        }

        return indices.length === 1 ? { kind: 'value', value: best } : { kind: 'indices', indices };
    }
}
