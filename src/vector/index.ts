/**
 * @module vector
 * @description Owning numeric vector container and the operations built on it
 *
 * ## Modules
 * - `element-types`: Arithmetic element kinds and typed-array storage
 * - `numeric-vector`: The container (ownership, access, edits, reductions)
 * - `operations`: Free functions (dot, cross, add, subtract, concat, ordering)
 * - `selection`: nth-element selection used by `median`
 * - `format`: Printable representations
 */

// ==================== Element Types ====================

export type {
    Arithmetic,
    ElementTypeMap,
    ElementKind,
    FloatKind,
    ElementOf,
    ElementBuffer,
    ElementType,
} from './element-types';

export {
    ELEMENT_TYPES,
    ELEMENT_KINDS,
    DEFAULT_KIND,
    elementType,
    isElementKind,
    isFloatKind,
    bigintSqrt,
} from './element-types';

// ==================== Container ====================

export type { Extremum } from './numeric-vector';

export { NumericVector } from './numeric-vector';

// ==================== Operations ====================

export {
    dot,
    cross,
    add,
    subtract,
    scaled,
    distance,
    concat,
    equals,
    notEquals,
    compare,
    lessThan,
    greaterThan,
    lessOrEqual,
    greaterOrEqual,
} from './operations';

// ==================== Selection ====================

export type { Comparator } from './selection';

export { nthElement } from './selection';

// ==================== Format ====================

export {
    formatVector,
    formatIndices,
    formatExtremum,
} from './format';
