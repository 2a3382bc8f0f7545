/**
 * @module core/errors
 * @description Unified error types and error codes for vector operations
 *
 * Every failure is raised synchronously to the immediate caller. Nothing in the
 * library logs, retries or swallows these errors.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes for numvec
 */
export const ErrorCodes = {
    // Bounds & Shape Errors
    /** Index or position exceeds the valid bound */
    OUT_OF_RANGE: 'OUT_OF_RANGE',
    /** A (first, last) pair violates first < last <= length */
    INVALID_RANGE: 'INVALID_RANGE',
    /** Two operands of a binary operation differ in length */
    SIZE_MISMATCH: 'SIZE_MISMATCH',
    /** Operation requires a minimum dimensionality */
    INVALID_DIMENSION: 'INVALID_DIMENSION',

    // Numeric Errors
    /** Reduction requiring at least one element called on an empty vector */
    EMPTY_VECTOR: 'EMPTY_VECTOR',

    // Validation Errors
    /** Argument of the wrong shape or type (length, buffer kind) */
    INVALID_ARGUMENT: 'INVALID_ARGUMENT',
    /** Configuration validation failed */
    INVALID_CONFIG: 'INVALID_CONFIG',

    /** Internal library error */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class for numvec
 */
export class NumvecError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'NumvecError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, NumvecError);
        }
    }

    /**
     * Convert to JSON-serializable object
     */
    toJSON(): {
        name: string;
        code: ErrorCode;
        message: string;
        details: unknown;
        timestamp: number;
    } {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            timestamp: this.timestamp,
        };
    }
}

/**
 * Index or insertion position outside the vector
 */
export class OutOfRangeError extends NumvecError {
    readonly index: number;
    readonly length: number;

    constructor(index: number, length: number, message?: string) {
        super(
            ErrorCodes.OUT_OF_RANGE,
            message ?? `Index ${index} is out of range for vector of length ${length}`,
            { index, length }
        );
        this.name = 'OutOfRangeError';
        this.index = index;
        this.length = length;
    }
}

/**
 * Half-open range with first >= last
 */
export class InvalidRangeError extends NumvecError {
    readonly first: number;
    readonly last: number;

    constructor(first: number, last: number, length: number) {
        super(
            ErrorCodes.INVALID_RANGE,
            `Invalid range [${first}, ${last}) for vector of length ${length}`,
            { first, last, length }
        );
        this.name = 'InvalidRangeError';
        this.first = first;
        this.last = last;
    }
}

/**
 * Binary operation on vectors of different lengths
 */
export class SizeMismatchError extends NumvecError {
    readonly expected: number;
    readonly actual: number;

    constructor(expected: number, actual: number, operation: string) {
        super(
            ErrorCodes.SIZE_MISMATCH,
            `${operation}: vectors must have the same size (${expected} vs ${actual})`,
            { expected, actual, operation }
        );
        this.name = 'SizeMismatchError';
        this.expected = expected;
        this.actual = actual;
    }
}

/**
 * Vector has fewer dimensions than the operation needs
 */
export class InvalidDimensionError extends NumvecError {
    readonly required: number;
    readonly actual: number;

    constructor(required: number, actual: number, operation: string) {
        super(
            ErrorCodes.INVALID_DIMENSION,
            `${operation} requires at least ${required} dimensions, got ${actual}`,
            { required, actual, operation }
        );
        this.name = 'InvalidDimensionError';
        this.required = required;
        this.actual = actual;
    }
}

export class EmptyVectorError extends NumvecError {
    constructor(operation: string) {
        super(ErrorCodes.EMPTY_VECTOR, `Cannot compute ${operation} of an empty vector`, { operation });
        this.name = 'EmptyVectorError';
    }
}

/**
 * Invalid argument (negative length, foreign buffer)
 */
export class InvalidArgumentError extends NumvecError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.INVALID_ARGUMENT, message, details);
        this.name = 'InvalidArgumentError';
    }
}

/**
 * Configuration rejected by validateConfig
 */
export class ConfigError extends NumvecError {
    readonly errors: string[];

    constructor(errors: string[]) {
        super(ErrorCodes.INVALID_CONFIG, `Invalid configuration: ${errors.join('; ')}`, errors);
        this.name = 'ConfigError';
        this.errors = errors;
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is a NumvecError
 */
export function isNumvecError(error: unknown): error is NumvecError {
    return error instanceof NumvecError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isNumvecError(error) && error.code === code;
}

/**
 * Wrap any error into a NumvecError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): NumvecError {
    if (isNumvecError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new NumvecError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new NumvecError(defaultCode, String(error));
}
