/**
 * Test Utilities for numvec
 * Provides common helpers for numerical testing
 */

import { MemoryLogger, configure, resetConfig } from '../src/core';

/**
 * Check if two numbers are approximately equal
 */
export function isClose(a: number, b: number, rtol = 1e-5, atol = 1e-8): boolean {
    return Math.abs(a - b) <= atol + rtol * Math.abs(b);
}

/**
 * Check if two arrays are approximately equal element-wise
 */
export function arraysClose(
    a: ArrayLike<number>,
    b: ArrayLike<number>,
    rtol = 1e-5,
    atol = 1e-8
): boolean {
    if (a.length !== b.length) return false;
    return Array.from(a).every((val, i) => isClose(val, b[i], rtol, atol));
}

/**
 * Seeded random number generator for deterministic tests
 */
export class SeededRNG {
    private seed: number;

    constructor(seed: number = 42) {
        this.seed = seed;
    }

    next(): number {
        this.seed = (this.seed * 1103515245 + 12345) % 2147483648;
        return this.seed / 2147483648;
    }

    nextInRange(min: number, max: number): number {
        return min + this.next() * (max - min);
    }

    nextInt(min: number, max: number): number {
        return Math.floor(this.nextInRange(min, max + 1));
    }

    nextArray(length: number, min = 0, max = 1): number[] {
        return Array.from({ length }, () => this.nextInRange(min, max));
    }

    nextIntArray(length: number, min: number, max: number): number[] {
        return Array.from({ length }, () => this.nextInt(min, max));
    }

    reset(seed?: number): void {
        this.seed = seed ?? 42;
    }
}

/**
 * Install a MemoryLogger as the library logger; call `resetConfig` afterwards
 */
export function captureEvents(): MemoryLogger {
    const logger = new MemoryLogger({ source: 'test' });
    configure({ logger });
    return logger;
}

export { resetConfig };
