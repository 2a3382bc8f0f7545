#!/usr/bin/env npx tsx
/**
 * @module benchmarks/vector/simple-example
 * @description Simple example demonstrating NumericVector usage
 *
 * This example shows how to:
 * 1. Build vectors and watch their buffer lifecycle through a logger
 * 2. Compute reductions and extrema
 * 3. Compare quickselect median against a full sort
 *
 * Usage:
 *   npx tsx benchmarks/vector/simple-example.ts
 */

import {
    NumericVector,
    ConsoleLogger,
    configure,
    resetConfig,
    cross,
    dot,
    formatExtremum,
} from '../../index';

import { SeededRNG } from '../../__tests__/test-utils';

// ==========================================
// Configuration
// ==========================================

const SIZES = [1_000, 10_000, 100_000];
const TRIALS = 5;

// ==========================================
// Timing
// ==========================================

interface TimingRow {
    size: number;
    medianMs: number;
    sortMs: number;
}

function timeMedian(size: number, rng: SeededRNG): TimingRow {
    let medianMs = 0;
    let sortMs = 0;

    for (let t = 0; t < TRIALS; t++) {
        const v = NumericVector.from(rng.nextArray(size, -1000, 1000));

        let start = performance.now();
        const fast = v.median();
        medianMs += performance.now() - start;

        start = performance.now();
        const sorted = v.clone().sort();
        const mid = size >> 1;
        const slow = size % 2 === 1 ? sorted.get(mid) : (sorted.get(mid - 1) + sorted.get(mid)) / 2;
        sortMs += performance.now() - start;

        if (fast !== slow) {
            throw new Error(`median mismatch at size ${size}: ${fast} vs ${slow}`);
        }
    }

    return { size, medianMs: medianMs / TRIALS, sortMs: sortMs / TRIALS };
}

// ==========================================
// Main
// ==========================================

function main(): void {
    console.log('');
    console.log('============================================================');
    console.log('     NumericVector - Simple Example                         ');
    console.log('============================================================');
    console.log('');

    // Lifecycle events
    console.log('Buffer lifecycle (debug logger):');
    configure({ logger: new ConsoleLogger('debug') });
    const v = NumericVector.from([4, 1, 3]);
    v.insert(1, [9, 9]);
    v.erase(0);
    v.resize(6, 2);
    v.clear();
    resetConfig();
    console.log('');

    // Reductions
    const w = NumericVector.from([3, 7, 7, 1, 5]);
    console.log(`Vector:  ${w}`);
    console.log(`  sum=${w.sum()} mean=${w.mean()} median=${w.median()}`);
    console.log(`  max=${formatExtremum(w.max())} min=${formatExtremum(w.min())}`);
    console.log(`  |w|=${w.magnitude().toFixed(4)}`);

    const a = NumericVector.from([1, 2, 3, 4]);
    const b = NumericVector.from([5, 6, 7, 8]);
    console.log(`a . b = ${dot(a, b)}`);
    console.log(`a x b = ${cross(a, b)}`);
    console.log('');

    // Median timing
    const rng = new SeededRNG(42);
    const rows = SIZES.map(size => timeMedian(size, rng));

    console.log('Median vs full sort:');
    console.log('='.repeat(48));
    console.log('| Size       | Quickselect (ms) | Sort (ms)    |');
    console.log('|------------|------------------|--------------|');
    for (const row of rows) {
        const size = String(row.size).padEnd(10);
        const fast = row.medianMs.toFixed(3).padStart(16);
        const slow = row.sortMs.toFixed(3).padStart(12);
        console.log(`| ${size} | ${fast} | ${slow} |`);
    }
    console.log('='.repeat(48));

    console.log('\n[OK] Example completed!');
    console.log('');
}

main();
