/**
 * @packageDocumentation
 * @module numvec
 *
 * numvec: owning, resizable numeric vectors for TypeScript
 *
 * ## Modules
 * - `vector` - The NumericVector container, element kinds, algebra and formatting
 * - `core` - Errors, lifecycle logging and configuration
 *
 * ## Usage Example
 * ```typescript
 * import { NumericVector, cross, formatVector } from 'numvec';
 *
 * const u = NumericVector.from([1, 2, 3]);
 * const v = NumericVector.from([4, 5, 6]);
 *
 * formatVector(cross(u, v));   // '[-3, 6, -3]'
 * u.median();                  // 2
 * ```
 *
 * @license MIT
 */

export * from './src/vector';
export * from './src/core';

// ==================== Version ====================
export const VERSION = '1.0.0';
