/**
 * @module src/models/numeric
 * @description Numerical methods and optimization
 *
 * Contains:
 * - Vector helpers
 * - Optimization: PSO, memetic PSO, finite-difference gradients
 */

import * as math from './math';
import * as optimization from './optimization';

// Re-export as namespaces
export { math, optimization };

// Direct exports for common functions
export * from './optimization';
