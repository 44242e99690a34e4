/**
 * @packageDocumentation
 * @module memetic-pso
 *
 * Particle Swarm Optimization with periodic gradient-descent refinement
 * of elite particles (memetic PSO).
 *
 * ## Modules
 * - `core` - Logging, reproducibility (seeded RNG, run configs) and errors
 * - `numeric` - Swarm, HybridSwarm, gradient estimators, benchmark objectives
 * - `ann` - Feed-forward network with a flat weight vector
 * - `data` - Dataset parsing, scaling and splitting
 * - `tasks` - Benchmark comparison and network training drivers
 *
 * ## Usage Example
 * ```typescript
 * import { numeric } from 'memetic-pso';
 *
 * const swarm = numeric.createHybridSwarm({ particleCount: 30, dimensions: 5, seed: 1 });
 * for (let i = 0; i < 200; i++) {
 *     swarm.stepHybrid(numeric.rastrigin, numeric.rastriginGradient);
 * }
 * console.log(swarm.globalBestFitness);
 * ```
 *
 * @license MIT
 */

// ==================== Core ====================
export * as core from './src/core';

// ==================== Models ====================
export * as numeric from './src/models/numeric';
export * as ann from './src/models/ann';
export * as data from './src/models/data';

// ==================== Tasks ====================
export * as tasks from './src/tasks';

// ==================== Version ====================
export const VERSION = '1.0.0';
