/**
 * @module tasks/benchmark
 * @description PSO vs memetic PSO on classic test functions
 *
 * ## Usage
 * ```typescript
 * import { tasks, numeric } from 'memetic-pso';
 *
 * const result = tasks.benchmark.runHybridBenchmark(
 *     numeric.rastrigin,
 *     numeric.rastriginGradient,
 *     10,
 *     { iterations: 500, seed: 7 },
 * );
 * ```
 */

export * from './config';
export * from './runner';
export * from './compare';
