/**
 * @module tasks
 * @description Runnable experiments built on the optimizers
 *
 * - benchmark: PSO vs memetic PSO on classic test functions
 * - ann-training: regression network training
 */

export * as benchmark from './benchmark';
export * as annTraining from './ann-training';
