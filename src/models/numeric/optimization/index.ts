/**
 * @module optimization
 * @description Swarm optimizers and gradient estimators
 *
 * Provides:
 * - Swarm: standard global-best PSO
 * - HybridSwarm: PSO with periodic gradient-descent refinement of elites
 * - Finite-difference and mini-batch gradient estimators
 * - Benchmark objectives
 */

export * from './types';
export * from './config';
export * from './particle';
export * from './swarm';
export * from './hybrid-swarm';
export * from './gradient';
export * from './benchmark-functions';
