/**
 * @module src/models
 * @description Models for swarm optimization
 *
 * - numeric/: vector helpers, swarm optimizers, gradient estimators, benchmark objectives
 * - ann/: feed-forward network with a flat weight vector
 * - data/: tabular dataset parsing, scaling and splitting
 */

export * as numeric from './numeric';
export * as ann from './ann';
export * as data from './data';
