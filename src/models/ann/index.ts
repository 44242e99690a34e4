/**
 * @module ann
 * @description Feed-forward neural network with a flat weight vector,
 * so that its weights can be searched by the swarm optimizers
 */

export * from './activation';
export * from './network';
