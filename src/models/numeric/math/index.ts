/**
 * @module math
 * @description Vector utilities
 */

export * from './vector';
