/**
 * @module math/vector
 * @description Dense real-vector helpers used by the swarm engine and estimators.
 * Vectors are plain `number[]`; nothing here allocates unless it says so.
 */

import { DimensionMismatchError } from '../../../core/errors';

/**
 * Read-only vector view handed to callers
 */
export type ReadonlyVector = readonly number[];

/**
 * Allocate a zero vector of length n
 */
export function zeros(n: number): number[] {
    return new Array<number>(n).fill(0);
}

/**
 * Shallow copy of a vector
 */
export function copyVector(v: ReadonlyVector): number[] {
    return v.slice();
}

/**
 * Overwrite `target` with the contents of `source` (lengths must match)
 */
export function copyInto(target: number[], source: ReadonlyVector): void {
    for (let i = 0; i < source.length; i++) {
        target[i] = source[i];
    }
}

/**
 * Set every component to zero in place
 */
export function fillZero(v: number[]): void {
    v.fill(0);
}

/**
 * In-place update: a += s * b
 */
export function axpyInPlace(a: number[], s: number, b: ReadonlyVector): void {
    for (let i = 0; i < a.length; i++) {
        a[i] += s * b[i];
    }
}

/**
 * Clamp a scalar to [-limit, limit]
 */
export function clampSymmetric(x: number, limit: number): number {
    return Math.max(-limit, Math.min(limit, x));
}

/**
 * Index of the first NaN/Infinity component, or -1
 */
export function firstNonFiniteIndex(v: ReadonlyVector): number {
    for (let i = 0; i < v.length; i++) {
        if (!Number.isFinite(v[i])) return i;
    }
    return -1;
}

/**
 * Throw DimensionMismatchError unless `v.length === expected`
 */
export function assertLength(v: ReadonlyVector, expected: number, context: string): void {
    if (v.length !== expected) {
        throw new DimensionMismatchError(context, expected, v.length);
    }
}
