/**
 * Test Utilities
 * Common helpers for numerical and optimizer testing
 */

import type { RandomSource } from '../src/core/repro';
import type { Sample } from '../src/models/data/dataset';
import type { ReadonlyVector } from '../src/models/numeric/math/vector';

/**
 * Check if two numbers are approximately equal
 */
export function isClose(a: number, b: number, rtol = 1e-5, atol = 1e-8): boolean {
    return Math.abs(a - b) <= atol + rtol * Math.abs(b);
}

/**
 * Check if two arrays are approximately equal element-wise
 */
export function arraysClose(
    a: readonly number[],
    b: readonly number[],
    rtol = 1e-5,
    atol = 1e-8
): boolean {
    if (a.length !== b.length) return false;
    return a.every((val, i) => isClose(val, b[i], rtol, atol));
}

/**
 * Randomness source replaying a fixed sequence (cyclically)
 */
export function sequenceSource(values: readonly number[]): RandomSource & { calls: number } {
    const source: RandomSource & { calls: number } = {
        calls: 0,
        random(): number {
            const v = values[source.calls % values.length];
            source.calls++;
            return v;
        },
    };
    return source;
}

export interface Counted<R> {
    (x: ReadonlyVector): R;
    calls: number;
}

/**
 * Wrap a vector function so the number of calls is observable
 */
export function counted<R>(fn: (x: ReadonlyVector) => R): Counted<R> {
    const wrapper: Counted<R> = Object.assign((x: ReadonlyVector): R => {
        wrapper.calls++;
        return fn(x);
    }, { calls: 0 });
    return wrapper;
}

/**
 * Noise-free samples of y = slope·x + intercept on an even grid
 */
export function linearSamples(count: number, slope = 2, intercept = 1): Sample[] {
    return Array.from({ length: count }, (_, i) => {
        const x = i / count;
        return { features: [x], target: slope * x + intercept };
    });
}

/**
 * Run `fn` and return what it throws (undefined when it returns normally)
 */
export function catchError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    return undefined;
}
