/**
 * @module optimization/gradient
 * @description Finite-difference gradient estimators
 *
 * Step size is relative to the coordinate, `h = ε·(1 + |w_d|)`, so it scales
 * with large weights and stays non-zero at the origin.
 */

import { ConfigurationError } from '../../../core/errors';
import { sampleWithoutReplacement, type RandomSource } from '../../../core/repro';
import { copyVector, type ReadonlyVector } from '../math/vector';
import type { GradientFunction } from './types';

// ==================== Types ====================

export type DifferenceScheme = 'forward' | 'central';

export const DEFAULT_FD_EPSILON = 1e-4;

export interface FiniteDifferenceOptions {
    /** Relative step ε (default 1e-4) */
    epsilon?: number;
    /** 'forward' (D + 1 evaluations, default) or 'central' (2D evaluations) */
    scheme?: DifferenceScheme;
}

export interface MiniBatchGradientOptions<S> extends FiniteDifferenceOptions {
    /** Sample pool the batches are drawn from */
    samples: readonly S[];
    /** Samples per batch (default 64); capped at the pool size */
    batchSize?: number;
    /** Loss of weights `w` on one batch */
    batchLoss: (w: ReadonlyVector, batch: readonly S[]) => number;
    rng: RandomSource;
}

// ==================== Finite Differences ====================

export function relativeStep(x: number, epsilon: number): number {
    return epsilon * (1 + Math.abs(x));
}

function resolveOptions(options: FiniteDifferenceOptions): Required<FiniteDifferenceOptions> {
    const epsilon = options.epsilon ?? DEFAULT_FD_EPSILON;
    const scheme = options.scheme ?? 'forward';
    if (!Number.isFinite(epsilon) || epsilon <= 0) {
        throw new ConfigurationError('epsilon', `epsilon must be a positive finite number, got ${epsilon}`, epsilon);
    }
    if (scheme !== 'forward' && scheme !== 'central') {
        throw new ConfigurationError('scheme', `scheme must be 'forward' or 'central'`, scheme);
    }
    return { epsilon, scheme };
}

function estimate(
    loss: (w: ReadonlyVector) => number,
    w: ReadonlyVector,
    epsilon: number,
    scheme: DifferenceScheme
): number[] {
    const probe = copyVector(w);
    const grad = new Array<number>(w.length);

    if (scheme === 'forward') {
        const f0 = loss(probe);
        for (let d = 0; d < w.length; d++) {
            const x = w[d];
            const h = relativeStep(x, epsilon);
            probe[d] = x + h;
            grad[d] = (loss(probe) - f0) / h;
            probe[d] = x;
        }
        return grad;
    }

    for (let d = 0; d < w.length; d++) {
        const x = w[d];
        const h = relativeStep(x, epsilon);
        probe[d] = x + h;
        const fPlus = loss(probe);
        probe[d] = x - h;
        const fMinus = loss(probe);
        probe[d] = x;
        grad[d] = (fPlus - fMinus) / (2 * h);
    }
    return grad;
}

/**
 * Finite-difference gradient of `loss` at `w`. `w` itself is never mutated.
 *
 * @example
 * ```typescript
 * const g = finiteDifferenceGradient(sphere, [1, 2], { scheme: 'central' });
 * // g ≈ [2, 4]
 * ```
 */
export function finiteDifferenceGradient(
    loss: (w: ReadonlyVector) => number,
    w: ReadonlyVector,
    options: FiniteDifferenceOptions = {}
): number[] {
    const { epsilon, scheme } = resolveOptions(options);
    return estimate(loss, w, epsilon, scheme);
}

/**
 * Bind a loss into a `GradientFunction` usable by `HybridSwarm.stepHybrid`
 */
export function createFiniteDifferenceGradient(
    loss: (w: ReadonlyVector) => number,
    options: FiniteDifferenceOptions = {}
): GradientFunction {
    const { epsilon, scheme } = resolveOptions(options);
    return (w) => estimate(loss, w, epsilon, scheme);
}

// ==================== Mini-batch ====================

/**
 * Stochastic gradient: each call draws one fresh batch of
 * `min(batchSize, samples.length)` samples without replacement and uses that
 * same batch for every loss evaluation of the call.
 */
export function createMiniBatchGradient<S>(options: MiniBatchGradientOptions<S>): GradientFunction {
    const { samples, batchLoss, rng } = options;
    const batchSize = options.batchSize ?? 64;
    const { epsilon, scheme } = resolveOptions(options);

    if (!Number.isInteger(batchSize) || batchSize <= 0) {
        throw new ConfigurationError('batchSize', `batchSize must be a positive integer, got ${batchSize}`, batchSize);
    }
    if (samples.length === 0) {
        throw new ConfigurationError('samples', 'samples must not be empty', samples.length);
    }

    return (w) => {
        const batch = sampleWithoutReplacement(rng, samples, batchSize);
        return estimate((probe) => batchLoss(probe, batch), w, epsilon, scheme);
    };
}
