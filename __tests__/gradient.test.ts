/**
 * Gradient Estimator Tests
 */

import { describe, it, expect } from 'vitest';
import {
    DEFAULT_FD_EPSILON,
    createFiniteDifferenceGradient,
    createMiniBatchGradient,
    finiteDifferenceGradient,
    relativeStep,
} from '../src/models/numeric/optimization/gradient';
import { sphere } from '../src/models/numeric/optimization/benchmark-functions';
import { createRng } from '../src/core/repro';
import { ConfigurationError } from '../src/core/errors';
import type { ReadonlyVector } from '../src/models/numeric/math/vector';
import { counted } from './test-utils';

describe('relativeStep', () => {
    it('scales with the coordinate magnitude', () => {
        expect(relativeStep(0, 1e-4)).toBe(1e-4);
        expect(relativeStep(-3, 1e-4)).toBeCloseTo(4e-4, 15);
        expect(DEFAULT_FD_EPSILON).toBe(1e-4);
    });
});

describe('finiteDifferenceGradient', () => {
    it('forward scheme matches (f(w + h·e) − f(w)) / h', () => {
        // h0 = 2e-4 → 2 + h0; h1 = 3e-4 → 4 + h1
        const g = finiteDifferenceGradient(sphere, [1, 2]);
        expect(g[0]).toBeCloseTo(2.0002, 8);
        expect(g[1]).toBeCloseTo(4.0003, 8);
    });

    it('central scheme is exact on quadratics', () => {
        const g = finiteDifferenceGradient(sphere, [1, 2], { scheme: 'central' });
        expect(g[0]).toBeCloseTo(2, 8);
        expect(g[1]).toBeCloseTo(4, 8);
    });

    it('forward uses D + 1 evaluations and central 2D', () => {
        const loss = counted(sphere);
        finiteDifferenceGradient(loss, [1, 2, 3]);
        expect(loss.calls).toBe(4);

        const central = counted(sphere);
        finiteDifferenceGradient(central, [1, 2, 3], { scheme: 'central' });
        expect(central.calls).toBe(6);
    });

    it('never mutates or hands out the caller vector', () => {
        const w = Object.freeze([0.5, -1.5]);
        const seen: ReadonlyVector[] = [];
        finiteDifferenceGradient((x) => {
            seen.push(x);
            return sphere(x);
        }, w);

        expect(w).toEqual([0.5, -1.5]);
        expect(seen.every(x => x !== w)).toBe(true);
    });

    it('rejects a non-positive epsilon or an unknown scheme', () => {
        expect(() => finiteDifferenceGradient(sphere, [1], { epsilon: 0 })).toThrow(ConfigurationError);
        expect(() => createFiniteDifferenceGradient(sphere, { epsilon: -1 })).toThrow(ConfigurationError);
    });

    it('createFiniteDifferenceGradient binds the loss', () => {
        const gradient = createFiniteDifferenceGradient(sphere, { scheme: 'central' });
        const g = gradient([3, -1]);
        expect(g[0]).toBeCloseTo(6, 7);
        expect(g[1]).toBeCloseTo(-2, 7);
    });
});

describe('createMiniBatchGradient', () => {
    const samples = Array.from({ length: 10 }, (_, i) => i);

    it('uses one fresh batch for every evaluation of a call', () => {
        const batches: (readonly number[])[][] = [];
        let current: (readonly number[])[] = [];
        const gradient = createMiniBatchGradient({
            samples,
            batchSize: 4,
            rng: createRng(3),
            batchLoss: (w, batch) => {
                current.push(batch);
                return sphere(w) + batch.length;
            },
        });

        gradient([1, 2]);
        batches.push(current);
        current = [];
        gradient([1, 2]);
        batches.push(current);

        for (const call of batches) {
            expect(call).toHaveLength(3);
            expect(call.every(b => b === call[0])).toBe(true);
            expect(call[0]).toHaveLength(4);
            expect(new Set(call[0]).size).toBe(4);
            expect(call[0].every(v => samples.includes(v))).toBe(true);
        }
        expect(batches[1][0]).not.toBe(batches[0][0]);
    });

    it('caps the batch at the sample count', () => {
        let size = 0;
        const gradient = createMiniBatchGradient({
            samples,
            batchSize: 64,
            rng: createRng(1),
            batchLoss: (w, batch) => {
                size = batch.length;
                return sphere(w);
            },
        });
        gradient([0]);
        expect(size).toBe(10);
    });

    it('draws reproducible batches from a seeded source', () => {
        const draw = (): number[][] => {
            const seen: number[][] = [];
            const gradient = createMiniBatchGradient({
                samples,
                batchSize: 3,
                rng: createRng(99),
                batchLoss: (w, batch) => {
                    seen.push([...batch]);
                    return sphere(w);
                },
            });
            gradient([1]);
            gradient([1]);
            return seen;
        };
        expect(draw()).toEqual(draw());
    });

    it('matches the full-batch estimate when the batch covers every sample', () => {
        const loss = (w: ReadonlyVector, batch: readonly number[]): number =>
            batch.reduce((s, v) => s + (w[0] - v) ** 2, 0) / batch.length;
        const gradient = createMiniBatchGradient({ samples, batchSize: 10, rng: createRng(5), batchLoss: loss });
        const expected = finiteDifferenceGradient((w) => loss(w, samples), [2]);
        expect(gradient([2])[0]).toBeCloseTo(expected[0], 6);
    });

    it('validates its options', () => {
        const batchLoss = (w: ReadonlyVector): number => sphere(w);
        expect(() => createMiniBatchGradient({ samples: [], rng: createRng(1), batchLoss })).toThrow(ConfigurationError);
        expect(() => createMiniBatchGradient({ samples, batchSize: 0, rng: createRng(1), batchLoss })).toThrow(ConfigurationError);
    });
});
