/**
 * Benchmark Function Tests
 */

import { describe, it, expect } from 'vitest';
import {
    BENCHMARK_FUNCTIONS,
    getBenchmarkFunction,
    listBenchmarkFunctions,
    rastrigin,
    rastriginGradient,
    rosenbrock,
    rosenbrockGradient,
    schafferF6,
    sphere,
    sphereGradient,
} from '../src/models/numeric/optimization/benchmark-functions';
import { finiteDifferenceGradient } from '../src/models/numeric/optimization/gradient';
import { DimensionMismatchError, ValidationError } from '../src/core/errors';
import { arraysClose } from './test-utils';

describe('objective values', () => {
    it('sphere sums squares', () => {
        expect(sphere([1, 2, 3])).toBe(14);
        expect(sphere([])).toBe(0);
    });

    it('rastrigin is zero at the origin', () => {
        expect(rastrigin([0, 0, 0, 0, 0])).toBe(0);
        expect(rastrigin([1])).toBeCloseTo(1, 12);
        expect(rastrigin([0.5])).toBeCloseTo(10 + 0.25 + 10, 12);
    });

    it('rosenbrock is zero at (1, …, 1)', () => {
        expect(rosenbrock([1, 1, 1])).toBe(0);
        expect(rosenbrock([0, 0])).toBe(1);
        expect(rosenbrock([7])).toBe(0);
    });

    it('schafferF6 is zero at the origin and 2-D only', () => {
        expect(schafferF6([0, 0])).toBe(0);
        expect(() => schafferF6([1, 2, 3])).toThrow(DimensionMismatchError);
        expect(() => schafferF6([1])).toThrow(DimensionMismatchError);
    });
});

describe('analytical gradients', () => {
    it('sphere gradient is 2x', () => {
        expect(sphereGradient([1, -2])).toEqual([2, -4]);
    });

    it.each([
        ['rastrigin', rastrigin, rastriginGradient, [0.3, -0.7, 1.2]],
        ['rosenbrock', rosenbrock, rosenbrockGradient, [0.5, -0.3, 0.8]],
    ])('%s gradient agrees with central differences', (_name, f, grad, x) => {
        const numeric = finiteDifferenceGradient(f, x, { scheme: 'central', epsilon: 1e-6 });
        expect(arraysClose(grad(x), numeric, 1e-5, 1e-5)).toBe(true);
    });

    it('vanish at the optima', () => {
        expect(rastriginGradient([0, 0]).every(v => Math.abs(v) < 1e-12)).toBe(true);
        expect(rosenbrockGradient([1, 1, 1])).toEqual([0, 0, 0]);
    });
});

describe('registry', () => {
    it('lists every function', () => {
        expect(listBenchmarkFunctions()).toEqual(['sphere', 'rastrigin', 'rosenbrock', 'schafferF6']);
    });

    it('resolves functions by name with their optimum', () => {
        const fn = getBenchmarkFunction('rosenbrock');
        expect(fn.fitness(fn.optimum(4))).toBe(0);
        expect(BENCHMARK_FUNCTIONS.schafferF6.fixedDimensions).toBe(2);
        expect(BENCHMARK_FUNCTIONS.schafferF6.gradient).toBeUndefined();
    });

    it('rejects unknown names', () => {
        expect(() => getBenchmarkFunction('ackley')).toThrow(ValidationError);
        expect(() => getBenchmarkFunction('toString')).toThrow(ValidationError);
    });
});
