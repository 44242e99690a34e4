/**
 * @module optimization/benchmark-functions
 * @description Classic continuous test objectives (all minimised, global minimum 0)
 *
 * | Name       | Minimum at   | Notes                         |
 * |------------|--------------|-------------------------------|
 * | sphere     | 0            | convex, separable             |
 * | rastrigin  | 0            | highly multimodal, A = 10     |
 * | rosenbrock | (1, …, 1)    | narrow curved valley          |
 * | schafferF6 | (0, 0)       | 2-D only                      |
 */

import { ValidationError } from '../../../core/errors';
import { assertLength, type ReadonlyVector } from '../math/vector';
import type { FitnessFunction, GradientFunction } from './types';

const RASTRIGIN_A = 10;
const TWO_PI = 2 * Math.PI;

// ==================== Objectives ====================

/**
 * f(x) = Σ x_i²
 */
export function sphere(x: ReadonlyVector): number {
    let sum = 0;
    for (let i = 0; i < x.length; i++) {
        sum += x[i] * x[i];
    }
    return sum;
}

/**
 * f(x) = A·n + Σ (x_i² − A·cos(2π x_i))
 */
export function rastrigin(x: ReadonlyVector): number {
    let sum = RASTRIGIN_A * x.length;
    for (let i = 0; i < x.length; i++) {
        sum += x[i] * x[i] - RASTRIGIN_A * Math.cos(TWO_PI * x[i]);
    }
    return sum;
}

/**
 * f(x) = Σ_{i<n−1} 100·(x_{i+1} − x_i²)² + (1 − x_i)²
 */
export function rosenbrock(x: ReadonlyVector): number {
    let sum = 0;
    for (let i = 0; i < x.length - 1; i++) {
        const a = x[i + 1] - x[i] * x[i];
        const b = 1 - x[i];
        sum += 100 * a * a + b * b;
    }
    return sum;
}

/**
 * Schaffer F6: 0.5 + (sin²√(x²+y²) − 0.5) / (1 + 0.001·(x²+y²))²
 *
 * @throws DimensionMismatchError unless the input has exactly 2 components
 */
export function schafferF6(x: ReadonlyVector): number {
    assertLength(x, 2, 'schafferF6');
    const r2 = x[0] * x[0] + x[1] * x[1];
    const s = Math.sin(Math.sqrt(r2));
    const denom = 1 + 0.001 * r2;
    return 0.5 + (s * s - 0.5) / (denom * denom);
}

// ==================== Analytical Gradients ====================

export function sphereGradient(x: ReadonlyVector): number[] {
    return x.map(v => 2 * v);
}

export function rastriginGradient(x: ReadonlyVector): number[] {
    return x.map(v => 2 * v + TWO_PI * RASTRIGIN_A * Math.sin(TWO_PI * v));
}

export function rosenbrockGradient(x: ReadonlyVector): number[] {
    const n = x.length;
    const g = new Array<number>(n).fill(0);
    for (let i = 0; i < n - 1; i++) {
        const a = x[i + 1] - x[i] * x[i];
        g[i] += -400 * x[i] * a - 2 * (1 - x[i]);
        g[i + 1] += 200 * a;
    }
    return g;
}

// ==================== Registry ====================

export interface BenchmarkFunction {
    name: string;
    fitness: FitnessFunction;
    /** Analytical gradient, when one is provided */
    gradient?: GradientFunction;
    /** Fixed dimensionality, if the function only accepts one */
    fixedDimensions?: number;
    /** Location of the global minimum for a given dimensionality */
    optimum: (dimensions: number) => number[];
}

export const BENCHMARK_FUNCTIONS: Readonly<Record<string, BenchmarkFunction>> = {
    sphere: {
        name: 'sphere',
        fitness: sphere,
        gradient: sphereGradient,
        optimum: (n) => new Array<number>(n).fill(0),
    },
    rastrigin: {
        name: 'rastrigin',
        fitness: rastrigin,
        gradient: rastriginGradient,
        optimum: (n) => new Array<number>(n).fill(0),
    },
    rosenbrock: {
        name: 'rosenbrock',
        fitness: rosenbrock,
        gradient: rosenbrockGradient,
        optimum: (n) => new Array<number>(n).fill(1),
    },
    schafferF6: {
        name: 'schafferF6',
        fitness: schafferF6,
        fixedDimensions: 2,
        optimum: () => [0, 0],
    },
};

export function listBenchmarkFunctions(): string[] {
    return Object.keys(BENCHMARK_FUNCTIONS);
}

/**
 * @throws ValidationError for an unknown name
 */
export function getBenchmarkFunction(name: string): BenchmarkFunction {
    const fn = Object.prototype.hasOwnProperty.call(BENCHMARK_FUNCTIONS, name)
        ? BENCHMARK_FUNCTIONS[name]
        : undefined;
    if (fn === undefined) {
        throw new ValidationError(`Unknown benchmark function '${name}'`, {
            name,
            available: listBenchmarkFunctions(),
        });
    }
    return fn;
}
