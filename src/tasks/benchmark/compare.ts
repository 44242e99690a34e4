/**
 * @module tasks/benchmark/compare
 * @description PSO vs memetic PSO across the registered benchmark functions
 */

import type { Logger } from '../../core/logging';
import {
    getBenchmarkFunction,
    listBenchmarkFunctions,
} from '../../models/numeric/optimization/benchmark-functions';
import { createFiniteDifferenceGradient } from '../../models/numeric/optimization/gradient';
import type { GradientFunction } from '../../models/numeric/optimization/types';
import { mergeComparisonConfig, type ComparisonConfig, type ComparisonOverrides } from './config';
import { runHybridBenchmark, runPsoBenchmark, type RunResult } from './runner';

export interface ComparisonRow {
    functionName: string;
    dimensions: number;
    pso: RunResult;
    hybrid: RunResult;
}

/**
 * Run both optimizers with the same seed on each function.
 *
 * @param createLogger - optional per-run logger factory, given a run name
 */
export function compareOptimizers(
    overrides: ComparisonOverrides = {},
    createLogger?: (run: string) => Logger
): ComparisonRow[] {
    const config: ComparisonConfig = mergeComparisonConfig(overrides);
    const names = config.functions.length > 0 ? config.functions : listBenchmarkFunctions();

    return names.map(name => {
        const fn = getBenchmarkFunction(name);
        const dimensions = fn.fixedDimensions ?? config.dimensions;
        const gradient: GradientFunction = config.gradient === 'analytic' && fn.gradient
            ? fn.gradient
            : createFiniteDifferenceGradient(fn.fitness);

        const psoLogger = createLogger?.(`benchmark/${name}/pso`);
        const hybridLogger = createLogger?.(`benchmark/${name}/hybrid`);
        try {
            const pso = runPsoBenchmark(fn.fitness, dimensions, config.run, { logger: psoLogger });
            const hybrid = runHybridBenchmark(fn.fitness, gradient, dimensions, config.run, { logger: hybridLogger });
            return { functionName: name, dimensions, pso, hybrid };
        } finally {
            psoLogger?.close();
            hybridLogger?.close();
        }
    });
}

/**
 * Markdown table of a comparison
 */
export function formatComparisonTable(rows: readonly ComparisonRow[]): string {
    const headers = [
        'Function',
        'D',
        'PSO best',
        'Hybrid best',
        'PSO ms',
        'Hybrid ms',
        'PSO evals',
        'Hybrid evals',
    ];

    const lines = rows.map(r => [
        r.functionName,
        String(r.dimensions),
        r.pso.bestFitness.toExponential(4),
        r.hybrid.bestFitness.toExponential(4),
        r.pso.elapsedMs.toFixed(1),
        r.hybrid.elapsedMs.toFixed(1),
        String(r.pso.evaluations),
        String(r.hybrid.evaluations),
    ].join(' | '));

    const separator = headers.map(() => '---').join(' | ');

    return [
        headers.join(' | '),
        separator,
        ...lines,
    ].join('\n');
}
