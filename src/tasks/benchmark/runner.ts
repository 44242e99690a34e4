/**
 * @module tasks/benchmark/runner
 * @description Thin drivers running Swarm / HybridSwarm on a bare objective
 *
 * Both drivers log through the `Logger` interface on iteration 1 and on every
 * `logEvery`-th iteration, and keep the same points as a best-fitness history.
 */

import type { Logger } from '../../core/logging';
import { computeConfigHash, createRunConfig } from '../../core/repro';
import { copyVector } from '../../models/numeric/math/vector';
import { HybridSwarm } from '../../models/numeric/optimization/hybrid-swarm';
import { Swarm } from '../../models/numeric/optimization/swarm';
import type {
    FitnessFunction,
    GradientFunction,
    StepReport,
    SwarmView,
} from '../../models/numeric/optimization/types';
import {
    mergeHybridRunConfig,
    mergePsoRunConfig,
    type HybridRunConfig,
    type PsoRunConfig,
} from './config';

// ==================== Types ====================

export interface HistoryPoint {
    iteration: number;
    bestFitness: number;
    elapsedMs: number;
}

export interface RunResult {
    /** Copy of the global best position */
    bestPosition: number[];
    bestFitness: number;
    elapsedMs: number;
    iterations: number;
    /** Total fitness evaluations, refinement included */
    evaluations: number;
    /** Hybrid only: refinement passes that ran */
    refinements: number;
    history: HistoryPoint[];
}

export interface RunHooks {
    logger?: Logger;
    /** Called at every logged iteration */
    onIteration?: (iteration: number, bestFitness: number) => void;
}

// ==================== Shared Loop ====================

export function shouldLog(iteration: number, logEvery: number): boolean {
    return iteration === 1 || iteration % logEvery === 0;
}

interface LoopOutcome {
    elapsedMs: number;
    evaluations: number;
    history: HistoryPoint[];
}

function runLoop(
    view: SwarmView,
    iterations: number,
    logEvery: number,
    step: () => StepReport & { refined?: boolean },
    optimizer: 'pso' | 'hybrid',
    hooks: RunHooks
): LoopOutcome {
    const history: HistoryPoint[] = [];
    let evaluations = 0;
    const startedAt = performance.now();

    for (let it = 1; it <= iterations; it++) {
        const report = step();
        evaluations += report.evaluations;

        if (shouldLog(it, logEvery)) {
            const elapsedMs = performance.now() - startedAt;
            history.push({ iteration: it, bestFitness: view.globalBestFitness, elapsedMs });
            hooks.logger?.logIteration({
                optimizer,
                iteration: it,
                globalBestFitness: view.globalBestFitness,
                elapsedMs,
                refined: report.refined,
            });
            hooks.onIteration?.(it, view.globalBestFitness);
        }
    }

    return { elapsedMs: performance.now() - startedAt, evaluations, history };
}

/**
 * Hyperparameters for the final report, stamped with their RunConfig hash
 */
function reportConfig(
    optimizer: 'pso' | 'hybrid',
    dimensions: number,
    config: PsoRunConfig | HybridRunConfig
): Record<string, unknown> {
    const hyperparams: Record<string, unknown> = { ...config, dimensions };
    const runConfig = createRunConfig({ runName: `${optimizer}/d${dimensions}`, seed: config.seed, hyperparams });
    return { ...hyperparams, configHash: computeConfigHash(runConfig) };
}

// ==================== Drivers ====================

/**
 * Run standard PSO on `fitness` for a fixed number of iterations
 */
export function runPsoBenchmark(
    fitness: FitnessFunction,
    dimensions: number,
    overrides: Partial<PsoRunConfig> = {},
    hooks: RunHooks = {}
): RunResult {
    const config = mergePsoRunConfig(overrides);
    const swarm = new Swarm({
        particleCount: config.particleCount,
        dimensions,
        inertia: config.inertia,
        cognitiveFactor: config.cognitiveFactor,
        socialFactor: config.socialFactor,
        maxVelocity: config.maxVelocity,
        nonFinite: config.nonFinite,
        seed: config.seed,
    });

    const outcome = runLoop(swarm, config.iterations, config.logEvery, () => swarm.step(fitness), 'pso', hooks);

    hooks.logger?.logReport({
        optimizer: 'pso',
        iterations: config.iterations,
        bestFitness: swarm.globalBestFitness,
        elapsedMs: outcome.elapsedMs,
        metrics: { evaluations: outcome.evaluations },
        config: reportConfig('pso', dimensions, config),
    });

    return {
        bestPosition: copyVector(swarm.globalBestPosition),
        bestFitness: swarm.globalBestFitness,
        elapsedMs: outcome.elapsedMs,
        iterations: config.iterations,
        evaluations: outcome.evaluations,
        refinements: 0,
        history: outcome.history,
    };
}

/**
 * Run memetic PSO on `fitness`, refining elites with `gradient`
 */
export function runHybridBenchmark(
    fitness: FitnessFunction,
    gradient: GradientFunction,
    dimensions: number,
    overrides: Partial<HybridRunConfig> = {},
    hooks: RunHooks = {}
): RunResult {
    const config = mergeHybridRunConfig(overrides);
    const hybrid = HybridSwarm.create({
        particleCount: config.particleCount,
        dimensions,
        inertia: config.inertia,
        cognitiveFactor: config.cognitiveFactor,
        socialFactor: config.socialFactor,
        maxVelocity: config.maxVelocity,
        nonFinite: config.nonFinite,
        seed: config.seed,
        gdLearningRate: config.gdLearningRate,
        gdSteps: config.gdSteps,
        gdEliteCount: config.gdEliteCount,
        gdPeriod: config.gdPeriod,
    });

    const outcome = runLoop(hybrid, config.iterations, config.logEvery, () => {
        const report = hybrid.stepHybrid(fitness, gradient);
        if (report.refinement) {
            hooks.logger?.logRefinement({
                iteration: report.refinement.iteration,
                elitesRefined: report.refinement.elites.length,
                accepted: report.refinement.accepted,
                bestFitnessBefore: report.refinement.bestFitnessBefore,
                bestFitnessAfter: report.refinement.bestFitnessAfter,
            });
        }
        return report;
    }, 'hybrid', hooks);

    hooks.logger?.logReport({
        optimizer: 'hybrid',
        iterations: config.iterations,
        bestFitness: hybrid.globalBestFitness,
        elapsedMs: outcome.elapsedMs,
        metrics: { evaluations: outcome.evaluations, refinements: hybrid.refinementCount },
        config: reportConfig('hybrid', dimensions, config),
    });

    return {
        bestPosition: copyVector(hybrid.globalBestPosition),
        bestFitness: hybrid.globalBestFitness,
        elapsedMs: outcome.elapsedMs,
        iterations: config.iterations,
        evaluations: outcome.evaluations,
        refinements: hybrid.refinementCount,
        history: outcome.history,
    };
}
