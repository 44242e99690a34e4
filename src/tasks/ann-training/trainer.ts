/**
 * @module tasks/ann-training/trainer
 * @description Train a one-hidden-layer network with PSO or memetic PSO
 *
 * Pipeline: optional min-max scaling, seeded split, network of topology
 * `[features, hidden, 1]`, fitness = training-set MSE of the candidate weights.
 * The hybrid trainer refines elites with a mini-batch finite-difference
 * gradient that draws a fresh batch on every call.
 */

import { DatasetError } from '../../core/errors';
import { createRng, type SeededRandom } from '../../core/repro';
import { FeedForwardNetwork } from '../../models/ann/network';
import {
    normalizeDataset,
    splitDataset,
    type ColumnRange,
    type Sample,
} from '../../models/data/dataset';
import { createMiniBatchGradient } from '../../models/numeric/optimization/gradient';
import type { FitnessFunction } from '../../models/numeric/optimization/types';
import {
    runHybridBenchmark,
    runPsoBenchmark,
    type HistoryPoint,
    type RunHooks,
    type RunResult,
} from '../benchmark/runner';
import { mergeTrainingConfig, type TrainingConfig } from './config';
import { createMseBatchLoss, createMseObjective, meanSquaredError } from './objective';

// ==================== Types ====================

export interface TrainingResult {
    optimizer: 'pso' | 'hybrid';
    topology: number[];
    bestWeights: number[];
    /** Global best fitness, i.e. training MSE of `bestWeights` */
    trainMse: number;
    validationMse: number;
    trainSize: number;
    validationSize: number;
    elapsedMs: number;
    evaluations: number;
    refinements: number;
    history: HistoryPoint[];
    /** Column ranges used for scaling; absent when `normalize` is off */
    scaling?: {
        featureRanges: ColumnRange[];
        targetRange: ColumnRange;
    };
}

interface PreparedProblem {
    config: TrainingConfig;
    rng: SeededRandom;
    network: FeedForwardNetwork;
    train: Sample[];
    validation: Sample[];
    fitness: FitnessFunction;
    scaling?: TrainingResult['scaling'];
}

// ==================== Preparation ====================

function prepare(samples: readonly Sample[], overrides: Partial<TrainingConfig>): PreparedProblem {
    const config = mergeTrainingConfig(overrides);
    if (samples.length === 0) {
        throw new DatasetError('Dataset contains no rows');
    }

    let data: readonly Sample[] = samples;
    let scaling: TrainingResult['scaling'];
    if (config.normalize) {
        const normalized = normalizeDataset(samples);
        data = normalized.samples;
        scaling = { featureRanges: normalized.featureRanges, targetRange: normalized.targetRange };
    }

    const rng = createRng(config.seed);
    const { train, validation } = splitDataset(data, rng, config.splitRatio);
    if (train.length === 0 || validation.length === 0) {
        throw new DatasetError(
            `Split of ${data.length} rows at ratio ${config.splitRatio} leaves an empty set`,
            { train: train.length, validation: validation.length }
        );
    }

    const network = new FeedForwardNetwork([data[0].features.length, config.hiddenNeurons, 1], rng);
    return {
        config,
        rng,
        network,
        train,
        validation,
        fitness: createMseObjective(network, train),
        scaling,
    };
}

function finish(problem: PreparedProblem, optimizer: 'pso' | 'hybrid', run: RunResult): TrainingResult {
    const { network, train, validation } = problem;
    network.setWeights(run.bestPosition);
    return {
        optimizer,
        topology: [...network.topology],
        bestWeights: run.bestPosition,
        trainMse: run.bestFitness,
        validationMse: meanSquaredError(network, validation),
        trainSize: train.length,
        validationSize: validation.length,
        elapsedMs: run.elapsedMs,
        evaluations: run.evaluations,
        refinements: run.refinements,
        history: run.history,
        scaling: problem.scaling,
    };
}

// ==================== Trainers ====================

/**
 * PSO-only training
 */
export function trainWithPso(
    samples: readonly Sample[],
    overrides: Partial<TrainingConfig> = {},
    hooks: RunHooks = {}
): TrainingResult {
    const problem = prepare(samples, overrides);
    const run = runPsoBenchmark(problem.fitness, problem.network.weightCount, problem.config, hooks);
    return finish(problem, 'pso', run);
}

/**
 * Memetic training: PSO plus periodic mini-batch gradient refinement of elites
 */
export function trainWithHybrid(
    samples: readonly Sample[],
    overrides: Partial<TrainingConfig> = {},
    hooks: RunHooks = {}
): TrainingResult {
    const problem = prepare(samples, overrides);
    const { config } = problem;
    const gradient = createMiniBatchGradient({
        samples: problem.train,
        batchSize: config.gradBatch,
        batchLoss: createMseBatchLoss(problem.network),
        rng: problem.rng,
        epsilon: config.epsilon,
        scheme: config.scheme,
    });
    const run = runHybridBenchmark(problem.fitness, gradient, problem.network.weightCount, config, hooks);
    return finish(problem, 'hybrid', run);
}
