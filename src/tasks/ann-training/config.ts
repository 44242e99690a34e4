/**
 * @module tasks/ann-training/config
 * @description Network training configuration
 */

import { ConfigurationError } from '../../core/errors';
import { DEFAULT_FD_EPSILON, type DifferenceScheme } from '../../models/numeric/optimization/gradient';
import { DEFAULT_SPLIT_RATIO } from '../../models/data/dataset';
import { DEFAULT_HYBRID_RUN_CONFIG, validateHybridRunConfig, type HybridRunConfig } from '../benchmark/config';

// ==================== Types ====================

/**
 * Training settings: the hybrid driver settings plus network, data and gradient options.
 * `trainWithPso` ignores the refinement and gradient fields.
 */
export interface TrainingConfig extends HybridRunConfig {
    /** Neurons in the single hidden layer */
    hiddenNeurons: number;
    /** Share of rows used for training */
    splitRatio: number;
    /** Min-max scale features and target to [0, 1] before splitting */
    normalize: boolean;
    /** Mini-batch size of each gradient estimate */
    gradBatch: number;
    /** Relative finite-difference step */
    epsilon: number;
    scheme: DifferenceScheme;
}

// ==================== Defaults ====================

export const DEFAULT_TRAINING_CONFIG: TrainingConfig = {
    ...DEFAULT_HYBRID_RUN_CONFIG,
    particleCount: 50,
    iterations: 1000,
    seed: 42,
    logEvery: 100,
    hiddenNeurons: 10,
    splitRatio: DEFAULT_SPLIT_RATIO,
    normalize: true,
    gradBatch: 64,
    epsilon: DEFAULT_FD_EPSILON,
    scheme: 'forward',
};

// ==================== Merge Function ====================

export function mergeTrainingConfig(overrides: Partial<TrainingConfig> = {}): TrainingConfig {
    const config: TrainingConfig = { ...DEFAULT_TRAINING_CONFIG, ...overrides };
    validateHybridRunConfig(config);

    if (!Number.isInteger(config.hiddenNeurons) || config.hiddenNeurons <= 0) {
        throw new ConfigurationError('hiddenNeurons', `hiddenNeurons must be a positive integer, got ${config.hiddenNeurons}`, config.hiddenNeurons);
    }
    if (!Number.isInteger(config.gradBatch) || config.gradBatch <= 0) {
        throw new ConfigurationError('gradBatch', `gradBatch must be a positive integer, got ${config.gradBatch}`, config.gradBatch);
    }
    return config;
}
