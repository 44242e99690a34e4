/**
 * @module tasks/ann-training/objective
 * @description Mean-squared-error objectives over a network's flat weights
 */

import { DatasetError } from '../../core/errors';
import type { FeedForwardNetwork } from '../../models/ann/network';
import type { Sample } from '../../models/data/dataset';
import type { ReadonlyVector } from '../../models/numeric/math/vector';
import type { FitnessFunction } from '../../models/numeric/optimization/types';

/**
 * MSE of the network's first output against each sample's target
 */
export function meanSquaredError(network: FeedForwardNetwork, samples: readonly Sample[]): number {
    if (samples.length === 0) {
        throw new DatasetError('Cannot compute MSE over an empty sample set');
    }
    let sum = 0;
    for (const s of samples) {
        const e = network.forward(s.features)[0] - s.target;
        sum += e * e;
    }
    return sum / samples.length;
}

/**
 * Loss of candidate weights on an arbitrary batch.
 * Loads the weights into `network` as a side effect.
 */
export function createMseBatchLoss(
    network: FeedForwardNetwork
): (weights: ReadonlyVector, batch: readonly Sample[]) => number {
    return (weights, batch) => {
        network.setWeights(weights);
        return meanSquaredError(network, batch);
    };
}

/**
 * Fitness of candidate weights: MSE over the whole of `samples`
 */
export function createMseObjective(network: FeedForwardNetwork, samples: readonly Sample[]): FitnessFunction {
    if (samples.length === 0) {
        throw new DatasetError('Training set is empty');
    }
    const loss = createMseBatchLoss(network);
    return (weights) => loss(weights, samples);
}
