/**
 * @module ann/network
 * @description Fully connected feed-forward network
 *
 * Flat weight layout, consumed in this order:
 *
 * ```
 * for each layer l = 1..L
 *   for each neuron j of layer l
 *     w[j][0..inputs(l)-1], bias[j]
 * ```
 *
 * Topology `[2, 3, 1]` therefore holds 3·(2+1) + 1·(3+1) = 13 weights.
 */

import { ConfigurationError } from '../../core/errors';
import { symmetricUniform, type RandomSource } from '../../core/repro';
import { assertLength, copyVector, type ReadonlyVector } from '../numeric/math/vector';
import { sigmoid } from './activation';

interface DenseLayer {
    inputs: number;
    outputs: number;
    /** outputs × inputs, row-major */
    weights: number[];
    biases: number[];
}

function validateTopology(topology: readonly number[]): void {
    if (topology.length < 2) {
        throw new ConfigurationError('topology', 'topology needs at least an input and an output layer', [...topology]);
    }
    topology.forEach((size, i) => {
        if (!Number.isInteger(size) || size <= 0) {
            throw new ConfigurationError('topology', `layer ${i} size must be a positive integer, got ${size}`, [...topology]);
        }
    });
}

/**
 * Number of weights (including biases) a topology needs
 */
export function countWeights(topology: readonly number[]): number {
    let count = 0;
    for (let l = 1; l < topology.length; l++) {
        count += topology[l] * (topology[l - 1] + 1);
    }
    return count;
}

export class FeedForwardNetwork {
    readonly topology: readonly number[];
    readonly weightCount: number;
    private readonly layers: DenseLayer[];

    /**
     * @param topology - `[inputs, hidden…, outputs]`
     * @param rng - source for the initial U(−1, 1) weights; biases start at 0
     */
    constructor(topology: readonly number[], rng: RandomSource) {
        validateTopology(topology);
        this.topology = Object.freeze([...topology]);
        this.weightCount = countWeights(topology);

        this.layers = [];
        for (let l = 1; l < topology.length; l++) {
            const inputs = topology[l - 1];
            const outputs = topology[l];
            const weights = new Array<number>(inputs * outputs);
            for (let j = 0; j < outputs; j++) {
                for (let i = 0; i < inputs; i++) {
                    weights[j * inputs + i] = symmetricUniform(rng, 1);
                }
            }
            this.layers.push({ inputs, outputs, weights, biases: new Array<number>(outputs).fill(0) });
        }
    }

    get inputSize(): number {
        return this.topology[0];
    }

    get outputSize(): number {
        return this.topology[this.topology.length - 1];
    }

    /**
     * Load a flat weight vector
     *
     * @throws DimensionMismatchError unless `weights.length === weightCount`
     */
    setWeights(weights: ReadonlyVector): void {
        assertLength(weights, this.weightCount, 'setWeights');
        let pos = 0;
        for (const layer of this.layers) {
            for (let j = 0; j < layer.outputs; j++) {
                for (let i = 0; i < layer.inputs; i++) {
                    layer.weights[j * layer.inputs + i] = weights[pos++];
                }
                layer.biases[j] = weights[pos++];
            }
        }
    }

    /**
     * Current weights in the flat layout
     */
    getWeights(): number[] {
        const out: number[] = [];
        for (const layer of this.layers) {
            for (let j = 0; j < layer.outputs; j++) {
                for (let i = 0; i < layer.inputs; i++) {
                    out.push(layer.weights[j * layer.inputs + i]);
                }
                out.push(layer.biases[j]);
            }
        }
        return out;
    }

    /**
     * Propagate one input vector; sigmoid on every layer
     *
     * @throws DimensionMismatchError unless `input.length === inputSize`
     */
    forward(input: ReadonlyVector): number[] {
        assertLength(input, this.inputSize, 'forward input');
        let activations = copyVector(input);
        for (const layer of this.layers) {
            const next = new Array<number>(layer.outputs);
            for (let j = 0; j < layer.outputs; j++) {
                let sum = layer.biases[j];
                const row = j * layer.inputs;
                for (let i = 0; i < layer.inputs; i++) {
                    sum += layer.weights[row + i] * activations[i];
                }
                next[j] = sigmoid(sum);
            }
            activations = next;
        }
        return activations;
    }
}

export function createNetwork(topology: readonly number[], rng: RandomSource): FeedForwardNetwork {
    return new FeedForwardNetwork(topology, rng);
}
