/**
 * Feed-forward Network Tests
 */

import { describe, it, expect } from 'vitest';
import { FeedForwardNetwork, countWeights, createNetwork } from '../src/models/ann/network';
import { sigmoid } from '../src/models/ann/activation';
import { createRng } from '../src/core/repro';
import { ConfigurationError, DimensionMismatchError } from '../src/core/errors';
import { sequenceSource } from './test-utils';

describe('countWeights', () => {
    it.each([
        [[2, 3, 1], 13],
        [[1, 1], 2],
        [[4, 10, 1], 61],
        [[3, 5, 4, 2], 54],
    ])('%j holds %i weights', (topology, expected) => {
        expect(countWeights(topology)).toBe(expected);
    });
});

describe('sigmoid', () => {
    it('is centred at 0.5 and saturates', () => {
        expect(sigmoid(0)).toBe(0.5);
        expect(sigmoid(1)).toBeCloseTo(0.7310585786300049, 15);
        expect(sigmoid(-40)).toBeLessThan(1e-15);
        expect(sigmoid(40)).toBeCloseTo(1, 15);
    });
});

describe('FeedForwardNetwork', () => {
    it('initialises weights in [-1, 1) and biases at zero', () => {
        const net = new FeedForwardNetwork([2, 3, 1], createRng(7));
        const weights = net.getWeights();

        expect(net.weightCount).toBe(13);
        expect(weights).toHaveLength(13);
        [2, 5, 8, 12].forEach(i => expect(weights[i]).toBe(0));
        weights.forEach((w, i) => {
            if ([2, 5, 8, 12].includes(i)) return;
            expect(w).toBeGreaterThanOrEqual(-1);
            expect(w).toBeLessThan(1);
        });
    });

    it('draws one value per connection from the source', () => {
        const rng = sequenceSource([0.75]);
        const net = createNetwork([2, 3, 1], rng);
        expect(rng.calls).toBe(9);
        expect(net.getWeights()).toEqual([0.5, 0.5, 0, 0.5, 0.5, 0, 0.5, 0.5, 0, 0.5, 0.5, 0.5, 0]);
    });

    it('setWeights then getWeights round-trips the flat layout', () => {
        const net = new FeedForwardNetwork([2, 3, 1], createRng(1));
        const flat = Array.from({ length: 13 }, (_, i) => i / 10);
        net.setWeights(flat);
        expect(net.getWeights()).toEqual(flat);
    });

    it('computes sigmoid(w·x + b) per layer', () => {
        const single = new FeedForwardNetwork([1, 1], createRng(1));
        single.setWeights([2, -1]);
        expect(single.forward([1])[0]).toBeCloseTo(0.7310585786300049, 15);

        const pair = new FeedForwardNetwork([2, 1], createRng(1));
        pair.setWeights([1, -1, 0.5]);
        expect(pair.forward([3, 1])).toEqual([sigmoid(2.5)]);
    });

    it('chains hidden activations into the output layer', () => {
        const net = new FeedForwardNetwork([1, 2, 1], createRng(1));
        // hidden: sigmoid(0) twice; output: sigmoid(0.5 + 0.5 + 0)
        net.setWeights([0, 0, 0, 0, 1, 1, 0]);
        expect(net.forward([5])).toEqual([sigmoid(1)]);
        expect(net.inputSize).toBe(1);
        expect(net.outputSize).toBe(1);
    });

    it('rejects vectors of the wrong length', () => {
        const net = new FeedForwardNetwork([2, 3, 1], createRng(1));
        expect(() => net.setWeights(new Array(12).fill(0))).toThrow(DimensionMismatchError);
        expect(() => net.forward([1])).toThrow(DimensionMismatchError);
    });

    it.each([
        [[3]],
        [[2, 0, 1]],
        [[2, 1.5, 1]],
    ])('rejects topology %j', (topology) => {
        expect(() => new FeedForwardNetwork(topology, createRng(1))).toThrow(ConfigurationError);
    });

    it('freezes its topology', () => {
        const topology = [2, 3, 1];
        const net = new FeedForwardNetwork(topology, createRng(1));
        topology[1] = 9;
        expect(net.topology).toEqual([2, 3, 1]);
        expect(Object.isFrozen(net.topology)).toBe(true);
    });
});
