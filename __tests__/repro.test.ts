/**
 * Reproducibility Tests
 */

import { describe, it, expect } from 'vitest';
import {
    SeededRandom,
    computeConfigHash,
    createRng,
    createRunConfig,
    deserializeRunConfig,
    sampleWithoutReplacement,
    serializeRunConfig,
    shuffleInPlace,
    symmetricUniform,
    validateRunConfig,
} from '../src/core/repro';
import { ValidationError } from '../src/core/errors';
import { sequenceSource } from './test-utils';

describe('SeededRandom', () => {
    it('produces the same stream for the same seed', () => {
        const a = createRng(123);
        const b = createRng(123);
        const xs = Array.from({ length: 20 }, () => a.random());
        const ys = Array.from({ length: 20 }, () => b.random());
        expect(xs).toEqual(ys);
        expect(xs.every(x => x >= 0 && x < 1)).toBe(true);
    });

    it('differs between seeds', () => {
        expect(createRng(1).random()).not.toBe(createRng(2).random());
    });

    it('restores a saved state', () => {
        const rng = new SeededRandom(9);
        rng.random();
        const state = rng.getState();
        const next = rng.random();
        rng.setState(state);
        expect(rng.random()).toBe(next);
    });

    it('randint and uniform stay in range', () => {
        const rng = createRng(5);
        for (let i = 0; i < 100; i++) {
            const k = rng.randint(3, 7);
            expect(Number.isInteger(k)).toBe(true);
            expect(k).toBeGreaterThanOrEqual(3);
            expect(k).toBeLessThan(7);
            const u = rng.uniform(-2, 2);
            expect(u).toBeGreaterThanOrEqual(-2);
            expect(u).toBeLessThan(2);
        }
    });
});

describe('sampling helpers', () => {
    it('shuffleInPlace is a Fisher-Yates pass', () => {
        // draws of 0 always pick j = 0
        expect(shuffleInPlace(sequenceSource([0]), [1, 2, 3])).toEqual([2, 3, 1]);
    });

    it('sampleWithoutReplacement leaves the input untouched', () => {
        const items = [1, 2, 3, 4, 5];
        const picked = sampleWithoutReplacement(createRng(4), items, 3);
        expect(items).toEqual([1, 2, 3, 4, 5]);
        expect(picked).toHaveLength(3);
        expect(new Set(picked).size).toBe(3);
        expect(sampleWithoutReplacement(createRng(4), items, 10)).toHaveLength(5);
        expect(sampleWithoutReplacement(createRng(4), items, -1)).toEqual([]);
    });

    it('symmetricUniform maps [0, 1) onto [-range, range)', () => {
        expect(symmetricUniform(sequenceSource([0.75]), 2)).toBe(1);
        expect(symmetricUniform(sequenceSource([0]), 3)).toBe(-3);
    });
});

describe('RunConfig', () => {
    const input = {
        runName: 'benchmark/sphere/hybrid',
        seed: 42,
        hyperparams: { gdPeriod: 10, inertia: 0.729 },
    };

    it('serializes with sorted keys and round-trips', () => {
        const config = createRunConfig(input);
        const json = serializeRunConfig(config);
        expect(Object.keys(JSON.parse(json))).toEqual(['createdAt', 'hyperparams', 'libraryVersion', 'runName', 'seed']);
        expect(deserializeRunConfig(json)).toEqual({ ...config, description: undefined });
    });

    it('hashes only reproducibility-relevant fields', () => {
        const a = createRunConfig(input);
        const b = { ...createRunConfig({ ...input, hyperparams: { inertia: 0.729, gdPeriod: 10 } }), createdAt: 0 };
        expect(computeConfigHash(a)).toBe(computeConfigHash(b));
        expect(computeConfigHash(a)).toHaveLength(16);
        expect(computeConfigHash(createRunConfig({ ...input, seed: 43 }))).not.toBe(computeConfigHash(a));
    });

    it('validates required fields', () => {
        expect(validateRunConfig(createRunConfig(input)).valid).toBe(true);
        const bad = validateRunConfig({ ...createRunConfig(input), runName: '', seed: 1.5 });
        expect(bad.valid).toBe(false);
        expect(bad.errors).toHaveLength(2);
    });

    it('rejects non-object JSON', () => {
        expect(() => deserializeRunConfig('[1, 2]')).toThrow(ValidationError);
    });
});
