/**
 * @module core/repro
 * @description Reproducibility primitives for optimization runs
 *
 * Provides the randomness-source contract threaded through swarms, networks and
 * samplers, a seeded generator, and RunConfig records with a stable hash so that
 * reported results can be traced back to the exact hyperparameters that produced them.
 */

import { ValidationError } from './errors';

// Core version - should match package.json
const CORE_VERSION = '1.0.0';

// ==================== Browser-compatible Hash ====================

/**
 * djb2 string hash, hex encoded
 */
function simpleHash(str: string): string {
    let hash = 5381;
    for (let i = 0; i < str.length; i++) {
        hash = ((hash << 5) + hash) ^ str.charCodeAt(i);
    }
    return (hash >>> 0).toString(16).padStart(8, '0');
}

function createHash(data: string): string {
    const h1 = simpleHash(data);
    const h2 = simpleHash(data + h1);
    return h1 + h2;
}

// ==================== Randomness Source ====================

/**
 * Source of uniform draws in [0, 1)
 *
 * Every stochastic component takes one of these explicitly instead of reaching
 * for `Math.random()`, so runs are reproducible and generators can be given
 * per worker when evaluation is parallelised.
 */
export interface RandomSource {
    random(): number;
}

/**
 * Seeded random number generator (Mulberry32)
 */
export class SeededRandom implements RandomSource {
    private state: number;

    constructor(seed: number) {
        this.state = seed >>> 0;
    }

    /**
     * Generate a random float in [0, 1)
     */
    random(): number {
        this.state = (this.state + 0x6D2B79F5) >>> 0;
        let t = this.state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    /**
     * Generate a random integer in [min, max)
     */
    randint(min: number, max: number): number {
        return Math.floor(this.random() * (max - min)) + min;
    }

    /**
     * Generate a random float in [min, max)
     */
    uniform(min: number, max: number): number {
        return this.random() * (max - min) + min;
    }

    /**
     * Shuffle an array in place
     */
    shuffle<T>(array: T[]): T[] {
        return shuffleInPlace(this, array);
    }

    /**
     * Choose n distinct elements from an array (order randomised)
     */
    sample<T>(array: readonly T[], n: number): T[] {
        return sampleWithoutReplacement(this, array, n);
    }

    getState(): number {
        return this.state;
    }

    setState(state: number): void {
        this.state = state >>> 0;
    }
}

/**
 * Create a seeded random number generator
 */
export function createRng(seed: number): SeededRandom {
    return new SeededRandom(seed);
}

/**
 * Derive a fresh seed for runs where the caller did not pin one
 */
export function randomSeed(): number {
    return (Date.now() ^ Math.floor(Math.random() * 0x100000000)) >>> 0;
}

/**
 * Fisher-Yates shuffle driven by any source
 */
export function shuffleInPlace<T>(rng: RandomSource, array: T[]): T[] {
    for (let i = array.length - 1; i > 0; i--) {
        const j = Math.floor(rng.random() * (i + 1));
        [array[i], array[j]] = [array[j], array[i]];
    }
    return array;
}

/**
 * Shuffle a copy and keep the first `min(n, length)` items
 */
export function sampleWithoutReplacement<T>(rng: RandomSource, items: readonly T[], n: number): T[] {
    const shuffled = shuffleInPlace(rng, [...items]);
    return shuffled.slice(0, Math.max(0, Math.min(n, shuffled.length)));
}

/**
 * Uniform draw in [-range, range) from any source
 */
export function symmetricUniform(rng: RandomSource, range: number): number {
    return (rng.random() * 2 - 1) * range;
}

// ==================== Run Config ====================

/**
 * Everything needed to reproduce an optimization run
 */
export interface RunConfig {
    /** Run identifier (e.g. 'benchmark/sphere/hybrid') */
    runName: string;
    /** Random seed */
    seed: number;
    /** Library version that produced the run */
    libraryVersion: string;
    /** Timestamp when config was created */
    createdAt: number;
    /** Optimizer hyperparameters */
    hyperparams: Record<string, unknown>;
    /** Optional description */
    description?: string;
}

export interface RunConfigInput {
    runName: string;
    seed: number;
    hyperparams: Record<string, unknown>;
    description?: string;
}

/**
 * Validation result for RunConfig
 */
export interface ValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

export function createRunConfig(input: RunConfigInput): RunConfig {
    return {
        runName: input.runName,
        seed: input.seed,
        libraryVersion: CORE_VERSION,
        createdAt: Date.now(),
        hyperparams: input.hyperparams,
        description: input.description,
    };
}

/**
 * Serialize RunConfig to a canonical JSON string (sorted keys)
 */
export function serializeRunConfig(config: RunConfig): string {
    return JSON.stringify(sortObjectKeys(config), null, 2);
}

/**
 * Deserialize JSON string to RunConfig
 */
export function deserializeRunConfig(json: string): RunConfig {
    const parsed: unknown = JSON.parse(json);
    return normalizeRunConfig(parsed);
}

/**
 * Hash of the reproducibility-relevant fields (timestamp excluded)
 */
export function computeConfigHash(config: RunConfig): string {
    const essential = {
        runName: config.runName,
        seed: config.seed,
        hyperparams: sortObjectKeys(config.hyperparams),
    };
    return createHash(JSON.stringify(essential));
}

export function validateRunConfig(config: RunConfig): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!config.runName || typeof config.runName !== 'string') {
        errors.push('runName is required and must be a string');
    }

    if (typeof config.seed !== 'number' || !Number.isInteger(config.seed)) {
        errors.push('seed must be an integer');
    }

    if (typeof config.hyperparams !== 'object' || config.hyperparams === null) {
        errors.push('hyperparams must be an object');
    }

    if (config.libraryVersion !== CORE_VERSION) {
        warnings.push(
            `libraryVersion mismatch: config was created with ${config.libraryVersion}, ` +
            `current version is ${CORE_VERSION}`
        );
    }

    return {
        valid: errors.length === 0,
        errors,
        warnings,
    };
}

// ==================== Utility Functions ====================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Sort object keys recursively for deterministic serialization
 */
function sortObjectKeys(obj: unknown): unknown {
    if (Array.isArray(obj)) {
        return obj.map(sortObjectKeys);
    }
    if (!isRecord(obj)) {
        return obj;
    }

    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(obj).sort()) {
        sorted[key] = sortObjectKeys(obj[key]);
    }
    return sorted;
}

function normalizeRunConfig(parsed: unknown): RunConfig {
    if (!isRecord(parsed)) {
        throw new ValidationError('Invalid RunConfig: must be an object');
    }

    return {
        runName: String(parsed.runName ?? ''),
        seed: Number(parsed.seed ?? 0),
        libraryVersion: String(parsed.libraryVersion ?? CORE_VERSION),
        createdAt: Number(parsed.createdAt ?? Date.now()),
        hyperparams: isRecord(parsed.hyperparams) ? parsed.hyperparams : {},
        description: parsed.description !== undefined ? String(parsed.description) : undefined,
    };
}
