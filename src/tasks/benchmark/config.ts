/**
 * @module tasks/benchmark/config
 * @description Benchmark driver configuration
 */

import { ConfigurationError } from '../../core/errors';
import {
    DEFAULT_REFINEMENT_CONFIG,
    DEFAULT_SWARM_CONFIG,
    validateRefinementConfig,
} from '../../models/numeric/optimization/config';
import type { NonFinitePolicy, RefinementConfig } from '../../models/numeric/optimization/types';

// ==================== Types ====================

/**
 * Standard PSO driver settings
 */
export interface PsoRunConfig {
    iterations: number;
    particleCount: number;
    inertia: number;
    cognitiveFactor: number;
    socialFactor: number;
    maxVelocity: number;
    nonFinite: NonFinitePolicy;
    seed: number;
    /** Log on iteration 1 and on every multiple of this */
    logEvery: number;
}

/**
 * Hybrid driver settings: PSO plus the refinement schedule
 */
export interface HybridRunConfig extends PsoRunConfig, RefinementConfig {}

export type GradientSource = 'analytic' | 'finite-difference';

/**
 * Settings for `compareOptimizers`
 */
export interface ComparisonConfig {
    /** Registered function names; empty means all */
    functions: string[];
    /** Dimensionality for functions without a fixed one */
    dimensions: number;
    /** Gradient fed to the hybrid optimizer */
    gradient: GradientSource;
    run: HybridRunConfig;
}

// ==================== Defaults ====================

export const DEFAULT_PSO_RUN_CONFIG: PsoRunConfig = {
    iterations: 1000,
    particleCount: 40,
    inertia: DEFAULT_SWARM_CONFIG.inertia,
    cognitiveFactor: DEFAULT_SWARM_CONFIG.cognitiveFactor,
    socialFactor: DEFAULT_SWARM_CONFIG.socialFactor,
    maxVelocity: DEFAULT_SWARM_CONFIG.maxVelocity,
    nonFinite: DEFAULT_SWARM_CONFIG.nonFinite,
    seed: 42,
    logEvery: 1,
};

export const DEFAULT_HYBRID_RUN_CONFIG: HybridRunConfig = {
    ...DEFAULT_PSO_RUN_CONFIG,
    ...DEFAULT_REFINEMENT_CONFIG,
};

export const DEFAULT_COMPARISON_CONFIG: ComparisonConfig = {
    functions: [],
    dimensions: 10,
    gradient: 'finite-difference',
    run: { ...DEFAULT_HYBRID_RUN_CONFIG, logEvery: 100 },
};

// ==================== Merge Functions ====================

export function validatePsoRunConfig(config: PsoRunConfig): void {
    if (!Number.isInteger(config.iterations) || config.iterations < 0) {
        throw new ConfigurationError('iterations', `iterations must be a non-negative integer, got ${config.iterations}`, config.iterations);
    }
    if (!Number.isInteger(config.logEvery) || config.logEvery <= 0) {
        throw new ConfigurationError('logEvery', `logEvery must be a positive integer, got ${config.logEvery}`, config.logEvery);
    }
}

export function validateHybridRunConfig(config: HybridRunConfig): void {
    validatePsoRunConfig(config);
    validateRefinementConfig(config);
}

export function mergePsoRunConfig(overrides: Partial<PsoRunConfig> = {}): PsoRunConfig {
    const config = { ...DEFAULT_PSO_RUN_CONFIG, ...overrides };
    validatePsoRunConfig(config);
    return config;
}

export function mergeHybridRunConfig(overrides: Partial<HybridRunConfig> = {}): HybridRunConfig {
    const config = { ...DEFAULT_HYBRID_RUN_CONFIG, ...overrides };
    validateHybridRunConfig(config);
    return config;
}

export type ComparisonOverrides = Partial<Omit<ComparisonConfig, 'run'>> & { run?: Partial<HybridRunConfig> };

export function mergeComparisonConfig(overrides: ComparisonOverrides = {}): ComparisonConfig {
    const config: ComparisonConfig = {
        ...DEFAULT_COMPARISON_CONFIG,
        ...overrides,
        run: mergeHybridRunConfig({
            ...DEFAULT_COMPARISON_CONFIG.run,
            ...(overrides.run ?? {}),
        }),
    };
    if (!Number.isInteger(config.dimensions) || config.dimensions <= 0) {
        throw new ConfigurationError('dimensions', `dimensions must be a positive integer, got ${config.dimensions}`, config.dimensions);
    }
    return config;
}
