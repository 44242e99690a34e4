/**
 * @module optimization/config
 * @description Defaults, merging and validation for swarm hyperparameters
 */

import { ConfigurationError, NonFiniteValueError } from '../../../core/errors';
import { randomSeed } from '../../../core/repro';
import { assertLength, firstNonFiniteIndex, type ReadonlyVector } from '../math/vector';
import type {
    NonFinitePolicy,
    RefinementConfig,
    SwarmConfig,
    SwarmOptions,
} from './types';

// ==================== Defaults ====================

/**
 * Default PSO hyperparameters (Clerc–Kennedy constriction values)
 */
export const DEFAULT_SWARM_CONFIG: Readonly<Omit<SwarmConfig, 'particleCount' | 'dimensions' | 'seed'>> = {
    inertia: 0.729,
    cognitiveFactor: 1.49445,
    socialFactor: 1.49445,
    maxVelocity: 0.5,
    initPositionRange: 1.0,
    initVelocityRange: 0.1,
    nonFinite: 'reject',
};

/**
 * Default refinement schedule
 */
export const DEFAULT_REFINEMENT_CONFIG: Readonly<RefinementConfig> = {
    gdLearningRate: 0.01,
    gdSteps: 3,
    gdEliteCount: 5,
    gdPeriod: 10,
};

// ==================== Factory Functions ====================

/**
 * Merge options over defaults and validate
 *
 * @throws ConfigurationError on the first invalid field
 */
export function createSwarmConfig(options: SwarmOptions): SwarmConfig {
    const config: SwarmConfig = {
        particleCount: options.particleCount,
        dimensions: options.dimensions,
        inertia: options.inertia ?? DEFAULT_SWARM_CONFIG.inertia,
        cognitiveFactor: options.cognitiveFactor ?? DEFAULT_SWARM_CONFIG.cognitiveFactor,
        socialFactor: options.socialFactor ?? DEFAULT_SWARM_CONFIG.socialFactor,
        maxVelocity: options.maxVelocity ?? DEFAULT_SWARM_CONFIG.maxVelocity,
        initPositionRange: options.initPositionRange ?? DEFAULT_SWARM_CONFIG.initPositionRange,
        initVelocityRange: options.initVelocityRange ?? DEFAULT_SWARM_CONFIG.initVelocityRange,
        nonFinite: options.nonFinite ?? DEFAULT_SWARM_CONFIG.nonFinite,
        seed: options.seed ?? randomSeed(),
    };
    validateSwarmConfig(config);
    return config;
}

/**
 * Merge a partial refinement schedule over defaults and validate
 */
export function createRefinementConfig(options: Partial<RefinementConfig> = {}): RefinementConfig {
    const config: RefinementConfig = {
        gdLearningRate: options.gdLearningRate ?? DEFAULT_REFINEMENT_CONFIG.gdLearningRate,
        gdSteps: options.gdSteps ?? DEFAULT_REFINEMENT_CONFIG.gdSteps,
        gdEliteCount: options.gdEliteCount ?? DEFAULT_REFINEMENT_CONFIG.gdEliteCount,
        gdPeriod: options.gdPeriod ?? DEFAULT_REFINEMENT_CONFIG.gdPeriod,
    };
    validateRefinementConfig(config);
    return config;
}

// ==================== Validation ====================

function requirePositiveInteger(field: string, value: number): void {
    if (!Number.isInteger(value) || value <= 0) {
        throw new ConfigurationError(field, `${field} must be a positive integer, got ${value}`, value);
    }
}

function requireInteger(field: string, value: number): void {
    if (!Number.isInteger(value)) {
        throw new ConfigurationError(field, `${field} must be an integer, got ${value}`, value);
    }
}

function requireFinite(field: string, value: number): void {
    if (!Number.isFinite(value)) {
        throw new ConfigurationError(field, `${field} must be a finite number, got ${value}`, value);
    }
}

function requireNonNegative(field: string, value: number): void {
    requireFinite(field, value);
    if (value < 0) {
        throw new ConfigurationError(field, `${field} must be >= 0, got ${value}`, value);
    }
}

export function validateSwarmConfig(config: SwarmConfig): void {
    requirePositiveInteger('particleCount', config.particleCount);
    requirePositiveInteger('dimensions', config.dimensions);
    requireFinite('inertia', config.inertia);
    requireFinite('cognitiveFactor', config.cognitiveFactor);
    requireFinite('socialFactor', config.socialFactor);
    requireFinite('maxVelocity', config.maxVelocity);
    if (config.maxVelocity <= 0) {
        throw new ConfigurationError('maxVelocity', `maxVelocity must be > 0, got ${config.maxVelocity}`, config.maxVelocity);
    }
    requireNonNegative('initPositionRange', config.initPositionRange);
    requireNonNegative('initVelocityRange', config.initVelocityRange);
    requireFinite('seed', config.seed);
    if (config.nonFinite !== 'reject' && config.nonFinite !== 'throw') {
        throw new ConfigurationError('nonFinite', `nonFinite must be 'reject' or 'throw'`, config.nonFinite);
    }
}

/**
 * gdSteps / gdEliteCount ≤ 0 are accepted (refinement becomes a no-op);
 * a negative period is not.
 */
export function validateRefinementConfig(config: RefinementConfig): void {
    requireFinite('gdLearningRate', config.gdLearningRate);
    requireInteger('gdSteps', config.gdSteps);
    requireInteger('gdEliteCount', config.gdEliteCount);
    requireInteger('gdPeriod', config.gdPeriod);
    if (config.gdPeriod < 0) {
        throw new ConfigurationError('gdPeriod', `gdPeriod must be >= 0, got ${config.gdPeriod}`, config.gdPeriod);
    }
}

// ==================== Non-finite Screening ====================

/**
 * True when `value` may take part in best tracking.
 * Under 'throw', a non-finite value raises instead of returning false.
 */
export function screenFitness(value: number, policy: NonFinitePolicy, context: string): boolean {
    if (Number.isFinite(value)) return true;
    if (policy === 'throw') {
        throw new NonFiniteValueError(context, value);
    }
    return false;
}

/**
 * Check a gradient's length and components.
 * Wrong length always throws; a non-finite component throws under 'throw'
 * and yields false under 'reject'.
 */
export function screenGradient(gradient: ReadonlyVector, dimensions: number, policy: NonFinitePolicy): boolean {
    assertLength(gradient, dimensions, 'gradient function');
    const bad = firstNonFiniteIndex(gradient);
    if (bad < 0) return true;
    if (policy === 'throw') {
        throw new NonFiniteValueError('gradient function', gradient[bad], { component: bad });
    }
    return false;
}
