/**
 * @module optimization/types
 * @description Type definitions for the swarm optimizers
 */

import type { RandomSource } from '../../../core/repro';
import type { ReadonlyVector } from '../math/vector';

// ==================== Caller Contracts ====================

/**
 * Objective to minimise: real vector of length D to a scalar (lower is better).
 * Must not mutate its argument.
 */
export type FitnessFunction = (position: ReadonlyVector) => number;

/**
 * Gradient of the objective at a point; must return exactly D components.
 * May be stochastic across calls (e.g. mini-batch estimates).
 */
export type GradientFunction = (position: ReadonlyVector) => ReadonlyVector;

/**
 * What to do when a fitness or gradient value is NaN/Infinity
 * - 'reject': the value never improves any best; a refinement fed such a
 *   gradient is abandoned for that elite
 * - 'throw': raise NonFiniteValueError immediately
 */
export type NonFinitePolicy = 'reject' | 'throw';

// ==================== Configuration ====================

/**
 * Resolved swarm configuration
 */
export interface SwarmConfig {
    /** Number of particles (positive integer, fixed for the run) */
    particleCount: number;
    /** Search-space dimensionality (positive integer, fixed for the run) */
    dimensions: number;
    /** Inertia weight ω */
    inertia: number;
    /** Cognitive factor c1 (pull toward personal best) */
    cognitiveFactor: number;
    /** Social factor c2 (pull toward global best) */
    socialFactor: number;
    /** Component-wise velocity clamp magnitude */
    maxVelocity: number;
    /** Initial positions drawn from U(-range, range) */
    initPositionRange: number;
    /** Initial velocities drawn from U(-range, range) */
    initVelocityRange: number;
    /** Non-finite fitness/gradient handling */
    nonFinite: NonFinitePolicy;
    /** Seed used when no `rng` is supplied */
    seed: number;
}

/**
 * Swarm construction options: count and dimensionality are required,
 * everything else falls back to DEFAULT_SWARM_CONFIG
 */
export type SwarmOptions =
    Pick<SwarmConfig, 'particleCount' | 'dimensions'> &
    Partial<Omit<SwarmConfig, 'particleCount' | 'dimensions'>> & {
        /** Randomness source; takes precedence over `seed` */
        rng?: RandomSource;
    };

/**
 * Local gradient-descent refinement schedule
 */
export interface RefinementConfig {
    /** Step size η of each inner descent step */
    gdLearningRate: number;
    /** Inner descent steps per refinement (≤ 0 disables refinement) */
    gdSteps: number;
    /** Number of elites refined per pass (≤ 0 disables refinement) */
    gdEliteCount: number;
    /** Refine every N hybrid steps; 0 never refines */
    gdPeriod: number;
}

export type HybridSwarmOptions = SwarmOptions & Partial<RefinementConfig>;

// ==================== Read Interface ====================

/**
 * Read-only view of one particle
 */
export interface ParticleState {
    readonly position: ReadonlyVector;
    readonly velocity: ReadonlyVector;
    readonly bestPosition: ReadonlyVector;
    readonly bestFitness: number;
}

/**
 * Read interface shared by Swarm and HybridSwarm
 */
export interface SwarmView {
    readonly dimensions: number;
    readonly size: number;
    /** Number of standard PSO steps performed */
    readonly iteration: number;
    readonly particles: readonly ParticleState[];
    readonly globalBestPosition: ReadonlyVector;
    readonly globalBestFitness: number;
    /** Deep copy of the current state */
    snapshot(): SwarmSnapshot;
}

export interface ParticleSnapshot {
    position: number[];
    velocity: number[];
    bestPosition: number[];
    bestFitness: number;
}

export interface SwarmSnapshot {
    iteration: number;
    globalBestPosition: number[];
    globalBestFitness: number;
    particles: ParticleSnapshot[];
}

// ==================== Step Reports ====================

/**
 * Outcome of one standard PSO step
 */
export interface StepReport {
    /** Step number (1-based) */
    iteration: number;
    /** Global best after the step */
    globalBestFitness: number;
    /** Whether the global best strictly improved during the step */
    improved: boolean;
    /** Fitness evaluations spent */
    evaluations: number;
    /** Evaluations discarded as non-finite */
    rejected: number;
}

/**
 * Outcome of refining one elite
 */
export interface EliteOutcome {
    /** Particle index in population order */
    index: number;
    /** Fresh fitness used for ranking and acceptance */
    fitnessBefore: number;
    /** Fitness of the refined candidate (absent when abandoned) */
    fitnessAfter?: number;
    accepted: boolean;
    /** Gradient produced a non-finite component; candidate discarded unevaluated */
    abandoned: boolean;
}

/**
 * Outcome of one refinement pass
 */
export interface RefinementReport {
    /** Hybrid iteration counter value that triggered the pass */
    iteration: number;
    elites: EliteOutcome[];
    accepted: number;
    bestFitnessBefore: number;
    bestFitnessAfter: number;
    fitnessEvaluations: number;
    gradientEvaluations: number;
}

/**
 * Outcome of one hybrid step
 */
export interface HybridStepReport extends StepReport {
    /** Hybrid iteration counter after the step */
    iterationCounter: number;
    refined: boolean;
    refinement?: RefinementReport;
}
