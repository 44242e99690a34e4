/**
 * @module optimization/swarm
 * @description Standard global-best Particle Swarm Optimization
 *
 * One `step()` performs two strictly ordered passes over the population:
 *
 * 1. Evaluation: fitness at every current position, personal-best and
 *    global-best bookkeeping (strict `<`, so the lowest index wins ties).
 * 2. Movement: per particle and dimension, fresh r1, r2 ~ U(0,1) and
 *
 *        v = ω·v + c1·r1·(pbest − x) + c2·r2·(gbest − x),  v ∈ [−vmax, vmax],  x += v
 *
 * Positions are never bounded. The global best is written only by the
 * evaluation pass and by `acceptRefinement()`.
 *
 * Reference: J. Kennedy and R. Eberhart, "Particle Swarm Optimization",
 * Proc. IEEE ICNN, pp. 1942-1948, 1995.
 */

import { createRng, type RandomSource } from '../../../core/repro';
import { ValidationError } from '../../../core/errors';
import {
    assertLength,
    clampSymmetric,
    copyInto,
    copyVector,
    fillZero,
    zeros,
    type ReadonlyVector,
} from '../math/vector';
import { createSwarmConfig, screenFitness } from './config';
import { Particle } from './particle';
import type {
    FitnessFunction,
    ParticleState,
    StepReport,
    SwarmConfig,
    SwarmOptions,
    SwarmSnapshot,
    SwarmView,
} from './types';

export class Swarm implements SwarmView {
    readonly config: Readonly<SwarmConfig>;
    private readonly rng: RandomSource;
    private readonly _particles: Particle[];
    private readonly _globalBestPosition: number[];
    private _globalBestFitness: number = Infinity;
    private _iteration: number = 0;

    /**
     * @throws ConfigurationError for a non-positive particle count or dimensionality,
     *         or any other out-of-range hyperparameter
     */
    constructor(options: SwarmOptions) {
        this.config = Object.freeze(createSwarmConfig(options));
        this.rng = options.rng ?? createRng(this.config.seed);

        const { particleCount, dimensions, initPositionRange, initVelocityRange } = this.config;
        this._particles = [];
        for (let i = 0; i < particleCount; i++) {
            this._particles.push(new Particle(dimensions, this.rng, initPositionRange, initVelocityRange));
        }
        this._globalBestPosition = zeros(dimensions);
    }

    // ==================== Read Interface ====================

    get dimensions(): number {
        return this.config.dimensions;
    }

    get size(): number {
        return this._particles.length;
    }

    get iteration(): number {
        return this._iteration;
    }

    get particles(): readonly ParticleState[] {
        return this._particles;
    }

    get globalBestPosition(): ReadonlyVector {
        return this._globalBestPosition;
    }

    get globalBestFitness(): number {
        return this._globalBestFitness;
    }

    snapshot(): SwarmSnapshot {
        return {
            iteration: this._iteration,
            globalBestPosition: copyVector(this._globalBestPosition),
            globalBestFitness: this._globalBestFitness,
            particles: this._particles.map(p => p.snapshot()),
        };
    }

    // ==================== Mutation ====================

    /**
     * One standard PSO iteration
     *
     * @param fitness - evaluated exactly once per particle, in index order
     */
    step(fitness: FitnessFunction): StepReport {
        const policy = this.config.nonFinite;
        let improved = false;
        let rejected = 0;

        // 1) Evaluation pass
        for (const p of this._particles) {
            const value = fitness(p.position);
            if (!screenFitness(value, policy, 'fitness function')) {
                rejected++;
                continue;
            }
            p.updatePersonalBest(value);
            if (value < this._globalBestFitness) {
                this._globalBestFitness = value;
                copyInto(this._globalBestPosition, p.position);
                improved = true;
            }
        }

        // 2) Movement pass
        const { inertia, cognitiveFactor, socialFactor, maxVelocity } = this.config;
        const gBest = this._globalBestPosition;
        for (const p of this._particles) {
            for (let d = 0; d < p.position.length; d++) {
                const r1 = this.rng.random();
                const r2 = this.rng.random();
                const x = p.position[d];

                const vel = inertia * p.velocity[d]
                    + cognitiveFactor * r1 * (p.bestPosition[d] - x)
                    + socialFactor * r2 * (gBest[d] - x);

                p.velocity[d] = clampSymmetric(vel, maxVelocity);
                p.position[d] = x + p.velocity[d];
            }
        }

        this._iteration++;
        return {
            iteration: this._iteration,
            globalBestFitness: this._globalBestFitness,
            improved,
            evaluations: this._particles.length,
            rejected,
        };
    }

    /**
     * Commit a refined candidate for one particle: move it there, drop its
     * momentum, then update personal and global bests.
     *
     * @param index - particle index in population order
     * @param candidate - new position (copied)
     * @param fitness - finite fitness of `candidate`
     * @returns whether the global best improved
     */
    acceptRefinement(index: number, candidate: ReadonlyVector, fitness: number): boolean {
        const p = this._particles[index];
        if (p === undefined) {
            throw new ValidationError(`No particle at index ${index}`, { index, size: this.size });
        }
        assertLength(candidate, this.dimensions, 'refined candidate');
        if (!Number.isFinite(fitness)) {
            throw new ValidationError(`Refined candidate fitness must be finite, got ${fitness}`, { index, fitness });
        }

        copyInto(p.position, candidate);
        fillZero(p.velocity);
        p.updatePersonalBest(fitness);

        if (fitness < this._globalBestFitness) {
            this._globalBestFitness = fitness;
            copyInto(this._globalBestPosition, candidate);
            return true;
        }
        return false;
    }
}

/**
 * Create a standard PSO swarm
 */
export function createSwarm(options: SwarmOptions): Swarm {
    return new Swarm(options);
}
