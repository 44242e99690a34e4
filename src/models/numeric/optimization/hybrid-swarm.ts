/**
 * @module optimization/hybrid-swarm
 * @description Memetic PSO: a standard swarm plus periodic local gradient refinement
 *
 * `HybridSwarm` wraps a `Swarm` rather than extending it. Each `stepHybrid()`:
 *
 * 1. runs one standard PSO step;
 * 2. increments the iteration counter;
 * 3. on every `gdPeriod`-th call (when a gradient is supplied) ranks the
 *    population by a fresh fitness evaluation at the current positions and
 *    takes the first `min(gdEliteCount, N)` (stable, so index order breaks ties);
 * 4. for each elite runs `gdSteps` descent steps `w -= η·∇(w)` on a private copy;
 * 5. commits the copy only when its fitness is strictly below the elite's fresh
 *    fitness. Committing zeroes the particle's velocity.
 *
 * Refinement can therefore only lower recorded fitness, never raise it.
 */

import { copyVector, axpyInPlace, type ReadonlyVector } from '../math/vector';
import { createRefinementConfig, screenFitness, screenGradient } from './config';
import { Swarm } from './swarm';
import type {
    EliteOutcome,
    FitnessFunction,
    GradientFunction,
    HybridStepReport,
    HybridSwarmOptions,
    ParticleState,
    RefinementConfig,
    RefinementReport,
    SwarmSnapshot,
    SwarmView,
} from './types';

interface RankedParticle {
    index: number;
    fitness: number;
    rank: number;
}

export class HybridSwarm implements SwarmView {
    readonly swarm: Swarm;
    readonly refinement: Readonly<RefinementConfig>;
    private _iterationCounter: number = 0;
    private _refinementCount: number = 0;

    /**
     * @param swarm - the standard swarm to drive
     * @param refinement - schedule overrides (merged over DEFAULT_REFINEMENT_CONFIG)
     * @throws ConfigurationError for a negative or non-integer gdPeriod
     */
    constructor(swarm: Swarm, refinement: Partial<RefinementConfig> = {}) {
        this.swarm = swarm;
        this.refinement = Object.freeze(createRefinementConfig(refinement));
    }

    /**
     * Build the inner swarm and the refinement schedule from one options object
     */
    static create(options: HybridSwarmOptions): HybridSwarm {
        const { gdLearningRate, gdSteps, gdEliteCount, gdPeriod, ...swarmOptions } = options;
        return new HybridSwarm(new Swarm(swarmOptions), {
            gdLearningRate,
            gdSteps,
            gdEliteCount,
            gdPeriod,
        });
    }

    // ==================== Read Interface ====================

    get dimensions(): number {
        return this.swarm.dimensions;
    }

    get size(): number {
        return this.swarm.size;
    }

    get iteration(): number {
        return this.swarm.iteration;
    }

    get particles(): readonly ParticleState[] {
        return this.swarm.particles;
    }

    get globalBestPosition(): ReadonlyVector {
        return this.swarm.globalBestPosition;
    }

    get globalBestFitness(): number {
        return this.swarm.globalBestFitness;
    }

    /** Hybrid steps performed; drives the refinement schedule */
    get iterationCounter(): number {
        return this._iterationCounter;
    }

    /** Refinement passes performed so far */
    get refinementCount(): number {
        return this._refinementCount;
    }

    snapshot(): SwarmSnapshot {
        return this.swarm.snapshot();
    }

    // ==================== Step ====================

    /**
     * Whether a refinement pass would run at the current counter value
     */
    isRefinementDue(hasGradient: boolean): boolean {
        const { gdPeriod, gdSteps, gdEliteCount } = this.refinement;
        if (!hasGradient || gdPeriod === 0) return false;
        if (this._iterationCounter % gdPeriod !== 0) return false;
        return gdSteps > 0 && gdEliteCount > 0;
    }

    /**
     * One hybrid iteration
     *
     * @param fitness - objective; also used for elite ranking and acceptance
     * @param gradient - optional; when absent no refinement runs this call
     */
    stepHybrid(fitness: FitnessFunction, gradient?: GradientFunction | null): HybridStepReport {
        const base = this.swarm.step(fitness);
        this._iterationCounter++;

        if (!gradient || !this.isRefinementDue(true)) {
            return { ...base, iterationCounter: this._iterationCounter, refined: false };
        }

        const refinement = this.refine(fitness, gradient);
        return {
            ...base,
            globalBestFitness: this.swarm.globalBestFitness,
            improved: base.improved || refinement.bestFitnessAfter < refinement.bestFitnessBefore,
            evaluations: base.evaluations + refinement.fitnessEvaluations,
            iterationCounter: this._iterationCounter,
            refined: true,
            refinement,
        };
    }

    // ==================== Refinement ====================

    /**
     * Rank every particle by a fresh evaluation at its current position.
     * Non-finite scores rank last under the 'reject' policy.
     */
    private rankParticles(fitness: FitnessFunction): RankedParticle[] {
        const policy = this.swarm.config.nonFinite;
        const ranked = this.swarm.particles.map((p, index) => {
            const value = fitness(p.position);
            const ok = screenFitness(value, policy, 'fitness function');
            return { index, fitness: value, rank: ok ? value : Infinity };
        });
        // Array.prototype.sort is stable: equal ranks keep population order
        ranked.sort((a, b) => (a.rank < b.rank ? -1 : a.rank > b.rank ? 1 : 0));
        return ranked;
    }

    private refine(fitness: FitnessFunction, gradient: GradientFunction): RefinementReport {
        const { gdLearningRate, gdSteps, gdEliteCount } = this.refinement;
        const policy = this.swarm.config.nonFinite;
        const dimensions = this.swarm.dimensions;
        const bestFitnessBefore = this.swarm.globalBestFitness;

        const ranked = this.rankParticles(fitness);
        let fitnessEvaluations = ranked.length;
        let gradientEvaluations = 0;

        const elites = ranked.slice(0, Math.min(gdEliteCount, ranked.length));
        const outcomes: EliteOutcome[] = [];

        for (const elite of elites) {
            const w = copyVector(this.swarm.particles[elite.index].position);
            let abandoned = false;

            for (let s = 0; s < gdSteps; s++) {
                const g = gradient(w);
                gradientEvaluations++;
                if (!screenGradient(g, dimensions, policy)) {
                    abandoned = true;
                    break;
                }
                axpyInPlace(w, -gdLearningRate, g);
            }

            if (abandoned) {
                outcomes.push({ index: elite.index, fitnessBefore: elite.fitness, accepted: false, abandoned: true });
                continue;
            }

            const candidateFitness = fitness(w);
            fitnessEvaluations++;
            const accepted = screenFitness(candidateFitness, policy, 'fitness function')
                && candidateFitness < elite.fitness;

            if (accepted) {
                this.swarm.acceptRefinement(elite.index, w, candidateFitness);
            }
            outcomes.push({
                index: elite.index,
                fitnessBefore: elite.fitness,
                fitnessAfter: candidateFitness,
                accepted,
                abandoned: false,
            });
        }

        this._refinementCount++;
        return {
            iteration: this._iterationCounter,
            elites: outcomes,
            accepted: outcomes.filter(o => o.accepted).length,
            bestFitnessBefore,
            bestFitnessAfter: this.swarm.globalBestFitness,
            fitnessEvaluations,
            gradientEvaluations,
        };
    }
}

/**
 * Create a hybrid (memetic) swarm
 */
export function createHybridSwarm(options: HybridSwarmOptions): HybridSwarm {
    return HybridSwarm.create(options);
}
