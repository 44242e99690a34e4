/**
 * @module optimization/particle
 * @description One candidate solution of the swarm
 */

import { symmetricUniform, type RandomSource } from '../../../core/repro';
import { copyInto, copyVector } from '../math/vector';
import type { ParticleSnapshot, ParticleState } from './types';

/**
 * Particle: position, velocity and personal best in R^D.
 *
 * The arrays are owned by the particle and mutated in place by the swarm;
 * outside the engine they are only reachable through `ParticleState`.
 */
export class Particle implements ParticleState {
    readonly position: number[];
    readonly velocity: number[];
    readonly bestPosition: number[];
    private _bestFitness: number = Infinity;

    /**
     * Draws, per dimension and in dimension order, a position in
     * [-initPositionRange, initPositionRange) followed by a velocity in
     * [-initVelocityRange, initVelocityRange).
     */
    constructor(
        dimensions: number,
        rng: RandomSource,
        initPositionRange: number = 1.0,
        initVelocityRange: number = 0.1
    ) {
        this.position = new Array<number>(dimensions);
        this.velocity = new Array<number>(dimensions);
        for (let d = 0; d < dimensions; d++) {
            this.position[d] = symmetricUniform(rng, initPositionRange);
            this.velocity[d] = symmetricUniform(rng, initVelocityRange);
        }
        this.bestPosition = copyVector(this.position);
    }

    get dimensions(): number {
        return this.position.length;
    }

    get bestFitness(): number {
        return this._bestFitness;
    }

    /**
     * Record the current position as personal best on strict improvement.
     * Ties and non-finite values leave the best untouched.
     *
     * @param fitness - fitness of the current position
     * @returns whether the personal best changed
     */
    updatePersonalBest(fitness: number): boolean {
        if (!Number.isFinite(fitness) || !(fitness < this._bestFitness)) {
            return false;
        }
        this._bestFitness = fitness;
        copyInto(this.bestPosition, this.position);
        return true;
    }

    snapshot(): ParticleSnapshot {
        return {
            position: copyVector(this.position),
            velocity: copyVector(this.velocity),
            bestPosition: copyVector(this.bestPosition),
            bestFitness: this._bestFitness,
        };
    }
}
