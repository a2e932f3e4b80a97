// src/engine/replacementStrategy.ts

import { pickOne, Rng } from '../lib/random';
import { Slot } from '../models/Slot';
import { ResourcePool } from './resourcePool';

/**
 * Chooses the slot that replaces a collided one
 *
 * Called only with a non-empty candidate list.
 */
export interface ReplacementStrategy {
    readonly name: ReplacementPolicy;
    pickReplacement(candidates: readonly Slot[], pool: ResourcePool): Slot;
}

export type ReplacementPolicy = 'coolest' | 'random';

/**
 * Lowest heat, ties by lowest index - deterministic for a given pool state
 */
export class CoolestReplacementStrategy implements ReplacementStrategy {
    readonly name = 'coolest' as const;

    pickReplacement(candidates: readonly Slot[], pool: ResourcePool): Slot {
        let best = candidates[0];
        for (const slot of candidates) {
            const heatDiff = pool.getHeat(slot) - pool.getHeat(best);
            if (heatDiff < 0 || (heatDiff === 0 && slot < best)) {
                best = slot;
            }
        }
        return best;
    }
}

/**
 * Uniform pick among all candidates
 */
export class RandomReplacementStrategy implements ReplacementStrategy {
    readonly name = 'random' as const;
    private rng: Rng;

    constructor(rng: Rng) {
        this.rng = rng;
    }

    pickReplacement(candidates: readonly Slot[]): Slot {
        return pickOne(this.rng, candidates);
    }
}

export function createReplacementStrategy(policy: ReplacementPolicy, rng: Rng): ReplacementStrategy {
    return policy === 'random' ? new RandomReplacementStrategy(rng) : new CoolestReplacementStrategy();
}
