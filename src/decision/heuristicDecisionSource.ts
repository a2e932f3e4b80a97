// src/decision/heuristicDecisionSource.ts

import { defaultRng, Rng, sampleWithoutReplacement } from '../lib/random';
import { StationContext } from '../models/Round';
import { Slot } from '../models/Slot';
import { DecisionSource } from './decisionSource';

export interface HeuristicDecisionSourceOptions {
    rng?: Rng;
    /** Probability in [0, 1] of a noisy reply (random picks or unusable text) */
    noise?: number;
}

/**
 * In-process stand-in for an LLM-backed station controller
 *
 * Proposes the coolest slots nobody earlier in the round has claimed,
 * answering in the same loose JSON-in-prose shape a model would. With
 * probability `noise` it instead picks at random, or replies with text the
 * parser cannot use.
 */
export class HeuristicDecisionSource implements DecisionSource {
    private rng: Rng;
    private noise: number;

    constructor(options: HeuristicDecisionSourceOptions = {}) {
        this.rng = options.rng ?? defaultRng;
        this.noise = Math.min(1, Math.max(0, options.noise ?? 0));
    }

    async propose(context: StationContext): Promise<string> {
        const domain = Array.from({ length: context.numSlots }, (_, i) => i);

        if (this.rng() < this.noise) {
            if (this.rng() < 0.5) {
                return 'I would rather keep my current channels for now.';
            }
            const picks = sampleWithoutReplacement(this.rng, domain, context.demand);
            return `Trying something new: {'slots': [${picks.join(', ')}], reason: 'exploring'}`;
        }

        const claimed = new Set<Slot>();
        Object.values(context.claimedThisRound).forEach(slots => slots.forEach(slot => claimed.add(slot)));

        const preferred = context.heatRanking
            .map(entry => entry.slot)
            .filter(slot => !claimed.has(slot))
            .slice(0, context.demand);

        return JSON.stringify({
            slots: preferred,
            reason: `coolest ${preferred.length} unclaimed slots for ${context.stationId}`
        });
    }
}
