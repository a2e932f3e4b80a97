// src/engine/conflictResolver.ts

import { compareSlots, isSlotInRange, Slot } from '../models/Slot';
import { Allocation, StationCandidates, StationId } from '../models/Station';
import { CoolestReplacementStrategy, ReplacementStrategy } from './replacementStrategy';
import { ResourcePool } from './resourcePool';

export interface ResolutionResult {
    allocation: Allocation;
    shortfall: Map<StationId, number>;  // requested - granted, per station
    collisions: number;                 // candidate slots that had to be replaced or dropped
}

/**
 * Conflict resolver - turns ordered candidate sets into a disjoint allocation
 *
 * Sequential greedy reservation: each station, in the order given, keeps the
 * candidates nobody earlier reserved and replaces the rest from the free part
 * of the domain. Earlier stations are favoured; rotating the order across
 * rounds is the caller's job.
 *
 * Invariant: no slot appears in two stations' final sets.
 * Scarcity is not an error - it shows up as shortfall.
 */
export class ConflictResolver {
    private pool: ResourcePool;
    private strategy: ReplacementStrategy;

    constructor(pool: ResourcePool, strategy: ReplacementStrategy = new CoolestReplacementStrategy()) {
        this.pool = pool;
        this.strategy = strategy;
    }

    resolve(orderedCandidates: StationCandidates[]): ResolutionResult {
        const reserved = new Set<Slot>();
        const allocation: Allocation = new Map();
        const shortfall = new Map<StationId, number>();
        let collisions = 0;

        for (const { stationId, slots } of orderedCandidates) {
            const kept = new Set<Slot>();
            const ownCandidates = new Set(slots);

            for (const slot of slots) {
                if (isSlotInRange(slot, this.pool.numSlots) && !reserved.has(slot) && !kept.has(slot)) {
                    kept.add(slot);
                    continue;
                }

                // Collision: slot reserved earlier, repeated, or illegal
                collisions++;
                const replacement = this.findReplacement(reserved, kept, ownCandidates);
                if (replacement !== null) {
                    kept.add(replacement);
                }
            }

            const granted = Array.from(kept).sort(compareSlots);
            granted.forEach(slot => reserved.add(slot));
            allocation.set(stationId, granted);
            shortfall.set(stationId, slots.length - granted.length);
        }

        return { allocation, shortfall, collisions };
    }

    /**
     * Pick a free slot for a collided candidate
     *
     * Prefers slots the station did not itself propose, so a replacement does
     * not collide with one of the station's own later candidates.
     *
     * @returns Replacement slot, or null when the domain is exhausted
     */
    private findReplacement(reserved: Set<Slot>, kept: Set<Slot>, ownCandidates: Set<Slot>): Slot | null {
        const free = this.pool.domain().filter(slot => !reserved.has(slot) && !kept.has(slot));
        if (free.length === 0) {
            return null;
        }

        const outsideOwn = free.filter(slot => !ownCandidates.has(slot));
        return this.strategy.pickReplacement(outsideOwn.length > 0 ? outsideOwn : free, this.pool);
    }
}
