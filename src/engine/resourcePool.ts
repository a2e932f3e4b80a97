// src/engine/resourcePool.ts

import { Feedback } from '../models/Round';
import { compareSlots, isSlotInRange, PoolSnapshot, Slot, SlotCount } from '../models/Slot';
import { Allocation, StationCandidates, StationId } from '../models/Station';

/**
 * Optional starting counters, e.g. restored from a snapshot
 */
export interface ResourcePoolSeed {
    heat?: Record<number, number>;
    conflictHistory?: Record<number, number>;
}

/**
 * Resource pool - owns the slot domain and its usage counters
 *
 * Counters are monotonically non-decreasing; absent keys read as 0.
 * Single writer (the round coordinator). Never mutates caller collections.
 */
export class ResourcePool {
    readonly numSlots: number;
    private heat: Map<Slot, number>;
    private conflictHistory: Map<Slot, number>;

    constructor(numSlots: number, seed: ResourcePoolSeed = {}) {
        if (!Number.isInteger(numSlots) || numSlots < 1) {
            throw new RangeError(`numSlots must be a positive integer, got ${numSlots}`);
        }
        this.numSlots = numSlots;
        this.heat = ResourcePool.seedCounters(numSlots, seed.heat);
        this.conflictHistory = ResourcePool.seedCounters(numSlots, seed.conflictHistory);
    }

    private static seedCounters(numSlots: number, values?: Record<number, number>): Map<Slot, number> {
        const counters = new Map<Slot, number>();
        if (!values) {
            return counters;
        }
        for (const [key, value] of Object.entries(values)) {
            const slot = Number(key);
            if (!isSlotInRange(slot, numSlots)) {
                throw new RangeError(`Seed slot ${key} is outside [0, ${numSlots})`);
            }
            if (!Number.isInteger(value) || value < 0) {
                throw new RangeError(`Seed counter for slot ${key} must be a non-negative integer`);
            }
            if (value > 0) {
                counters.set(slot, value);
            }
        }
        return counters;
    }

    /**
     * All slot indices, ascending
     */
    domain(): Slot[] {
        return Array.from({ length: this.numSlots }, (_, i) => i);
    }

    getHeat(slot: Slot): number {
        return this.heat.get(slot) ?? 0;
    }

    getConflictCount(slot: Slot): number {
        return this.conflictHistory.get(slot) ?? 0;
    }

    /**
     * Coolest slots outside `excluding`
     *
     * Ordered by ascending heat, ties by ascending index. Returns every
     * unexcluded slot when fewer than n remain - caller handles the shortfall.
     * Deterministic for an unchanged pool.
     *
     * @param n Maximum number of slots wanted
     * @param excluding Slots that must not be returned
     */
    coolestSlots(n: number, excluding: Iterable<Slot> = []): Slot[] {
        if (n <= 0) {
            return [];
        }
        const excluded = new Set(excluding);
        return this.domain()
            .filter(slot => !excluded.has(slot))
            .sort((a, b) => this.getHeat(a) - this.getHeat(b) || a - b)
            .slice(0, n);
    }

    /**
     * Increment heat once per (station, slot) pair of the final allocation
     */
    recordUsage(allocation: Allocation): void {
        for (const slots of allocation.values()) {
            for (const slot of slots) {
                if (isSlotInRange(slot, this.numSlots)) {
                    this.heat.set(slot, this.getHeat(slot) + 1);
                }
            }
        }
    }

    /**
     * Increment conflict history for slots contested in the raw proposals
     *
     * @returns The contested slots, ascending
     */
    recordConflicts(proposals: StationCandidates[]): Slot[] {
        const contested = this.contestedSlots(proposals);
        for (const slot of contested) {
            this.conflictHistory.set(slot, this.getConflictCount(slot) + 1);
        }
        return contested;
    }

    /**
     * Slots appearing in more than one station's proposal, ascending
     */
    contestedSlots(proposals: StationCandidates[]): Slot[] {
        return Array.from(this.contestants(proposals).keys()).sort(compareSlots);
    }

    /**
     * Stations behind each contested slot, in proposal order
     * A station repeating a slot in its own set does not count as contest.
     */
    contestants(proposals: StationCandidates[]): Map<Slot, StationId[]> {
        const claimants = new Map<Slot, StationId[]>();
        for (const { stationId, slots } of proposals) {
            for (const slot of new Set(slots)) {
                if (isSlotInRange(slot, this.numSlots)) {
                    claimants.set(slot, [...(claimants.get(slot) ?? []), stationId]);
                }
            }
        }
        return new Map(Array.from(claimants.entries()).filter(([, stations]) => stations.length > 1));
    }

    /**
     * Derive round feedback. Pure - does not touch counters.
     *
     * @param proposals Raw proposals (parsed, before any backfill)
     * @param allocation Final (resolved) allocation
     * @param requested Slots the stations were entitled to in total
     */
    feedback(proposals: StationCandidates[], allocation: Allocation, requested: number): Feedback {
        const proposed = new Set<Slot>();
        for (const { slots } of proposals) {
            slots.forEach(slot => proposed.add(slot));
        }

        const granted = new Set<Slot>();
        let grantedCount = 0;
        for (const slots of allocation.values()) {
            slots.filter(slot => isSlotInRange(slot, this.numSlots)).forEach(slot => granted.add(slot));
            grantedCount += slots.length;
        }

        const contestants = this.contestants(proposals);
        return {
            conflictSlots: Array.from(contestants.keys()).sort(compareSlots),
            conflictDetails: Object.fromEntries(contestants),
            idleSlots: this.domain().filter(slot => !proposed.has(slot)),
            utilizationRate: granted.size / this.numSlots,
            satisfactionRate: requested === 0 ? 1 : grantedCount / requested
        };
    }

    /**
     * Heat ranking, coolest first (ties by index)
     */
    heatRanking(): SlotCount[] {
        return this.coolestSlots(this.numSlots).map(slot => ({ slot, count: this.getHeat(slot) }));
    }

    /**
     * Slots that have ever been contested, most contested first
     */
    conflictRanking(): SlotCount[] {
        return Array.from(this.conflictHistory.entries())
            .map(([slot, count]) => ({ slot, count }))
            .sort((a, b) => b.count - a.count || a.slot - b.slot);
    }

    snapshot(): PoolSnapshot {
        const domain = this.domain();
        return {
            numSlots: this.numSlots,
            heat: domain.map(slot => this.getHeat(slot)),
            conflictHistory: domain.map(slot => this.getConflictCount(slot)),
            heatRanking: this.heatRanking()
        };
    }
}
