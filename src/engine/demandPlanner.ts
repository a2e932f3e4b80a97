// src/engine/demandPlanner.ts

import { ConfigurationError, ValidationError } from '../lib/errors';
import { defaultRng, pickOne, randomInt, Rng } from '../lib/random';
import { Demand, StationId } from '../models/Station';

/**
 * Range of the random base weight drawn per station
 */
export const BASE_DEMAND_MIN = 1;
export const BASE_DEMAND_MAX = 4;

/**
 * When demand is regenerated between successes
 * - on-success: only after a successful round (and on the first round)
 * - every-rounds: additionally every `interval` rounds
 */
export type DemandRefreshPolicy =
    | { kind: 'on-success' }
    | { kind: 'every-rounds'; interval: number };

/**
 * Reject station/slot counts that can never satisfy the minimum-1 rule
 * Called at configuration time, before any round runs.
 */
export function assertDemandFeasible(numStations: number, numSlots: number): void {
    if (!Number.isInteger(numStations) || numStations < 1) {
        throw new ConfigurationError(`At least one station is required, got ${numStations}`);
    }
    if (!Number.isInteger(numSlots) || numSlots < 1) {
        throw new ConfigurationError(`Slot count must be a positive integer, got ${numSlots}`);
    }
    if (numStations > numSlots) {
        throw new ConfigurationError(
            `Cannot give ${numStations} stations at least one slot each from ${numSlots} slots`,
            { numStations, numSlots }
        );
    }
}

/**
 * Generate per-station demand for a round
 *
 * Algorithm:
 * 1. Draw a base weight in [1, 4] per station
 * 2. Sum fits: spread the remainder proportionally (rounded), then fix
 *    rounding drift one unit at a time at random stations
 * 3. Sum too large: scale down proportionally (floor, min 1), then fix
 *    drift one unit at a time, never taking a station below 1
 *
 * Post-condition: every value >= 1, values sum to numSlots exactly
 *
 * @param stationIds Stations in negotiation order
 * @param numSlots Pool size
 * @param rng Randomness source
 */
export function generateDemand(stationIds: StationId[], numSlots: number, rng: Rng = defaultRng): Demand {
    assertDemandFeasible(stationIds.length, numSlots);

    const base = stationIds.map(() => randomInt(rng, BASE_DEMAND_MIN, BASE_DEMAND_MAX));
    const total = base.reduce((sum, b) => sum + b, 0);

    const values = total <= numSlots
        ? distributeRemainder(base, total, numSlots, rng)
        : scaleDown(base, total, numSlots, rng);

    return new Map(stationIds.map((id, i) => [id, values[i]]));
}

function distributeRemainder(base: number[], total: number, numSlots: number, rng: Rng): number[] {
    const remainder = numSlots - total;
    const additions = base.map(b => Math.round(remainder * b / total));
    const indices = base.map((_, i) => i);

    let drift = remainder - sum(additions);
    while (drift !== 0) {
        if (drift > 0) {
            additions[pickOne(rng, indices)] += 1;
            drift--;
        } else {
            // Rounding overshot: take back from stations that received extra
            const donors = indices.filter(i => additions[i] > 0);
            additions[pickOne(rng, donors)] -= 1;
            drift++;
        }
    }

    return base.map((b, i) => b + additions[i]);
}

function scaleDown(base: number[], total: number, numSlots: number, rng: Rng): number[] {
    const scaled = base.map(b => Math.max(1, Math.floor(b * numSlots / total)));
    const indices = base.map((_, i) => i);

    let drift = numSlots - sum(scaled);
    while (drift !== 0) {
        if (drift > 0) {
            scaled[pickOne(rng, indices)] += 1;
            drift--;
        } else {
            const donors = indices.filter(i => scaled[i] > 1);
            scaled[pickOne(rng, donors)] -= 1;
            drift++;
        }
    }

    return scaled;
}

function sum(values: number[]): number {
    return values.reduce((acc, v) => acc + v, 0);
}

/**
 * Validate an explicitly supplied demand (operator override)
 *
 * Oversubscription (sum > numSlots) is allowed here; it surfaces later as
 * shortfall. Every station must be present with an integer >= 1.
 */
export function validateDemand(demand: Demand, stationIds: StationId[]): Demand {
    const known = new Set(stationIds);
    for (const id of demand.keys()) {
        if (!known.has(id)) {
            throw new ValidationError(`Unknown station '${id}' in demand`, { stationId: id });
        }
    }

    const validated: Demand = new Map();
    for (const id of stationIds) {
        const value = demand.get(id);
        if (value === undefined) {
            throw new ValidationError(`Demand is missing station '${id}'`, { stationId: id });
        }
        if (!Number.isInteger(value) || value < 1) {
            throw new ValidationError(`Demand for '${id}' must be an integer >= 1, got ${value}`, {
                stationId: id,
                value
            });
        }
        validated.set(id, value);
    }
    return validated;
}

/**
 * Decide whether demand is due for regeneration before the next round
 *
 * @param policy Refresh cadence
 * @param roundsSinceDemand Rounds negotiated with the current demand
 */
export function isDemandRefreshDue(policy: DemandRefreshPolicy, roundsSinceDemand: number): boolean {
    if (policy.kind === 'every-rounds') {
        return roundsSinceDemand >= policy.interval;
    }
    return false;
}
