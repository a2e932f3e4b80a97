// src/engine/proposalValidator.ts

import { defaultRng, Rng, sampleWithReplacement } from '../lib/random';
import { compareSlots, isSlotInRange, Slot } from '../models/Slot';
import { coerceSlot } from './responseParser';
import { ResourcePool } from './resourcePool';

export interface ValidationOutcome {
    slots: Slot[];
    proposed: Slot[];       // what the station itself offered: cleaned, before trimming or backfill
    usedFallback: boolean;  // raw input had no usable structure
    degenerate: boolean;    // expected > numSlots, repeats were reintroduced
    discarded: number;      // entries dropped by coercion, range or dedup
}

/**
 * Repair a raw proposal into a validated set
 *
 * Steps:
 * 1. Non-array input → nothing survives (full fallback)
 * 2. Coerce entries to integers, drop failures and out-of-range values
 * 3. Deduplicate, keeping first occurrence
 * 4. Too many → sort ascending, keep the first `expected`
 * 5. Too few → fill with the pool's coolest unused slots; if the domain is
 *    exhausted, sample with replacement and flag the set degenerate
 *
 * Never throws. Always returns exactly `expected` slots, sorted ascending.
 *
 * @param raw Raw entries from the parser, or null when parsing failed
 * @param expected Station's entitled demand
 * @param pool Resource pool (read-only here)
 * @param rng Randomness for the degenerate path
 */
export function validateProposal(
    raw: unknown,
    expected: number,
    pool: ResourcePool,
    rng: Rng = defaultRng
): ValidationOutcome {
    const target = Number.isInteger(expected) && expected > 0 ? expected : 0;
    const usedFallback = !Array.isArray(raw);
    const entries: unknown[] = Array.isArray(raw) ? raw : [];

    const seen = new Set<Slot>();
    const surviving: Slot[] = [];
    for (const entry of entries) {
        const slot = coerceSlot(entry);
        if (slot === null || !isSlotInRange(slot, pool.numSlots) || seen.has(slot)) {
            continue;
        }
        seen.add(slot);
        surviving.push(slot);
    }
    const discarded = entries.length - surviving.length;
    const proposed = [...surviving].sort(compareSlots);

    if (surviving.length >= target) {
        return {
            slots: proposed.slice(0, target),
            proposed,
            usedFallback,
            degenerate: false,
            discarded
        };
    }

    const filled = [...surviving, ...pool.coolestSlots(target - surviving.length, surviving)];

    let degenerate = false;
    if (filled.length < target) {
        filled.push(...sampleWithReplacement(rng, pool.domain(), target - filled.length));
        degenerate = true;
    }

    return {
        slots: filled.sort(compareSlots),
        proposed,
        usedFallback,
        degenerate,
        discarded
    };
}
