// src/lib/random.ts

/**
 * Source of uniform numbers in [0, 1)
 *
 * Injected everywhere randomness is used so runs can be replayed.
 */
export type Rng = () => number;

export const defaultRng: Rng = Math.random;

/**
 * Seeded generator (mulberry32) for reproducible simulations and tests
 */
export function createSeededRng(seed: number): Rng {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/**
 * Uniform integer in [min, max] (inclusive)
 */
export function randomInt(rng: Rng, min: number, max: number): number {
    return min + Math.floor(rng() * (max - min + 1));
}

/**
 * Uniform pick from a non-empty list
 */
export function pickOne<T>(rng: Rng, items: readonly T[]): T {
    if (items.length === 0) {
        throw new RangeError('Cannot pick from an empty list');
    }
    return items[randomInt(rng, 0, items.length - 1)];
}

/**
 * Draw up to `count` distinct items (partial Fisher-Yates on a copy)
 */
export function sampleWithoutReplacement<T>(rng: Rng, items: readonly T[], count: number): T[] {
    const pool = [...items];
    const take = Math.min(count, pool.length);
    for (let i = 0; i < take; i++) {
        const j = randomInt(rng, i, pool.length - 1);
        [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    return pool.slice(0, take);
}

/**
 * Draw `count` items, repeats allowed
 */
export function sampleWithReplacement<T>(rng: Rng, items: readonly T[], count: number): T[] {
    const drawn: T[] = [];
    for (let i = 0; i < count; i++) {
        drawn.push(pickOne(rng, items));
    }
    return drawn;
}
