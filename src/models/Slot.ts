// src/models/Slot.ts

/**
 * Slot index - one allocatable time/frequency unit in [0, numSlots)
 */
export type Slot = number;

/**
 * Per-slot counter entry, used for heat and conflict rankings
 *
 * Data only, no methods. Counters are owned by ResourcePool.
 */
export interface SlotCount {
    slot: Slot;
    count: number;
}

/**
 * Plain, JSON-serializable view of the pool's counters
 *
 * Invariant: heat.length === conflictHistory.length === numSlots
 */
export interface PoolSnapshot {
    numSlots: number;
    heat: number[];             // heat[slot] = times the slot was granted
    conflictHistory: number[];  // conflictHistory[slot] = rounds the slot was contested
    heatRanking: SlotCount[];   // ascending heat, ties by ascending slot
}

/**
 * Sort comparator for slot indices (numeric ascending)
 */
export function compareSlots(a: Slot, b: Slot): number {
    return a - b;
}

/**
 * Check that a value is a legal slot for a pool of the given size
 */
export function isSlotInRange(slot: number, numSlots: number): boolean {
    return Number.isInteger(slot) && slot >= 0 && slot < numSlots;
}
