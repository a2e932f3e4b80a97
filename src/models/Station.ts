// src/models/Station.ts

import { Slot } from './Slot';

/**
 * Opaque station identifier (an access point / node competing for slots)
 */
export type StationId = string;

/**
 * Slots each station is entitled to request this round
 *
 * Invariant: every value >= 1
 */
export type Demand = Map<StationId, number>;

/**
 * Final per-round assignment
 *
 * Invariant after resolution: sets are pairwise disjoint and sorted ascending
 */
export type Allocation = Map<StationId, Slot[]>;

/**
 * One station's validated candidate set, in negotiation order
 */
export interface StationCandidates {
    stationId: StationId;
    slots: Slot[];
}

/**
 * Build the default station ids AP1..APn
 */
export function createStationIds(count: number): StationId[] {
    return Array.from({ length: count }, (_, i) => `AP${i + 1}`);
}

/**
 * Convert a station-keyed map into a plain object for JSON output
 */
export function toPlainRecord<T>(map: Map<StationId, T>): Record<StationId, T> {
    return Object.fromEntries(map);
}
