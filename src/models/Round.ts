// src/models/Round.ts

import { PoolSnapshot, Slot, SlotCount } from './Slot';
import { StationCandidates, StationId } from './Station';

/**
 * Round coordinator lifecycle states
 *
 * Valid transitions:
 * - IDLE → DEMAND_GENERATED (first round)
 * - DEMAND_GENERATED → NEGOTIATING (stations queried in order)
 * - NEGOTIATING → RESOLVED (conflicts resolved, pool updated)
 * - RESOLVED → RECORDED (feedback computed, success persisted)
 * - RECORDED → DEMAND_GENERATED (after success or a scheduled refresh)
 * - RECORDED → NEGOTIATING (same demand, next round)
 * - any → TERMINATED (max rounds reached or cancelled)
 */
export enum RoundState {
    IDLE = 'IDLE',
    DEMAND_GENERATED = 'DEMAND_GENERATED',
    NEGOTIATING = 'NEGOTIATING',
    RESOLVED = 'RESOLVED',
    RECORDED = 'RECORDED',
    TERMINATED = 'TERMINATED'
}

/**
 * Round feedback exposed to decision sources for the next round
 */
export interface Feedback {
    conflictSlots: Slot[];    // in >= 2 stations' raw proposals
    conflictDetails: Record<Slot, StationId[]>;  // contested slot → stations that proposed it
    idleSlots: Slot[];        // in no station's raw proposal
    utilizationRate: number;  // |union of allocation| / numSlots
    satisfactionRate: number; // granted / requested; below 1 when any station fell short
}

/**
 * Persisted record of a round that reached full utilization with no raw conflicts
 */
export interface SuccessRecord {
    demand: Record<StationId, number>;
    allocation: Record<StationId, Slot[]>;
    roundsToSuccess: number;
    timestamp: string;
}

/**
 * Everything a decision source is told when asked for a proposal
 */
export interface StationContext {
    round: number;
    stationId: StationId;
    demand: number;                         // this station's entitlement
    demandByStation: Record<StationId, number>;
    numSlots: number;
    heatRanking: SlotCount[];
    conflictHistory: SlotCount[];
    claimedThisRound: Record<StationId, Slot[]>;  // earlier stations' candidates
    lastFeedback: Feedback | null;
}

/**
 * Outcome of one negotiation round
 */
export interface RoundResult {
    round: number;
    roundsSinceDemand: number;
    demand: Record<StationId, number>;
    proposals: StationCandidates[];   // raw: parsed and cleaned, before backfill; empty on fallback
    candidates: StationCandidates[];  // validated, exactly `demand` slots each
    allocation: Record<StationId, Slot[]>;
    shortfall: Record<StationId, number>;
    feedback: Feedback;
    success: boolean;
    record: SuccessRecord | null;
    fallbackStations: StationId[];
    degenerateStations: StationId[];
    persistenceError: string | null;
}

/**
 * Why a run loop stopped (round-limit: the requested batch finished, run still open)
 */
export type StopReason = 'max-rounds' | 'cancelled' | 'round-limit';

export interface RunSummary {
    roundsRun: number;
    successes: number;
    stoppedBy: StopReason;
    lastResult: RoundResult | null;
}

/**
 * Read-only view of the coordinator
 */
export interface CoordinatorSnapshot {
    state: RoundState;
    round: number;
    maxRounds: number;
    demand: Record<StationId, number> | null;
    stationOrder: StationId[];
    pool: PoolSnapshot;
    lastFeedback: Feedback | null;
}
