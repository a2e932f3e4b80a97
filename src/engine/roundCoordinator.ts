// src/engine/roundCoordinator.ts

import { DecisionSource, DecisionSourceMap, proposeWithDeadline, sourceForStation } from '../decision/decisionSource';
import { handleDecisionFailure } from '../events/decisionFailureHandler';
import { handleSuccess } from '../events/successHandler';
import { ConfigurationError, DecisionSourceError, RoundInProgressError, RunTerminatedError } from '../lib/errors';
import { Logger, silentLogger } from '../lib/logger';
import { defaultRng, Rng } from '../lib/random';
import {
    CoordinatorSnapshot,
    Feedback,
    RoundResult,
    RoundState,
    RunSummary,
    StationContext,
    SuccessRecord
} from '../models/Round';
import { Allocation, Demand, StationCandidates, StationId, toPlainRecord } from '../models/Station';
import { SuccessRecordStore } from '../persistence/successRecordStore';
import { ConflictResolver } from './conflictResolver';
import {
    assertDemandFeasible,
    DemandRefreshPolicy,
    generateDemand,
    isDemandRefreshDue,
    validateDemand
} from './demandPlanner';
import { validateProposal } from './proposalValidator';
import { CoolestReplacementStrategy, ReplacementStrategy } from './replacementStrategy';
import { ResourcePool } from './resourcePool';
import { parseProposal } from './responseParser';

export const DEFAULT_DECISION_TIMEOUT_MS = 30000;

/**
 * Who negotiates first each round
 * - fixed: configured order every round
 * - round-robin: first-mover advantage rotates by one station per round
 */
export type StationOrdering = 'fixed' | 'round-robin';

interface Station {
    id: StationId;
    source: DecisionSource;
}

export interface RoundCoordinatorOptions {
    stationIds: StationId[];
    pool: ResourcePool;
    sources: DecisionSourceMap | DecisionSource;
    store: SuccessRecordStore;
    maxRounds: number;
    strategy?: ReplacementStrategy;
    rng?: Rng;
    demandRefresh?: DemandRefreshPolicy;
    ordering?: StationOrdering;
    decisionTimeoutMs?: number;
    logger?: Logger;
    now?: () => Date;
    demand?: Demand;
}

/**
 * Round coordinator - drives negotiation rounds end to end
 *
 * Per round: demand → query stations in order → validate → resolve →
 * update pool → feedback → success check → next state.
 *
 * Single writer of pool state. One round completes before the next starts;
 * cancellation takes effect between rounds, and aborts the in-flight query.
 */
export class RoundCoordinator {
    private readonly stations: Station[];
    private readonly stationIds: StationId[];
    private readonly pool: ResourcePool;
    private readonly store: SuccessRecordStore;
    private readonly resolver: ConflictResolver;
    private readonly rng: Rng;
    private readonly demandRefresh: DemandRefreshPolicy;
    private readonly ordering: StationOrdering;
    private readonly decisionTimeoutMs: number;
    private readonly logger: Logger;
    private readonly now: () => Date;
    readonly maxRounds: number;

    private state: RoundState = RoundState.IDLE;
    private round = 0;
    private roundsSinceDemand = 0;
    private demand: Demand | null = null;
    private lastFeedback: Feedback | null = null;
    private inFlight = false;
    private cancelRequested = false;
    private cancelController = new AbortController();

    constructor(options: RoundCoordinatorOptions) {
        const { stationIds, pool } = options;
        assertDemandFeasible(stationIds.length, pool.numSlots);

        if (new Set(stationIds).size !== stationIds.length) {
            throw new ConfigurationError('Station ids must be unique', { stationIds });
        }
        const stations: Station[] = [];
        for (const id of stationIds) {
            const source = sourceForStation(options.sources, id);
            if (!source) {
                throw new ConfigurationError(`No decision source configured for station '${id}'`, { stationId: id });
            }
            stations.push({ id, source });
        }
        if (!Number.isInteger(options.maxRounds) || options.maxRounds < 1) {
            throw new ConfigurationError(`maxRounds must be a positive integer, got ${options.maxRounds}`);
        }
        const refresh = options.demandRefresh ?? { kind: 'on-success' };
        if (refresh.kind === 'every-rounds' && (!Number.isInteger(refresh.interval) || refresh.interval < 1)) {
            throw new ConfigurationError(`Demand refresh interval must be a positive integer, got ${refresh.interval}`);
        }

        this.stations = stations;
        this.stationIds = stations.map(station => station.id);
        this.pool = pool;
        this.store = options.store;
        this.maxRounds = options.maxRounds;
        this.rng = options.rng ?? defaultRng;
        this.resolver = new ConflictResolver(pool, options.strategy ?? new CoolestReplacementStrategy());
        this.demandRefresh = refresh;
        this.ordering = options.ordering ?? 'fixed';
        this.decisionTimeoutMs = options.decisionTimeoutMs ?? DEFAULT_DECISION_TIMEOUT_MS;
        this.logger = options.logger ?? silentLogger;
        this.now = options.now ?? (() => new Date());

        if (options.demand) {
            this.setDemand(options.demand);
        }
    }

    getState(): RoundState {
        return this.state;
    }

    getDemand(): Demand | null {
        return this.demand ? new Map(this.demand) : null;
    }

    getRecords(): SuccessRecord[] {
        return this.store.list();
    }

    /**
     * Replace the current demand (operator override)
     * Oversubscribed demand is accepted and shows up as shortfall.
     */
    setDemand(demand: Demand): void {
        this.assertOpen();
        this.demand = validateDemand(demand, this.stationIds);
        this.roundsSinceDemand = 0;
        this.state = RoundState.DEMAND_GENERATED;
        this.logger.info(`Demand set: ${formatDemand(this.demand)}`);
    }

    /**
     * Run exactly one negotiation round
     *
     * @throws RunTerminatedError once max rounds are reached or the run is cancelled
     * @throws RoundInProgressError if called while a round is running
     */
    async runRound(): Promise<RoundResult> {
        this.assertOpen();
        this.inFlight = true;
        try {
            return await this.negotiateRound();
        } finally {
            this.inFlight = false;
        }
    }

    /**
     * Run rounds until terminated, cancelled, or `rounds` more have run
     *
     * @param options.rounds Optional batch size; the run stays open afterwards
     * @param options.signal Cancels the run; checked between rounds
     */
    async run(options: { rounds?: number; signal?: AbortSignal } = {}): Promise<RunSummary> {
        const { rounds, signal } = options;
        const onAbort = (): void => this.cancel();
        if (signal?.aborted) {
            this.cancel();
        }
        signal?.addEventListener('abort', onAbort, { once: true });

        let roundsRun = 0;
        let successes = 0;
        let lastResult: RoundResult | null = null;
        try {
            while (this.state !== RoundState.TERMINATED && (rounds === undefined || roundsRun < rounds)) {
                lastResult = await this.runRound();
                roundsRun++;
                if (lastResult.success) {
                    successes++;
                }
            }
        } finally {
            signal?.removeEventListener('abort', onAbort);
        }

        let stoppedBy: RunSummary['stoppedBy'] = 'round-limit';
        if (this.state === RoundState.TERMINATED) {
            stoppedBy = this.cancelRequested ? 'cancelled' : 'max-rounds';
        }
        return { roundsRun, successes, stoppedBy, lastResult };
    }

    /**
     * Cancel the run
     * Aborts the in-flight decision query; the current round still completes
     * (remaining stations fall back without external calls) and then the
     * coordinator terminates.
     */
    cancel(): void {
        if (this.state === RoundState.TERMINATED) {
            return;
        }
        this.cancelRequested = true;
        this.cancelController.abort();
        if (!this.inFlight) {
            this.terminate('cancelled');
        }
    }

    snapshot(): CoordinatorSnapshot {
        return {
            state: this.state,
            round: this.round,
            maxRounds: this.maxRounds,
            demand: this.demand ? toPlainRecord(this.demand) : null,
            stationOrder: this.orderForRound(this.round + 1).map(station => station.id),
            pool: this.pool.snapshot(),
            lastFeedback: this.lastFeedback
        };
    }

    private assertOpen(): void {
        if (this.state === RoundState.TERMINATED) {
            throw new RunTerminatedError();
        }
        if (this.inFlight) {
            throw new RoundInProgressError();
        }
    }

    private async negotiateRound(): Promise<RoundResult> {
        const demand = this.currentDemand();
        this.round++;
        this.roundsSinceDemand++;

        // DEMAND_GENERATED → NEGOTIATING
        this.state = RoundState.NEGOTIATING;
        const proposals: StationCandidates[] = [];
        const candidates: StationCandidates[] = [];
        const fallbackStations: StationId[] = [];
        const degenerateStations: StationId[] = [];

        for (const station of this.orderForRound(this.round)) {
            const stationId = station.id;
            const expected = demand.get(stationId) ?? 0;
            const raw = await this.requestProposal(station, expected, demand, candidates);
            const outcome = validateProposal(raw, expected, this.pool, this.rng);

            if (outcome.usedFallback) {
                fallbackStations.push(stationId);
            }
            if (outcome.degenerate) {
                degenerateStations.push(stationId);
                this.logger.warn(`${stationId} demands ${expected} of ${this.pool.numSlots} slots; set repeats slots`);
            }
            proposals.push({ stationId, slots: outcome.proposed });
            candidates.push({ stationId, slots: outcome.slots });
        }

        // NEGOTIATING → RESOLVED
        // Validated sets are resolved; contests are judged on what stations actually proposed
        const resolution = this.resolver.resolve(candidates);
        this.pool.recordConflicts(proposals);
        this.pool.recordUsage(resolution.allocation);
        this.state = RoundState.RESOLVED;

        // RESOLVED → RECORDED
        const requested = candidates.reduce((sum, { slots }) => sum + slots.length, 0);
        const feedback = this.pool.feedback(proposals, resolution.allocation, requested);
        this.lastFeedback = feedback;
        const success = feedback.utilizationRate === 1
            && feedback.conflictSlots.length === 0
            && feedback.satisfactionRate === 1;
        const roundsSinceDemand = this.roundsSinceDemand;

        let record: SuccessRecord | null = null;
        let persistenceError: string | null = null;
        if (success) {
            ({ record, persistenceError } = await handleSuccess(
                demand,
                resolution.allocation,
                roundsSinceDemand,
                this.store,
                this.logger,
                this.now
            ));
        }
        this.state = RoundState.RECORDED;

        const result: RoundResult = {
            round: this.round,
            roundsSinceDemand,
            demand: toPlainRecord(demand),
            proposals,
            candidates,
            allocation: this.inStationOrder(resolution.allocation),
            shortfall: toPlainRecord(resolution.shortfall),
            feedback,
            success,
            record,
            fallbackStations,
            degenerateStations,
            persistenceError
        };
        this.logRound(result);

        this.advance(success);
        return result;
    }

    /**
     * RECORDED → DEMAND_GENERATED | NEGOTIATING | TERMINATED
     */
    private advance(success: boolean): void {
        if (this.cancelRequested) {
            this.terminate('cancelled');
        } else if (this.round >= this.maxRounds) {
            this.terminate(`reached max rounds (${this.maxRounds})`);
        } else if (success || isDemandRefreshDue(this.demandRefresh, this.roundsSinceDemand)) {
            this.regenerateDemand();
        } else {
            this.state = RoundState.NEGOTIATING;
        }
    }

    private terminate(reason: string): void {
        this.state = RoundState.TERMINATED;
        this.logger.info(`Run terminated after ${this.round} round(s): ${reason}`);
    }

    private currentDemand(): Demand {
        if (this.demand === null) {
            return this.regenerateDemand();
        }
        return this.demand;
    }

    private regenerateDemand(): Demand {
        const demand = generateDemand(this.stationIds, this.pool.numSlots, this.rng);
        this.demand = demand;
        this.roundsSinceDemand = 0;
        this.state = RoundState.DEMAND_GENERATED;
        this.logger.info(`New demand: ${formatDemand(demand)}`);
        return demand;
    }

    private orderForRound(round: number): Station[] {
        if (this.ordering === 'fixed' || this.stations.length === 0) {
            return [...this.stations];
        }
        const shift = (round - 1) % this.stations.length;
        return [...this.stations.slice(shift), ...this.stations.slice(0, shift)];
    }

    /**
     * Ask one station's decision source; every failure degrades to fallback
     *
     * @returns Raw slot entries, or null for "no usable proposal"
     */
    private async requestProposal(
        station: Station,
        expected: number,
        demand: Demand,
        earlier: StationCandidates[]
    ): Promise<unknown[] | null> {
        const { id: stationId, source } = station;
        const context: StationContext = {
            round: this.round,
            stationId,
            demand: expected,
            demandByStation: toPlainRecord(demand),
            numSlots: this.pool.numSlots,
            heatRanking: this.pool.heatRanking(),
            conflictHistory: this.pool.conflictRanking(),
            claimedThisRound: Object.fromEntries(earlier.map(c => [c.stationId, [...c.slots]])),
            lastFeedback: this.lastFeedback
        };

        try {
            const reply = await proposeWithDeadline(source, context, this.decisionTimeoutMs, this.cancelController.signal);
            const parsed = parseProposal(reply);
            if (!parsed) {
                return handleDecisionFailure(
                    stationId,
                    new DecisionSourceError('reply holds no usable slot list', stationId),
                    this.logger
                );
            }
            if (parsed.normalized) {
                this.logger.debug(`${stationId} reply needed repair before parsing`);
            }
            return parsed.entries;
        } catch (err) {
            return handleDecisionFailure(stationId, err, this.logger);
        }
    }

    private inStationOrder(allocation: Allocation): Record<StationId, number[]> {
        return Object.fromEntries(this.stationIds.map(id => [id, allocation.get(id) ?? []]));
    }

    private logRound(result: RoundResult): void {
        const slots = Object.entries(result.allocation)
            .map(([id, granted]) => `${id}=[${granted.join(',')}]`)
            .join(' ');
        const conflicts = result.feedback.conflictSlots.length > 0 ? result.feedback.conflictSlots.join(',') : 'none';
        this.logger.info(
            `Round ${result.round}: ${slots} | conflicts: ${conflicts} | ` +
            `utilization: ${Math.round(result.feedback.utilizationRate * 100)}%`
        );
    }
}

function formatDemand(demand: Demand): string {
    return Array.from(demand.entries()).map(([id, value]) => `${id}:${value}`).join(' ');
}
