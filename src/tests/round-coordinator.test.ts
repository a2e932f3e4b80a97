import { describe, it, expect } from 'vitest';
import { DecisionSource } from '../decision/decisionSource';
import { ResourcePool } from '../engine/resourcePool';
import { RoundCoordinator, RoundCoordinatorOptions } from '../engine/roundCoordinator';
import {
    ConfigurationError,
    PersistenceError,
    RoundInProgressError,
    RunTerminatedError,
    ValidationError
} from '../lib/errors';
import { RoundState, SuccessRecord } from '../models/Round';
import { InMemorySuccessRecordStore } from '../persistence/successRecordStore';
import { constantRng, ScriptedDecisionSource, slotsReply } from './helpers';

const FIXED_NOW = new Date('2024-01-01T00:00:00.000Z');

class FailingStore extends InMemorySuccessRecordStore {
    async append(_record: SuccessRecord): Promise<void> {
        throw new PersistenceError('disk full', '/tmp/records.json');
    }
}

function createCoordinator(
    sources: Record<string, DecisionSource>,
    overrides: Partial<RoundCoordinatorOptions> = {}
): RoundCoordinator {
    const stationIds = Object.keys(sources);
    return new RoundCoordinator({
        stationIds,
        pool: new ResourcePool(4),
        sources: new Map(Object.entries(sources)),
        store: new InMemorySuccessRecordStore(),
        maxRounds: 10,
        rng: constantRng(0),
        decisionTimeoutMs: 1000,
        now: () => FIXED_NOW,
        demand: new Map(stationIds.map(id => [id, 2])),
        ...overrides
    });
}

describe('RoundCoordinator', () => {
    describe('success path', () => {
        it('records disjoint proposals that cover the pool', async () => {
            const store = new InMemorySuccessRecordStore();
            const coordinator = createCoordinator({
                A: new ScriptedDecisionSource([slotsReply([0, 1])]),
                B: new ScriptedDecisionSource([slotsReply([2, 3])])
            }, { store });

            const result = await coordinator.runRound();

            expect(result.success).toBe(true);
            expect(result.feedback).toEqual({
                conflictSlots: [],
                conflictDetails: {},
                idleSlots: [],
                utilizationRate: 1,
                satisfactionRate: 1
            });
            expect(store.list()).toEqual([{
                demand: { A: 2, B: 2 },
                allocation: { A: [0, 1], B: [2, 3] },
                roundsToSuccess: 1,
                timestamp: '2024-01-01T00:00:00.000Z'
            }]);
            expect(result.record).toEqual(store.list()[0]);
            expect(coordinator.getState()).toBe(RoundState.DEMAND_GENERATED);
        });

        it('judges contests on what stations proposed, not on backfill', async () => {
            const store = new InMemorySuccessRecordStore();
            const pool = new ResourcePool(4);
            const coordinator = createCoordinator({
                A: new ScriptedDecisionSource([slotsReply([0])]),
                B: new ScriptedDecisionSource([slotsReply([3])])
            }, { store, pool });

            const result = await coordinator.runRound();

            expect(result.proposals).toEqual([
                { stationId: 'A', slots: [0] },
                { stationId: 'B', slots: [3] }
            ]);
            expect(result.candidates).toEqual([
                { stationId: 'A', slots: [0, 1] },
                { stationId: 'B', slots: [0, 3] }
            ]);
            expect(result.allocation).toEqual({ A: [0, 1], B: [2, 3] });
            expect(result.feedback).toEqual({
                conflictSlots: [],
                conflictDetails: {},
                idleSlots: [1, 2],
                utilizationRate: 1,
                satisfactionRate: 1
            });
            expect(result.success).toBe(true);
            expect(pool.snapshot().conflictHistory).toEqual([0, 0, 0, 0]);
            expect(store.list()).toHaveLength(1);
        });

        it('counts rounds since demand was generated', async () => {
            const store = new InMemorySuccessRecordStore();
            const coordinator = createCoordinator({
                A: new ScriptedDecisionSource([slotsReply([0, 1])]),
                B: new ScriptedDecisionSource([slotsReply([1, 2]), slotsReply([2, 3])])
            }, { store });

            const first = await coordinator.runRound();

            expect(first.success).toBe(false);
            expect(first.feedback.conflictSlots).toEqual([1]);
            expect(first.feedback.conflictDetails).toEqual({ 1: ['A', 'B'] });
            expect(first.allocation).toEqual({ A: [0, 1], B: [2, 3] });
            expect(coordinator.getState()).toBe(RoundState.NEGOTIATING);

            const second = await coordinator.runRound();

            expect(second.success).toBe(true);
            expect(second.round).toBe(2);
            expect(store.list().map(record => record.roundsToSuccess)).toEqual([2]);
        });

        it('surfaces a persistence failure without stopping the run', async () => {
            const coordinator = createCoordinator({
                A: new ScriptedDecisionSource([slotsReply([0, 1])]),
                B: new ScriptedDecisionSource([slotsReply([2, 3])])
            }, { store: new FailingStore() });

            const result = await coordinator.runRound();

            expect(result.success).toBe(true);
            expect(result.record?.roundsToSuccess).toBe(1);
            expect(result.persistenceError).toBe('disk full');
            expect(coordinator.getState()).toBe(RoundState.DEMAND_GENERATED);
        });
    });

    describe('scarcity', () => {
        it('reports shortfall and skips the record when demand exceeds the pool', async () => {
            const shared = new ScriptedDecisionSource([slotsReply([0, 1])]);
            const store = new InMemorySuccessRecordStore();
            const coordinator = createCoordinator({ A: shared, B: shared, C: shared }, { store });

            const result = await coordinator.runRound();

            expect(result.allocation).toEqual({ A: [0, 1], B: [2, 3], C: [] });
            expect(result.shortfall).toEqual({ A: 0, B: 0, C: 2 });
            expect(result.feedback.utilizationRate).toBe(1);
            expect(result.feedback.satisfactionRate).toBe(4 / 6);
            expect(result.success).toBe(false);
            expect(store.list()).toEqual([]);
        });
    });

    describe('decision failures', () => {
        it('falls back on errors and unusable replies', async () => {
            const coordinator = createCoordinator({
                A: new ScriptedDecisionSource([new Error('boom')]),
                B: new ScriptedDecisionSource(['no idea'])
            });

            const result = await coordinator.runRound();

            expect(result.fallbackStations).toEqual(['A', 'B']);
            expect(result.proposals).toEqual([
                { stationId: 'A', slots: [] },
                { stationId: 'B', slots: [] }
            ]);
            expect(result.candidates).toEqual([
                { stationId: 'A', slots: [0, 1] },
                { stationId: 'B', slots: [0, 1] }
            ]);
            expect(result.allocation).toEqual({ A: [0, 1], B: [2, 3] });
            // Nothing was proposed, so nothing was contested
            expect(result.feedback.conflictSlots).toEqual([]);
            expect(result.feedback.idleSlots).toEqual([0, 1, 2, 3]);
            expect(result.success).toBe(true);
        });

        it('falls back when a source misses its deadline', async () => {
            const coordinator = createCoordinator({
                A: new ScriptedDecisionSource([() => new Promise<string>(() => undefined)]),
                B: new ScriptedDecisionSource([slotsReply([2, 3])])
            }, { decisionTimeoutMs: 20 });

            const result = await coordinator.runRound();

            expect(result.fallbackStations).toEqual(['A']);
            expect(result.allocation).toEqual({ A: [0, 1], B: [2, 3] });
            expect(result.success).toBe(true);
        });

        it('repairs partial proposals without marking them as fallback', async () => {
            const coordinator = createCoordinator({
                A: new ScriptedDecisionSource(['{slots: [3, 3, 9],}']),
                B: new ScriptedDecisionSource([slotsReply([0, 1])])
            });

            const result = await coordinator.runRound();

            expect(result.fallbackStations).toEqual([]);
            expect(result.candidates[0]).toEqual({ stationId: 'A', slots: [0, 3] });
        });
    });

    describe('station context', () => {
        it('tells later stations what earlier stations claimed', async () => {
            const a = new ScriptedDecisionSource([slotsReply([0, 1])]);
            const b = new ScriptedDecisionSource([slotsReply([2, 3])]);
            const coordinator = createCoordinator({ A: a, B: b });

            await coordinator.runRound();

            expect(a.contexts[0].claimedThisRound).toEqual({});
            expect(b.contexts[0]).toMatchObject({
                round: 1,
                stationId: 'B',
                demand: 2,
                demandByStation: { A: 2, B: 2 },
                numSlots: 4,
                claimedThisRound: { A: [0, 1] },
                lastFeedback: null
            });
        });

        it('passes the previous round feedback along', async () => {
            const a = new ScriptedDecisionSource([slotsReply([0, 1])]);
            const coordinator = createCoordinator({ A: a, B: new ScriptedDecisionSource([slotsReply([1, 2])]) });

            await coordinator.runRound();
            await coordinator.runRound();

            expect(a.contexts[1].lastFeedback?.conflictSlots).toEqual([1]);
            expect(a.contexts[1].conflictHistory).toEqual([{ slot: 1, count: 1 }]);
        });

        it('rotates the first mover under round-robin ordering', async () => {
            const shared = new ScriptedDecisionSource(['pass']);
            const coordinator = createCoordinator(
                { A: shared, B: shared, C: shared },
                { pool: new ResourcePool(6), ordering: 'round-robin' }
            );

            await coordinator.run({ rounds: 3 });

            expect(shared.contexts.map(context => context.stationId)).toEqual([
                'A', 'B', 'C',
                'B', 'C', 'A',
                'C', 'A', 'B'
            ]);
        });
    });

    describe('lifecycle', () => {
        it('terminates after max rounds', async () => {
            const shared = new ScriptedDecisionSource(['pass']);
            const coordinator = createCoordinator({ A: shared, B: shared }, { maxRounds: 2 });

            const summary = await coordinator.run();

            expect(summary.roundsRun).toBe(2);
            expect(summary.stoppedBy).toBe('max-rounds');
            expect(coordinator.getState()).toBe(RoundState.TERMINATED);
            await expect(coordinator.runRound()).rejects.toBeInstanceOf(RunTerminatedError);
        });

        it('stops a batch without terminating', async () => {
            const shared = new ScriptedDecisionSource([slotsReply([0, 1])]);
            const coordinator = createCoordinator({ A: shared, B: shared });

            const summary = await coordinator.run({ rounds: 2 });

            expect(summary).toMatchObject({ roundsRun: 2, successes: 0, stoppedBy: 'round-limit' });
            expect(coordinator.getState()).toBe(RoundState.NEGOTIATING);
        });

        it('does not start when the signal is already aborted', async () => {
            const shared = new ScriptedDecisionSource(['pass']);
            const coordinator = createCoordinator({ A: shared, B: shared });
            const controller = new AbortController();
            controller.abort();

            const summary = await coordinator.run({ signal: controller.signal });

            expect(summary).toEqual({ roundsRun: 0, successes: 0, stoppedBy: 'cancelled', lastResult: null });
            expect(shared.contexts).toEqual([]);
        });

        it('aborts the in-flight query and finishes the round on fallback', async () => {
            const b = new ScriptedDecisionSource([slotsReply([2, 3])]);
            const coordinator: RoundCoordinator = createCoordinator({
                A: new ScriptedDecisionSource([() => {
                    coordinator.cancel();
                    return new Promise<string>(() => undefined);
                }]),
                B: b
            });

            const result = await coordinator.runRound();

            expect(result.fallbackStations).toEqual(['A', 'B']);
            expect(b.contexts).toEqual([]);
            expect(coordinator.getState()).toBe(RoundState.TERMINATED);
        });

        it('rejects a second round while one is running', async () => {
            let release: (reply: string) => void = () => undefined;
            const coordinator = createCoordinator({
                A: new ScriptedDecisionSource([() => new Promise<string>(resolve => { release = resolve; })]),
                B: new ScriptedDecisionSource([slotsReply([2, 3])])
            });

            const first = coordinator.runRound();
            await expect(coordinator.runRound()).rejects.toBeInstanceOf(RoundInProgressError);
            release(slotsReply([0, 1]));

            expect((await first).success).toBe(true);
        });

        it('regenerates demand on schedule', async () => {
            const shared = new ScriptedDecisionSource([slotsReply([0, 1])]);
            const coordinator = createCoordinator(
                { A: shared, B: shared },
                { demandRefresh: { kind: 'every-rounds', interval: 2 } }
            );

            const results = [await coordinator.runRound(), await coordinator.runRound(), await coordinator.runRound()];

            expect(results.map(result => result.roundsSinceDemand)).toEqual([1, 2, 1]);
        });

        it('generates demand on the first round when none was given', async () => {
            const shared = new ScriptedDecisionSource(['pass']);
            const coordinator = createCoordinator({ A: shared, B: shared }, { demand: undefined });

            expect(coordinator.getState()).toBe(RoundState.IDLE);
            const result = await coordinator.runRound();

            expect(result.demand).toEqual({ A: 2, B: 2 });
        });

        it('reports its state in a snapshot', async () => {
            const coordinator = createCoordinator({
                A: new ScriptedDecisionSource([slotsReply([0, 1])]),
                B: new ScriptedDecisionSource([slotsReply([2, 3])])
            });

            await coordinator.runRound();

            expect(coordinator.snapshot()).toMatchObject({
                state: RoundState.DEMAND_GENERATED,
                round: 1,
                maxRounds: 10,
                demand: { A: 2, B: 2 },
                stationOrder: ['A', 'B'],
                pool: { heat: [1, 1, 1, 1], conflictHistory: [0, 0, 0, 0] }
            });
        });
    });

    describe('configuration', () => {
        const source = new ScriptedDecisionSource(['pass']);

        it('rejects infeasible or inconsistent setups', () => {
            expect(() => createCoordinator({ A: source, B: source, C: source }, { pool: new ResourcePool(2), demand: undefined }))
                .toThrow(ConfigurationError);
            expect(() => createCoordinator({ A: source }, { stationIds: ['A', 'A'], demand: undefined }))
                .toThrow('Station ids must be unique');
            expect(() => createCoordinator({ A: source }, { stationIds: ['A', 'B'], demand: undefined }))
                .toThrow("No decision source configured for station 'B'");
            expect(() => createCoordinator({ A: source }, { maxRounds: 0 })).toThrow(ConfigurationError);
            expect(() => createCoordinator({ A: source }, { demandRefresh: { kind: 'every-rounds', interval: 0 } }))
                .toThrow(ConfigurationError);
        });

        it('validates operator demand', () => {
            const coordinator = createCoordinator({ A: source, B: source });

            expect(() => coordinator.setDemand(new Map([['A', 1], ['Z', 1]]))).toThrow(ValidationError);
            coordinator.setDemand(new Map([['A', 3], ['B', 3]]));
            expect(coordinator.getDemand()).toEqual(new Map([['A', 3], ['B', 3]]));
        });
    });
});
