// src/simulation/runNegotiationSimulation.ts

import { HeuristicDecisionSource } from '../decision/heuristicDecisionSource';
import { createReplacementStrategy, ReplacementPolicy } from '../engine/replacementStrategy';
import { ResourcePool } from '../engine/resourcePool';
import { RoundCoordinator, StationOrdering } from '../engine/roundCoordinator';
import { createLogger } from '../lib/logger';
import { createSeededRng } from '../lib/random';
import { RoundResult, RoundState, RunSummary } from '../models/Round';
import { createStationIds } from '../models/Station';
import { InMemorySuccessRecordStore } from '../persistence/successRecordStore';

/**
 * Scripted negotiation run
 *
 * Demonstrates:
 * - Noisy station controllers (malformed and random replies)
 * - Fallback repair of unusable proposals
 * - Sequential conflict resolution with heat-aware replacements
 * - Demand regeneration after each success
 * - Invariant checks on every round
 */

export interface SimulationOptions {
    numStations: number;
    numSlots: number;
    rounds: number;
    seed: number;
    noise: number;
    replacementPolicy: ReplacementPolicy;
    ordering: StationOrdering;
    print: (line: string) => void;
}

export interface SimulationReport {
    summary: RunSummary;
    results: RoundResult[];
    invariantsHold: boolean;
}

const DEFAULT_OPTIONS: SimulationOptions = {
    numStations: 3,
    numSlots: 10,
    rounds: 20,
    seed: 7,
    noise: 0.3,
    replacementPolicy: 'coolest',
    ordering: 'round-robin',
    print: line => console.log(line)
};

export async function runSimulation(overrides: Partial<SimulationOptions> = {}): Promise<SimulationReport> {
    const options = { ...DEFAULT_OPTIONS, ...overrides };
    const { print } = options;

    const logSection = (title: string): void => {
        print('\n' + '='.repeat(80));
        print(title);
        print('='.repeat(80) + '\n');
    };

    logSection('SLOT NEGOTIATION SIMULATION - START');

    // ========== STEP 1: Build the pool and stations ==========
    const rng = createSeededRng(options.seed);
    const stationIds = createStationIds(options.numStations);
    const pool = new ResourcePool(options.numSlots);
    const store = new InMemorySuccessRecordStore();
    const coordinator = new RoundCoordinator({
        stationIds,
        pool,
        sources: new HeuristicDecisionSource({ rng, noise: options.noise }),
        store,
        maxRounds: options.rounds,
        strategy: createReplacementStrategy(options.replacementPolicy, rng),
        rng,
        ordering: options.ordering,
        decisionTimeoutMs: 1000,
        logger: createLogger('simulation', 'warn')
    });

    print(`Stations: ${stationIds.join(', ')} | Slots: ${options.numSlots} | Rounds: ${options.rounds}`);

    // ========== STEP 2: Negotiate ==========
    logSection('NEGOTIATION ROUNDS');

    const results: RoundResult[] = [];
    let invariantsHold = true;
    let stoppedBy: RunSummary['stoppedBy'] = 'round-limit';

    while (coordinator.getState() !== RoundState.TERMINATED) {
        const batch = await coordinator.run({ rounds: 1 });
        stoppedBy = batch.stoppedBy;
        const result = batch.lastResult;
        if (result === null) {
            break;
        }
        results.push(result);

        print(`Round ${result.round} (demand ${formatRecord(result.demand)})`);
        for (const [stationId, slots] of Object.entries(result.allocation)) {
            const shortfall = result.shortfall[stationId] ?? 0;
            const note = shortfall > 0 ? ` (short ${shortfall})` : '';
            print(`  ${stationId}: [${slots.join(', ')}]${note}`);
        }
        const conflicts = result.feedback.conflictSlots
            .map(slot => `${slot} (${(result.feedback.conflictDetails[slot] ?? []).join('/')})`)
            .join(', ');
        print(`  Conflicts: ${conflicts || 'none'}`);
        print(`  Utilization: ${Math.round(result.feedback.utilizationRate * 100)}%`);
        if (result.fallbackStations.length > 0) {
            print(`  Fallback used by: ${result.fallbackStations.join(', ')}`);
        }
        if (result.success) {
            print('  ✓ Perfect allocation');
        }

        // Invariant 1: final sets are pairwise disjoint
        const granted = Object.values(result.allocation).flat();
        if (new Set(granted).size !== granted.length) {
            print('  ✗ VIOLATED: a slot was granted to two stations');
            invariantsHold = false;
        }

        // Invariant 2: demand values >= 1 and sum to the pool size
        const demandValues = Object.values(result.demand);
        const demandTotal = demandValues.reduce((sum, v) => sum + v, 0);
        if (demandValues.some(v => v < 1) || demandTotal !== options.numSlots) {
            print(`  ✗ VIOLATED: demand total ${demandTotal} != ${options.numSlots}`);
            invariantsHold = false;
        }

        // Invariant 3: candidate sets match demand
        for (const candidate of result.candidates) {
            if (candidate.slots.length !== result.demand[candidate.stationId]) {
                print(`  ✗ VIOLATED: ${candidate.stationId} candidate size differs from demand`);
                invariantsHold = false;
            }
        }
    }

    // Final summary
    logSection('SIMULATION SUMMARY');

    const successes = results.filter(r => r.success).length;
    const summary: RunSummary = {
        roundsRun: results.length,
        successes,
        stoppedBy,
        lastResult: results.length > 0 ? results[results.length - 1] : null
    };

    print(`Rounds: ${summary.roundsRun} (stopped by ${summary.stoppedBy})`);
    print(`Successes: ${successes} (records stored: ${store.list().length})`);
    print(`Heat: [${pool.snapshot().heat.join(', ')}]`);
    print(`Conflict history: [${pool.snapshot().conflictHistory.join(', ')}]`);
    print(`\nAll Invariants Hold: ${invariantsHold ? '✓ YES' : '✗ NO'}`);

    logSection('SIMULATION COMPLETE');

    return { summary, results, invariantsHold };
}

function formatRecord(record: Record<string, number>): string {
    return Object.entries(record).map(([id, value]) => `${id}:${value}`).join(' ');
}

if (require.main === module) {
    runSimulation().catch((err: unknown) => {
        console.error(err);
        process.exit(1);
    });
}
