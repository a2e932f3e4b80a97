// src/runtime.ts

import { AppConfig } from './config/config';
import { ChatCompletionDecisionSource } from './decision/chatCompletionDecisionSource';
import { DecisionSource } from './decision/decisionSource';
import { HeuristicDecisionSource } from './decision/heuristicDecisionSource';
import { createReplacementStrategy } from './engine/replacementStrategy';
import { ResourcePool } from './engine/resourcePool';
import { RoundCoordinator } from './engine/roundCoordinator';
import { createLogger, Logger } from './lib/logger';
import { createSeededRng, defaultRng, Rng } from './lib/random';
import { createStationIds } from './models/Station';
import { JsonFileSuccessRecordStore, SuccessRecordStore } from './persistence/successRecordStore';

export interface Runtime {
    coordinator: RoundCoordinator;
    pool: ResourcePool;
    store: SuccessRecordStore;
    logger: Logger;
}

/**
 * Wire pool, store, decision sources and coordinator from configuration
 *
 * Loads persisted success records before any round runs.
 *
 * @param config Validated configuration
 * @param store Record store; defaults to the configured JSON file
 */
export async function createRuntime(config: AppConfig, store?: SuccessRecordStore): Promise<Runtime> {
    const logger = createLogger('coordinator', config.logLevel);
    const rng = config.seed !== undefined ? createSeededRng(config.seed) : defaultRng;
    const recordStore = store ?? new JsonFileSuccessRecordStore(config.recordsFile);

    const previous = await recordStore.load();
    if (previous.length > 0) {
        logger.info(`Loaded ${previous.length} success record(s)`);
    }

    const pool = new ResourcePool(config.numSlots);
    const coordinator = new RoundCoordinator({
        stationIds: createStationIds(config.numStations),
        pool,
        sources: createDecisionSource(config, rng),
        store: recordStore,
        maxRounds: config.maxRounds,
        strategy: createReplacementStrategy(config.replacementPolicy, rng),
        rng,
        demandRefresh: config.demandRefresh,
        ordering: config.stationOrdering,
        decisionTimeoutMs: config.decisionTimeoutMs,
        logger
    });

    return { coordinator, pool, store: recordStore, logger };
}

function createDecisionSource(config: AppConfig, rng: Rng): DecisionSource {
    const source = config.decisionSource;
    if (source.kind === 'chat') {
        return new ChatCompletionDecisionSource({
            baseUrl: source.baseUrl,
            model: source.model,
            apiKey: source.apiKey,
            temperature: source.temperature
        });
    }
    return new HeuristicDecisionSource({ rng, noise: source.noise });
}
