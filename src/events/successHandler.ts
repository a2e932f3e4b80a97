// src/events/successHandler.ts

import { errorMessage } from '../lib/errors';
import { Logger } from '../lib/logger';
import { SuccessRecord } from '../models/Round';
import { Allocation, Demand, toPlainRecord } from '../models/Station';
import { SuccessRecordStore } from '../persistence/successRecordStore';

export interface SuccessOutcome {
    record: SuccessRecord;
    persistenceError: string | null;
}

/**
 * Handle a success round (full utilization, zero raw conflicts)
 *
 * Side effects:
 * 1. Build the success record
 * 2. Append it to the store
 *
 * A store failure is reported back, never thrown: persistence is a side
 * effect and later rounds do not depend on it.
 *
 * @param demand Demand the round was negotiated under
 * @param allocation Final allocation
 * @param roundsToSuccess Rounds since this demand was generated (first = 1)
 * @param store Success-record store
 * @param logger Logger
 * @param now Clock
 */
export async function handleSuccess(
    demand: Demand,
    allocation: Allocation,
    roundsToSuccess: number,
    store: SuccessRecordStore,
    logger: Logger,
    now: () => Date = () => new Date()
): Promise<SuccessOutcome> {
    const record: SuccessRecord = {
        demand: toPlainRecord(demand),
        allocation: toPlainRecord(allocation),
        roundsToSuccess,
        timestamp: now().toISOString()
    };

    try {
        await store.append(record);
        logger.info(`Success after ${roundsToSuccess} round(s); ${store.list().length} record(s) stored`);
        return { record, persistenceError: null };
    } catch (err) {
        const message = errorMessage(err);
        logger.error(`Could not persist success record: ${message}`);
        return { record, persistenceError: message };
    }
}
