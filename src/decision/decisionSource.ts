// src/decision/decisionSource.ts

import { DecisionSourceError, errorMessage } from '../lib/errors';
import { StationContext } from '../models/Round';

/**
 * External collaborator that proposes slots for one station
 *
 * Returns free text expected to contain a {"slots": [...]} object somewhere.
 * Implementations should stop work when `signal` aborts.
 */
export interface DecisionSource {
    propose(context: StationContext, signal: AbortSignal): Promise<string>;
}

/**
 * Query a decision source under a deadline
 *
 * The returned promise settles no later than `timeoutMs` (or the parent
 * signal's abort), even if the source ignores its signal.
 *
 * @throws DecisionSourceError on timeout, cancellation or source failure
 */
export function proposeWithDeadline(
    source: DecisionSource,
    context: StationContext,
    timeoutMs: number,
    parentSignal?: AbortSignal
): Promise<string> {
    const controller = new AbortController();

    return new Promise<string>((resolve, reject) => {
        let settled = false;
        const finish = (action: () => void): void => {
            if (settled) {
                return;
            }
            settled = true;
            clearTimeout(timer);
            parentSignal?.removeEventListener('abort', onParentAbort);
            action();
        };

        const timer = setTimeout(() => {
            controller.abort();
            finish(() => reject(new DecisionSourceError(
                `Decision source timed out after ${timeoutMs}ms`,
                context.stationId
            )));
        }, timeoutMs);

        const onParentAbort = (): void => {
            controller.abort();
            finish(() => reject(new DecisionSourceError('Decision request cancelled', context.stationId)));
        };

        if (parentSignal?.aborted) {
            onParentAbort();
            return;
        }
        parentSignal?.addEventListener('abort', onParentAbort, { once: true });

        const fail = (err: unknown): void => finish(() => reject(
            err instanceof DecisionSourceError
                ? err
                : new DecisionSourceError(errorMessage(err), context.stationId)
        ));

        let pending: Promise<string>;
        try {
            pending = source.propose(context, controller.signal);
        } catch (err) {
            fail(err);
            return;
        }
        pending.then(text => finish(() => resolve(text)), fail);
    });
}

/**
 * Sources keyed by station; stations without a dedicated source share one
 */
export type DecisionSourceMap = Map<string, DecisionSource>;

export function sourceForStation(
    sources: DecisionSourceMap | DecisionSource,
    stationId: string
): DecisionSource | undefined {
    return sources instanceof Map ? sources.get(stationId) : sources;
}
