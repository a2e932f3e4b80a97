import { DecisionSource } from '../decision/decisionSource';
import { Rng } from '../lib/random';
import { StationContext } from '../models/Round';

// ─── Test Helpers ────────────────────────────────────────────────────────────

/**
 * Rng that always returns the same value
 */
export function constantRng(value: number): Rng {
    return () => value;
}

export type ScriptedReply = string | Error | (() => Promise<string>);

/**
 * Decision source that plays back replies in order and records each context
 */
export class ScriptedDecisionSource implements DecisionSource {
    readonly contexts: StationContext[] = [];
    private replies: ScriptedReply[];
    private onCall?: (context: StationContext) => void;

    constructor(replies: ScriptedReply[], onCall?: (context: StationContext) => void) {
        this.replies = [...replies];
        this.onCall = onCall;
    }

    propose(context: StationContext): Promise<string> {
        this.contexts.push(context);
        this.onCall?.(context);
        const next = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
        if (next === undefined) {
            return Promise.resolve('');
        }
        if (next instanceof Error) {
            return Promise.reject(next);
        }
        if (typeof next === 'function') {
            return next();
        }
        return Promise.resolve(next);
    }
}

export function slotsReply(slots: number[]): string {
    return JSON.stringify({ slots, reason: 'test' });
}
