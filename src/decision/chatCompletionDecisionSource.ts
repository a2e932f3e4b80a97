// src/decision/chatCompletionDecisionSource.ts

import { z } from 'zod';
import { DecisionSourceError, errorMessage } from '../lib/errors';
import { StationContext } from '../models/Round';
import { DecisionSource } from './decisionSource';

export interface ChatCompletionOptions {
    baseUrl: string;      // e.g. http://localhost:8000/v1
    model: string;
    apiKey?: string;
    temperature?: number;
    fetchFn?: typeof fetch;
}

const ChatCompletionResponseSchema = z.object({
    choices: z.array(z.object({
        message: z.object({
            content: z.string().nullable()
        })
    })).min(1)
});

/**
 * Decision source backed by an OpenAI-compatible chat completions endpoint
 *
 * The station context goes over as JSON; the reply content is returned
 * untouched for the tolerant parser to pick apart.
 */
export class ChatCompletionDecisionSource implements DecisionSource {
    private baseUrl: string;
    private model: string;
    private apiKey?: string;
    private temperature?: number;
    private fetchFn: typeof fetch;

    constructor(options: ChatCompletionOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.model = options.model;
        this.apiKey = options.apiKey;
        this.temperature = options.temperature;
        this.fetchFn = options.fetchFn ?? fetch;
    }

    async propose(context: StationContext, signal: AbortSignal): Promise<string> {
        const headers: Record<string, string> = { 'Content-Type': 'application/json' };
        if (this.apiKey) {
            headers.Authorization = `Bearer ${this.apiKey}`;
        }

        let response: Response;
        try {
            response = await this.fetchFn(`${this.baseUrl}/chat/completions`, {
                method: 'POST',
                headers,
                body: JSON.stringify({
                    model: this.model,
                    temperature: this.temperature,
                    messages: [
                        { role: 'system', content: buildSystemMessage(context) },
                        { role: 'user', content: JSON.stringify(context, null, 2) }
                    ]
                }),
                signal
            });
        } catch (err) {
            throw new DecisionSourceError(`Chat completion request failed: ${errorMessage(err)}`, context.stationId);
        }

        if (!response.ok) {
            throw new DecisionSourceError(
                `Chat completion returned HTTP ${response.status}`,
                context.stationId
            );
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (err) {
            throw new DecisionSourceError(`Chat completion body is not JSON: ${errorMessage(err)}`, context.stationId);
        }

        const parsed = ChatCompletionResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new DecisionSourceError('Chat completion response has no message content', context.stationId);
        }

        return parsed.data.choices[0].message.content ?? '';
    }
}

function buildSystemMessage(context: StationContext): string {
    return [
        `You control station ${context.stationId} sharing ${context.numSlots} slots (0-${context.numSlots - 1}).`,
        `Choose exactly ${context.demand} distinct slots.`,
        'Reply with JSON such as {"slots": [1, 3, 5], "reason": "..."}.'
    ].join(' ');
}
