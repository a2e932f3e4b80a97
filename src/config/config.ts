// src/config/config.ts

import { z } from 'zod';
import { DemandRefreshPolicy } from '../engine/demandPlanner';
import { StationOrdering } from '../engine/roundCoordinator';
import { ReplacementPolicy } from '../engine/replacementStrategy';
import { ConfigurationError } from '../lib/errors';
import { LOG_LEVELS, LogLevel } from '../lib/logger';

/**
 * Environment variables read by the server and the simulation
 */
const EnvSchema = z.object({
    STATION_COUNT: z.coerce.number().int().min(1).default(3),
    SLOT_COUNT: z.coerce.number().int().min(1).default(10),
    MAX_ROUNDS: z.coerce.number().int().min(1).default(200),
    DECISION_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),
    REPLACEMENT_POLICY: z.enum(['coolest', 'random']).default('coolest'),
    DEMAND_REFRESH: z.enum(['on-success', 'every-rounds']).default('on-success'),
    DEMAND_REFRESH_INTERVAL: z.coerce.number().int().min(1).default(5),
    STATION_ORDER: z.enum(['fixed', 'round-robin']).default('fixed'),
    RECORDS_FILE: z.string().min(1).default('success_records.json'),
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    DECISION_SOURCE: z.enum(['heuristic', 'chat']).default('heuristic'),
    HEURISTIC_NOISE: z.coerce.number().min(0).max(1).default(0.2),
    SEED: z.coerce.number().int().optional(),
    LLM_BASE_URL: z.string().url().optional(),
    LLM_API_KEY: z.string().optional(),
    LLM_MODEL: z.string().min(1).optional(),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).optional()
}).superRefine((env, ctx) => {
    if (env.STATION_COUNT > env.SLOT_COUNT) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['STATION_COUNT'],
            message: `STATION_COUNT (${env.STATION_COUNT}) must not exceed SLOT_COUNT (${env.SLOT_COUNT})`
        });
    }
    if (env.DECISION_SOURCE === 'chat' && (!env.LLM_BASE_URL || !env.LLM_MODEL)) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['DECISION_SOURCE'],
            message: 'DECISION_SOURCE=chat requires LLM_BASE_URL and LLM_MODEL'
        });
    }
});

export type DecisionSourceConfig =
    | { kind: 'heuristic'; noise: number }
    | { kind: 'chat'; baseUrl: string; model: string; apiKey?: string; temperature?: number };

export interface AppConfig {
    numStations: number;
    numSlots: number;
    maxRounds: number;
    decisionTimeoutMs: number;
    replacementPolicy: ReplacementPolicy;
    demandRefresh: DemandRefreshPolicy;
    stationOrdering: StationOrdering;
    recordsFile: string;
    port: number;
    logLevel: LogLevel;
    seed?: number;
    decisionSource: DecisionSourceConfig;
}

/**
 * Parse and validate run parameters
 *
 * Empty strings count as unset. Any problem is a ConfigurationError: the
 * run must not start.
 *
 * @param env Environment (defaults to process.env, after dotenv has loaded)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
    );
    const parsed = EnvSchema.safeParse(present);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => ({
            path: issue.path.join('.'),
            message: issue.message
        }));
        throw new ConfigurationError(
            `Invalid configuration: ${issues.map(i => `${i.path}: ${i.message}`).join('; ')}`,
            { issues }
        );
    }

    const e = parsed.data;
    const decisionSource: DecisionSourceConfig = e.DECISION_SOURCE === 'chat' && e.LLM_BASE_URL && e.LLM_MODEL
        ? {
            kind: 'chat',
            baseUrl: e.LLM_BASE_URL,
            model: e.LLM_MODEL,
            apiKey: e.LLM_API_KEY,
            temperature: e.LLM_TEMPERATURE
        }
        : { kind: 'heuristic', noise: e.HEURISTIC_NOISE };

    return {
        numStations: e.STATION_COUNT,
        numSlots: e.SLOT_COUNT,
        maxRounds: e.MAX_ROUNDS,
        decisionTimeoutMs: e.DECISION_TIMEOUT_MS,
        replacementPolicy: e.REPLACEMENT_POLICY,
        demandRefresh: e.DEMAND_REFRESH === 'every-rounds'
            ? { kind: 'every-rounds', interval: e.DEMAND_REFRESH_INTERVAL }
            : { kind: 'on-success' },
        stationOrdering: e.STATION_ORDER,
        recordsFile: e.RECORDS_FILE,
        port: e.PORT,
        logLevel: e.LOG_LEVEL,
        seed: e.SEED,
        decisionSource
    };
}
