// src/app.ts

import express from 'express';
import { ZodError } from 'zod';
import { ResourcePool } from './engine/resourcePool';
import { RoundCoordinator } from './engine/roundCoordinator';
import { Logger, silentLogger } from './lib/logger';
import { SuccessRecordStore } from './persistence/successRecordStore';
import { createPoolRoutes } from './routes/poolRoutes';
import { createRecordRoutes } from './routes/recordRoutes';
import { createRoundRoutes } from './routes/roundRoutes';

export interface AppDependencies {
    coordinator: RoundCoordinator;
    pool: ResourcePool;
    store: SuccessRecordStore;
    logger?: Logger;
}

/**
 * Express application setup
 *
 * State lives in the injected objects:
 * - coordinator: negotiation state machine
 * - pool: slot heat and conflict counters
 * - store: persisted success records
 */
export function createApp({ coordinator, pool, store, logger = silentLogger }: AppDependencies): express.Express {
    const app = express();

    // Middleware
    app.use(express.json());

    // Routes
    app.use('/rounds', createRoundRoutes(coordinator));
    app.use('/pool', createPoolRoutes(pool));
    app.use('/records', createRecordRoutes(store));

    // Health check
    app.get('/health', (_req, res) => {
        const { state, round } = coordinator.snapshot();
        res.json({ status: 'healthy', state, round });
    });

    // Error handling
    app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
        if (err instanceof ZodError) {
            res.status(400).json({
                error: 'Request validation failed',
                details: err.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
            });
            return;
        }

        const statusCode = statusCodeOf(err);
        if (statusCode >= 500) {
            logger.error(`${err.name}: ${err.message}`);
        }
        res.status(statusCode).json({ error: err.message });
    });

    return app;
}

function statusCodeOf(err: Error): number {
    if ('statusCode' in err && typeof err.statusCode === 'number') {
        return err.statusCode;
    }
    // body-parser marks malformed JSON with `status`
    if ('status' in err && typeof err.status === 'number') {
        return err.status;
    }
    return 500;
}
