// src/routes/roundRoutes.ts

import { NextFunction, Request, Response, Router } from 'express';
import { z } from 'zod';
import { RoundCoordinator } from '../engine/roundCoordinator';

const RunRoundsBodySchema = z.object({
    rounds: z.number().int().min(1).max(10000)
});

const DemandBodySchema = z.object({
    demand: z.record(z.number().int().min(1))
});

/**
 * Round routes - HTTP mapping only
 * Negotiation logic lives in the coordinator
 */
export function createRoundRoutes(coordinator: RoundCoordinator): Router {
    const router = Router();

    /**
     * Run one negotiation round
     * POST /rounds
     */
    router.post('/', (_req: Request, res: Response, next: NextFunction) => {
        coordinator.runRound()
            .then(result => res.json({ result }))
            .catch(next);
    });

    /**
     * Run a batch of rounds (stops early on termination)
     * POST /rounds/run
     * Body: { rounds }
     */
    router.post('/run', (req: Request, res: Response, next: NextFunction) => {
        const body = RunRoundsBodySchema.parse(req.body);
        coordinator.run({ rounds: body.rounds })
            .then(summary => res.json({ summary }))
            .catch(next);
    });

    /**
     * Cancel the run
     * POST /rounds/cancel
     */
    router.post('/cancel', (_req: Request, res: Response) => {
        coordinator.cancel();
        res.json({ state: coordinator.getState() });
    });

    /**
     * Coordinator state, demand, pool and last feedback
     * GET /rounds/state
     */
    router.get('/state', (_req: Request, res: Response) => {
        res.json(coordinator.snapshot());
    });

    /**
     * Override the current demand
     * PUT /rounds/demand
     * Body: { demand: { [stationId]: count } }
     */
    router.put('/demand', (req: Request, res: Response) => {
        const body = DemandBodySchema.parse(req.body);
        coordinator.setDemand(new Map(Object.entries(body.demand)));
        res.json({ demand: coordinator.snapshot().demand });
    });

    return router;
}
