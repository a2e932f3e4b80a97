// src/routes/poolRoutes.ts

import { Request, Response, Router } from 'express';
import { z } from 'zod';
import { ResourcePool } from '../engine/resourcePool';

const CoolestQuerySchema = z.object({
    n: z.coerce.number().int().min(1),
    exclude: z.string().optional()
});

/**
 * Pool routes - read-only views of slot heat and conflict history
 */
export function createPoolRoutes(pool: ResourcePool): Router {
    const router = Router();

    /**
     * GET /pool
     */
    router.get('/', (_req: Request, res: Response) => {
        res.json({ pool: pool.snapshot(), conflictRanking: pool.conflictRanking() });
    });

    /**
     * Coolest slots outside an exclusion list
     * GET /pool/coolest?n=3&exclude=1,2
     */
    router.get('/coolest', (req: Request, res: Response) => {
        const query = CoolestQuerySchema.parse(req.query);
        const excluding = (query.exclude ?? '')
            .split(',')
            .map(part => part.trim())
            .filter(part => part !== '')
            .map(Number)
            .filter(Number.isInteger);

        res.json({ slots: pool.coolestSlots(query.n, excluding) });
    });

    return router;
}
