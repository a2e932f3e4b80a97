// src/routes/recordRoutes.ts

import { Request, Response, Router } from 'express';
import { SuccessRecordStore } from '../persistence/successRecordStore';

/**
 * Success records collected so far (including ones loaded at start)
 * GET /records
 */
export function createRecordRoutes(store: SuccessRecordStore): Router {
    const router = Router();

    router.get('/', (_req: Request, res: Response) => {
        const records = store.list();
        res.json({ count: records.length, records });
    });

    return router;
}
