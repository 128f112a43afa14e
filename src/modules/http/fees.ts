import express, { Request, Response, Router } from 'express';

import type { HybridLiquidityEngine } from '../../engine.js';
import { sendJson } from './utils.js';

export function createFeesRouter(engine: HybridLiquidityEngine): Router {
    const router: Router = express.Router();

    router.get('/', (_req: Request, res: Response) => {
        sendJson(res, { recipient: engine.getFeeRecipient(), balances: engine.listProtocolFees() });
    });

    router.get('/:assetId', (req: Request, res: Response) => {
        const { assetId } = req.params;
        sendJson(res, { assetId, amount: engine.getProtocolFees(assetId) });
    });

    return router;
}
