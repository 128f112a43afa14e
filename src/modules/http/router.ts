import express, { Request, Response, Router } from 'express';

import type { HybridLiquidityEngine } from '../../engine.js';
import { isEngineError } from '../../errors.js';
import { getQueryAmount, getQueryParam, sendEngineError, sendJson, sendServerError } from './utils.js';

export function createRouterRouter(engine: HybridLiquidityEngine): Router {
    const router: Router = express.Router();

    // GET /router/quote?from=ART&to=GEM&amountIn=1000
    router.get('/quote', (req: Request, res: Response) => {
        const from = getQueryParam(req, 'from');
        const to = getQueryParam(req, 'to');
        const amountIn = getQueryAmount(req, 'amountIn');
        if (!from || !to || amountIn === null) {
            res.status(400).json({ success: false, error: 'from, to and amountIn are required' });
            return;
        }
        try {
            sendJson(res, { fromAssetId: from, toAssetId: to, amountIn, ...engine.quoteRoutes(from, to, amountIn) });
        } catch (error) {
            if (isEngineError(error)) return sendEngineError(res, error);
            sendServerError(res, `Error quoting route ${from}->${to}`, error);
        }
    });

    return router;
}
