import express, { Request, Response, Router } from 'express';

import type { HybridLiquidityEngine } from '../../engine.js';
import { isEngineError } from '../../errors.js';
import { validateSwapDirection } from '../../validation/pool.js';
import { getPagination, getQueryAmount, getQueryParam, sendEngineError, sendJson, sendServerError } from './utils.js';

const DEFAULT_TWAP_WINDOW = 3600;

export function createPoolsRouter(engine: HybridLiquidityEngine): Router {
    const router: Router = express.Router();

    router.get('/', (req: Request, res: Response) => {
        const { limit, skip, page } = getPagination(req);
        const pools = engine.listPools();
        sendJson(res, { data: pools.slice(skip, skip + limit), total: pools.length, limit, skip, page });
    });

    router.get('/:poolId', (req: Request, res: Response) => {
        const pool = engine.getPoolById(req.params.poolId);
        if (!pool) {
            res.status(404).json({ success: false, error: `Liquidity pool ${req.params.poolId} not found.` });
            return;
        }
        sendJson(res, pool);
    });

    router.get('/:poolId/twap', (req: Request, res: Response) => {
        const { poolId } = req.params;
        const windowParam = getQueryParam(req, 'window');
        const window = windowParam === undefined ? DEFAULT_TWAP_WINDOW : Number(windowParam);
        if (!Number.isSafeInteger(window) || window <= 0) {
            res.status(400).json({ success: false, error: 'window must be a positive number of seconds' });
            return;
        }
        try {
            sendJson(res, { poolId, window, twap: engine.getTwap(poolId, window) });
        } catch (error) {
            if (isEngineError(error)) return sendEngineError(res, error);
            sendServerError(res, `Error computing TWAP for ${poolId}`, error);
        }
    });

    router.get('/:poolId/providers', (req: Request, res: Response) => {
        const { poolId } = req.params;
        sendJson(res, {
            poolId,
            providers: engine.listProviders(poolId).map(provider => ({ provider, shares: engine.getProviderShares(poolId, provider) })),
        });
    });

    router.get('/:poolId/providers/:provider', (req: Request, res: Response) => {
        const { poolId, provider } = req.params;
        sendJson(res, { poolId, provider, shares: engine.getProviderShares(poolId, provider) });
    });

    router.get('/:poolId/quote', (req: Request, res: Response) => {
        const pool = engine.getPoolById(req.params.poolId);
        if (!pool) {
            res.status(404).json({ success: false, error: `Liquidity pool ${req.params.poolId} not found.` });
            return;
        }
        const direction = getQueryParam(req, 'direction');
        const amountIn = getQueryAmount(req, 'amountIn');
        if (!validateSwapDirection(direction) || amountIn === null) {
            res.status(400).json({ success: false, error: 'direction (buy|sell) and amountIn are required' });
            return;
        }
        try {
            sendJson(res, engine.quoteSwap(pool.assetId, pool.routeType, direction, amountIn));
        } catch (error) {
            if (isEngineError(error)) return sendEngineError(res, error);
            sendServerError(res, `Error quoting swap on ${pool.poolId}`, error);
        }
    });

    return router;
}
