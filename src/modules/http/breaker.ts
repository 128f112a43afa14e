import express, { Request, Response, Router } from 'express';

import type { HybridLiquidityEngine } from '../../engine.js';
import { sendJson } from './utils.js';

export function createBreakerRouter(engine: HybridLiquidityEngine): Router {
    const router: Router = express.Router();

    router.get('/', (_req: Request, res: Response) => {
        sendJson(res, { ...engine.getCircuitBreakerStatus(), paused: engine.isPaused(), now: engine.now() });
    });

    return router;
}
