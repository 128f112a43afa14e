import express, { Request, Response, Router } from 'express';

import type { HybridLiquidityEngine } from '../../engine.js';
import logger from '../../logger.js';
import { isTransactionType, processTransaction } from '../../transactions/index.js';
import { TransactionPayload } from '../../transactions/types.js';
import { sendServerError } from './utils.js';

const STATUS_BY_CODE: Record<string, number> = {
    INVALID_INPUT: 400,
    POOL_NOT_FOUND: 404,
    NO_ROUTE_AVAILABLE: 404,
    NO_FEES_TO_COLLECT: 404,
    POOL_EXISTS: 409,
    UNAUTHORIZED: 403,
    SYSTEM_PAUSED: 503,
    COOLDOWN_ACTIVE: 429,
};

function isPayload(value: unknown): value is TransactionPayload {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function createTxRouter(engine: HybridLiquidityEngine): Router {
    const router: Router = express.Router();

    // POST /tx { type, sender, data, id? }
    router.post('/', (req: Request, res: Response) => {
        const body: unknown = req.body;
        if (!isPayload(body)) {
            res.status(400).json({ success: false, error: 'body must be { type, sender, data }', code: 'INVALID_INPUT' });
            return;
        }
        const { type, sender, data, id: rawId } = body;
        if (!isTransactionType(type) || typeof sender !== 'string' || !isPayload(data)) {
            res.status(400).json({ success: false, error: 'body must be { type, sender, data }', code: 'INVALID_INPUT' });
            return;
        }
        const id = typeof rawId === 'string' ? rawId : undefined;
        try {
            const result = processTransaction(engine, { type, sender, data, id });
            if (!result.success) {
                res.status(STATUS_BY_CODE[result.code ?? ''] ?? 422).json(result);
                return;
            }
            logger.http(`[http] Applied transaction ${id ?? '(unnamed)'} of type ${type} from ${sender}`);
            res.json(result);
        } catch (error) {
            sendServerError(res, 'Error processing transaction', error);
        }
    });

    return router;
}
