import express, { Request, Response, Router } from 'express';

import type { HybridLiquidityEngine } from '../../engine.js';
import { EventCategory } from '../../utils/event-logger.js';
import { getPagination, getQueryParam, sendJson } from './utils.js';

const categories: EventCategory[] = ['pool', 'swap', 'router', 'fees', 'breaker', 'admin'];

function isEventCategory(value: string | undefined): value is EventCategory {
    return categories.some(category => category === value);
}

export function createEventsRouter(engine: HybridLiquidityEngine): Router {
    const router: Router = express.Router();

    router.get('/', (req: Request, res: Response) => {
        const { limit, skip, page } = getPagination(req);
        const categoryParam = getQueryParam(req, 'category');
        const category = isEventCategory(categoryParam) ? categoryParam : undefined;
        if (categoryParam !== undefined && category === undefined) {
            res.status(400).json({ success: false, error: `category must be one of ${categories.join(', ')}` });
            return;
        }
        const action = getQueryParam(req, 'action');
        const actor = getQueryParam(req, 'actor');
        const poolId = getQueryParam(req, 'poolId');

        let events = engine.getEvents({ category, action });
        if (actor) events = events.filter(event => event.actor === actor);
        if (poolId) events = events.filter(event => event.data.poolId === poolId);
        if (getQueryParam(req, 'sortDirection') !== 'asc') events = [...events].reverse();

        sendJson(res, { data: events.slice(skip, skip + limit), total: events.length, limit, skip, page });
    });

    return router;
}
