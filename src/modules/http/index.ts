import cors from 'cors';
import express, { Express, NextFunction, Request, Response } from 'express';
import { Server } from 'http';

import type { HybridLiquidityEngine } from '../../engine.js';
import logger from '../../logger.js';
import settings from '../../settings.js';
import { createBreakerRouter } from './breaker.js';
import { createEventsRouter } from './events.js';
import { createFeesRouter } from './fees.js';
import { createPoolsRouter } from './pools.js';
import { createRouterRouter } from './router.js';
import { createTxRouter } from './tx.js';

/**
 * Builds the API app around one engine instance
 */
export function createApp(engine: HybridLiquidityEngine): Express {
    const app = express();
    app.use(cors());
    app.use(express.json());

    logger.trace('Setting up HTTP endpoints...');
    app.use('/pools', createPoolsRouter(engine));
    app.use('/router', createRouterRouter(engine));
    app.use('/fees', createFeesRouter(engine));
    app.use('/breaker', createBreakerRouter(engine));
    app.use('/events', createEventsRouter(engine));
    app.use('/tx', createTxRouter(engine));

    // Malformed JSON bodies land here
    app.use((error: Error, _req: Request, res: Response, next: NextFunction) => {
        if (res.headersSent) return next(error);
        logger.warn(`[http] Request failed: ${error.message}`);
        res.status(400).json({ success: false, error: 'malformed request' });
    });
    return app;
}

/**
 * HTTP server module
 */
export function startServer(engine: HybridLiquidityEngine, port: number = settings.apiPort): Promise<Server> {
    const app = createApp(engine);
    logger.debug(`Starting HTTP server on port ${port}`);
    return new Promise((resolve, reject) => {
        const server = app.listen(port, () => {
            const addr = server.address();
            if (addr && typeof addr !== 'string') {
                logger.info(`HTTP server listening on ${addr.address}:${addr.port}`);
            } else {
                logger.info(`HTTP server listening on port ${port}`);
            }
            resolve(server);
        });

        server.on('error', (error: NodeJS.ErrnoException) => {
            if (error.code === 'EADDRINUSE') {
                logger.error(`HTTP port ${port} is already in use. Please use a different port by setting the API_PORT environment variable.`);
            } else if (error.code === 'EACCES') {
                logger.error(`Permission denied to use port ${port}. Try using a port number > 1024 or running with elevated privileges.`);
            } else {
                logger.error('HTTP server error:', error);
            }
            reject(error);
        });
    });
}

export default { createApp, startServer };
