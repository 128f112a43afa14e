import 'dotenv/config';
import { Server } from 'http';

import baseConfig, { EngineConfig } from './config.js';
import { HybridLiquidityEngine } from './engine.js';
import { GuardianPauseRegistry } from './integrations/emergency-controls.js';
import logger from './logger.js';
import http from './modules/http/index.js';
import { mongo } from './mongo.js';
import settings from './settings.js';

process.on('unhandledRejection', (reason: unknown) => {
    logger.fatal('CRITICAL: Unhandled Rejection:', { reason_details: String(reason) });
    if (reason instanceof Error && reason.stack) {
        logger.fatal('Stack Trace:', reason.stack);
    }
});

process.on('uncaughtException', (error: Error) => {
    logger.fatal('CRITICAL: Uncaught Exception:', { errorName: error.name, errorMessage: error.message, stack: error.stack });
});

const allowNodeV = [20, 22];
const currentNodeV = parseInt(process.versions.node.split('.')[0], 10);
if (!allowNodeV.includes(currentNodeV)) {
    logger.fatal('Wrong NodeJS version. Allowed versions: v' + allowNodeV.join(', v'));
    process.exit(1);
} else {
    logger.info('Correctly using NodeJS v' + process.versions.node);
}

// Empty settings keep the defaults from config.ts
function configFromSettings(): Partial<EngineConfig> {
    return {
        owner: settings.engineOwner || undefined,
        feeRecipient: settings.feeRecipient || undefined,
        nativeAssetId: settings.nativeAssetId || undefined,
        utilityAssetId: settings.utilityAssetId || undefined,
    };
}

let server: Server | null = null;
let closing = false;

export async function main(): Promise<void> {
    logger.info(`Starting ${baseConfig.engineName}...`);
    logger.setLogLevel(settings.logLevel);

    const guardians = (process.env.GUARDIANS || '').split(',').filter(Boolean);
    const engine = new HybridLiquidityEngine({
        config: configFromSettings(),
        emergencyControls: new GuardianPauseRegistry(guardians),
    });

    if (settings.useMongoEvents) {
        await mongo.init();
        engine.events.addSink(mongo.eventSink());
        logger.info('MongoDB event sink enabled.');
    }

    server = await http.startServer(engine, settings.apiPort);
}

async function shutdown(signal: string): Promise<void> {
    if (closing) return;
    closing = true;
    logger.info(`${signal} received, shutting down...`);
    if (server) {
        const running = server;
        await new Promise<void>(resolve => running.close(() => resolve()));
    }
    await mongo.close();
    process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM']) {
    process.on(signal, () => {
        shutdown(signal).catch((error: unknown) => {
            logger.error(`Error during shutdown: ${error instanceof Error ? error.message : String(error)}`);
            process.exit(1);
        });
    });
}

main().catch((error: unknown) => {
    logger.fatal('Failed to start engine:', error);
    process.exit(1);
});
