import type { HybridLiquidityEngine } from '../engine.js';
import { isEngineError } from '../errors.js';
import logger from '../logger.js';
import { RouteType, SwapDirection } from '../transactions/pool/pool-interfaces.js';

export interface RoyaltyCompoundRequest {
    distributor: string;
    assetId: string;
    amount: bigint;
}

export type RoyaltyCompoundOutcome = { success: true; amountIn: bigint; amountOut: bigint } | { success: false; error: string; code?: string };

/**
 * Buys the fractional asset back with unclaimed native royalties. Failures are
 * reported, not thrown, so the distributor keeps its funds for the next round.
 */
export function compoundRoyalties(engine: HybridLiquidityEngine, request: RoyaltyCompoundRequest): RoyaltyCompoundOutcome {
    if (request.amount <= 0n) {
        return { success: false, error: 'nothing to compound' };
    }
    try {
        const result = engine.swap(request.distributor, {
            assetId: request.assetId,
            routeType: RouteType.NATIVE,
            direction: SwapDirection.BUY,
            amountIn: request.amount,
            minAmountOut: 0n,
            deadline: engine.now() + engine.config.royaltyDeadlineSeconds,
        });
        logger.info(`[royalty-buyback] ${request.distributor} compounded ${request.amount} into ${result.amountOut} ${request.assetId}`);
        return { success: true, amountIn: result.amountIn, amountOut: result.amountOut };
    } catch (error) {
        if (!isEngineError(error)) throw error;
        logger.warn(`[royalty-buyback] Compounding ${request.amount} into ${request.assetId} failed (${error.code}); funds retained`);
        return { success: false, error: error.message, code: error.code };
    }
}
