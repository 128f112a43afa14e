import type { HybridLiquidityEngine } from '../../engine.js';
import { EngineError, EngineErrorCode } from '../../errors.js';
import logger from '../../logger.js';
import { generatePoolId } from '../../utils/pool.js';
import validate from '../../validation/index.js';
import {
    parseAmount,
    parseAssetId,
    parseOptionalAmount,
    parseRouteType,
    validateAccountId,
    validateAssetId,
    validateRouteType,
} from '../../validation/pool.js';
import { OperationContext } from '../context.js';
import { TransactionPayload } from '../types.js';
import { RemoveLiquidityParams, RemoveLiquidityResult } from './pool-interfaces.js';

export function validateTx(data: TransactionPayload, sender: string): { valid: boolean; error?: string } {
    if (!validateAccountId(sender)) {
        return { valid: false, error: 'invalid sender' };
    }
    if (!validateAssetId(data.assetId) || !validateRouteType(data.routeType)) {
        return { valid: false, error: 'invalid pool' };
    }
    if (!validate.bigint(data.shares, false, false)) {
        logger.warn('[pool-remove-liquidity] shares must be a positive integer.');
        return { valid: false, error: 'shares must be a positive integer' };
    }
    if (data.minBaseOut !== undefined && !validate.bigint(data.minBaseOut, true, false)) {
        return { valid: false, error: 'minBaseOut must be a non-negative integer' };
    }
    if (data.minAssetOut !== undefined && !validate.bigint(data.minAssetOut, true, false)) {
        return { valid: false, error: 'minAssetOut must be a non-negative integer' };
    }
    return { valid: true };
}

/**
 * Burns the provider's shares and pays both sides out of custody. Ledger state
 * is updated before anything leaves.
 */
export function removeLiquidity(ctx: OperationContext, params: RemoveLiquidityParams): RemoveLiquidityResult {
    const poolId = generatePoolId(params.assetId, params.routeType);
    const pool = ctx.ledger.requirePool(poolId);
    const baseAssetId = pool.baseAssetId;
    const assetId = pool.assetId;

    const { baseOut, assetOut, poolClosed } = ctx.ledger.removeLiquidity(poolId, params.shares, ctx.caller, ctx.now);
    if (params.minBaseOut !== undefined && baseOut < params.minBaseOut) {
        throw new EngineError(EngineErrorCode.SLIPPAGE_EXCEEDED, `Base output ${baseOut} is below the minimum of ${params.minBaseOut}`, { poolId });
    }
    if (params.minAssetOut !== undefined && assetOut < params.minAssetOut) {
        throw new EngineError(EngineErrorCode.SLIPPAGE_EXCEEDED, `Asset output ${assetOut} is below the minimum of ${params.minAssetOut}`, { poolId });
    }

    ctx.settle([
        { assetId: baseAssetId, from: ctx.config.engineAddress, to: ctx.caller, amount: baseOut },
        { assetId, from: ctx.config.engineAddress, to: ctx.caller, amount: assetOut },
    ]);

    ctx.emit('pool', 'liquidity_removed', {
        poolId,
        provider: ctx.caller,
        sharesBurned: params.shares,
        baseOut,
        assetOut,
        poolClosed,
    });
    if (poolClosed) {
        ctx.emit('pool', 'closed', { poolId });
    }
    logger.debug(`[pool-remove-liquidity] ${ctx.caller} burned ${params.shares} shares of ${poolId} for ${baseOut}/${assetOut}`);

    return { poolId, sharesBurned: params.shares, baseOut, assetOut, poolClosed };
}

export function processTx(engine: HybridLiquidityEngine, data: TransactionPayload, sender: string, transactionId?: string): RemoveLiquidityResult {
    return engine.removeLiquidity(
        sender,
        {
            assetId: parseAssetId(data.assetId),
            routeType: parseRouteType(data.routeType),
            shares: parseAmount(data.shares, 'shares'),
            minBaseOut: parseOptionalAmount(data.minBaseOut, 'minBaseOut'),
            minAssetOut: parseOptionalAmount(data.minAssetOut, 'minAssetOut'),
        },
        transactionId
    );
}
