import type { HybridLiquidityEngine } from '../../engine.js';
import logger from '../../logger.js';
import { generatePoolId } from '../../utils/pool.js';
import validate from '../../validation/index.js';
import {
    parseAmount,
    parseAssetId,
    parseOptionalAmount,
    parseRouteType,
    parseSlippageBps,
    validateAccountId,
    validateAssetId,
    validateRouteType,
    validateSlippageBps,
} from '../../validation/pool.js';
import { OperationContext } from '../context.js';
import { TransactionPayload } from '../types.js';
import { AddLiquidityParams, LiquidityResult } from './pool-interfaces.js';

export function validateTx(data: TransactionPayload, sender: string): { valid: boolean; error?: string } {
    if (!validateAccountId(sender)) {
        return { valid: false, error: 'invalid sender' };
    }
    if (!validateAssetId(data.assetId) || !validateRouteType(data.routeType)) {
        return { valid: false, error: 'invalid pool' };
    }
    if (!validate.bigint(data.baseAmount, false, false)) {
        logger.warn('[pool-add-liquidity] baseAmount must be a positive integer.');
        return { valid: false, error: 'baseAmount must be a positive integer' };
    }
    if (!validateSlippageBps(data.maxSlippageBps)) {
        return { valid: false, error: 'maxSlippageBps must be between 0 and 10000' };
    }
    if (data.maxAssetAmount !== undefined && !validate.bigint(data.maxAssetAmount, false, false)) {
        logger.warn('[pool-add-liquidity] maxAssetAmount, if provided, must be a positive integer.');
        return { valid: false, error: 'maxAssetAmount must be a positive integer' };
    }
    return { valid: true };
}

/**
 * Proportional deposit. The provider names the base amount, the ledger derives
 * the asset amount, and both are pulled into custody.
 */
export function addLiquidity(ctx: OperationContext, params: AddLiquidityParams): LiquidityResult {
    const poolId = generatePoolId(params.assetId, params.routeType);
    const { assetAmount, shares } = ctx.ledger.addLiquidity(poolId, params.baseAmount, params.maxSlippageBps, ctx.caller, ctx.now, params.maxAssetAmount);
    const pool = ctx.ledger.requirePool(poolId);

    ctx.settle([
        { assetId: pool.baseAssetId, from: ctx.caller, to: ctx.config.engineAddress, amount: params.baseAmount },
        { assetId: pool.assetId, from: ctx.caller, to: ctx.config.engineAddress, amount: assetAmount },
    ]);

    ctx.emit('pool', 'liquidity_added', {
        poolId,
        provider: ctx.caller,
        baseAmount: params.baseAmount,
        assetAmount,
        sharesMinted: shares,
        totalShares: pool.totalShares,
    });
    logger.debug(`[pool-add-liquidity] ${ctx.caller} added ${params.baseAmount}/${assetAmount} to ${poolId}, minted ${shares} shares`);

    return { poolId, baseAmount: params.baseAmount, assetAmount, sharesMinted: shares, totalShares: pool.totalShares };
}

export function processTx(engine: HybridLiquidityEngine, data: TransactionPayload, sender: string, transactionId?: string): LiquidityResult {
    return engine.addLiquidity(
        sender,
        {
            assetId: parseAssetId(data.assetId),
            routeType: parseRouteType(data.routeType),
            baseAmount: parseAmount(data.baseAmount, 'baseAmount'),
            maxSlippageBps: parseSlippageBps(data.maxSlippageBps),
            maxAssetAmount: parseOptionalAmount(data.maxAssetAmount, 'maxAssetAmount'),
        },
        transactionId
    );
}
