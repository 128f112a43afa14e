import type { HybridLiquidityEngine } from '../../engine.js';
import { EngineError, EngineErrorCode } from '../../errors.js';
import logger from '../../logger.js';
import validate from '../../validation/index.js';
import {
    parseAmount,
    parseAssetId,
    parseRouteType,
    validateAccountId,
    validateAssetId,
    validateRouteType,
} from '../../validation/pool.js';
import { OperationContext } from '../context.js';
import { TransactionPayload } from '../types.js';
import { CreatePoolParams, LiquidityResult } from './pool-interfaces.js';

export function validateTx(data: TransactionPayload, sender: string): { valid: boolean; error?: string } {
    if (!validateAccountId(sender)) {
        return { valid: false, error: 'invalid sender' };
    }
    if (!validateAssetId(data.assetId)) {
        return { valid: false, error: 'invalid assetId' };
    }
    if (!validateRouteType(data.routeType)) {
        return { valid: false, error: 'invalid routeType' };
    }
    if (!validate.bigint(data.baseAmount, false, false)) {
        logger.warn('[pool-create] baseAmount must be a positive integer.');
        return { valid: false, error: 'baseAmount must be a positive integer' };
    }
    if (!validate.bigint(data.assetAmount, false, false)) {
        logger.warn('[pool-create] assetAmount must be a positive integer.');
        return { valid: false, error: 'assetAmount must be a positive integer' };
    }
    return { valid: true };
}

/**
 * Opens a pool and pulls both sides of the initial deposit from the creator.
 */
export function createPool(ctx: OperationContext, params: CreatePoolParams): LiquidityResult {
    const { config, ledger } = ctx;
    if (!validateAssetId(params.assetId) || params.assetId === config.nativeAssetId || params.assetId === config.utilityAssetId) {
        throw new EngineError(EngineErrorCode.INVALID_INPUT, `${params.assetId} cannot be listed`, { assetId: params.assetId });
    }

    const { pool, shares } = ledger.create(params.assetId, params.routeType, params.baseAmount, params.assetAmount, ctx.caller, ctx.now);

    ctx.settle([
        { assetId: pool.baseAssetId, from: ctx.caller, to: config.engineAddress, amount: params.baseAmount },
        { assetId: pool.assetId, from: ctx.caller, to: config.engineAddress, amount: params.assetAmount },
    ]);

    ctx.emit('pool', 'created', {
        poolId: pool._id,
        assetId: pool.assetId,
        routeType: pool.routeType,
        baseAssetId: pool.baseAssetId,
        baseAmount: params.baseAmount,
        assetAmount: params.assetAmount,
        sharesMinted: shares,
        lastPrice: pool.lastPrice,
    });
    logger.debug(`[pool-create] ${ctx.caller} opened ${pool._id} with ${params.baseAmount} ${pool.baseAssetId} and ${params.assetAmount} ${pool.assetId}`);

    return {
        poolId: pool._id,
        baseAmount: params.baseAmount,
        assetAmount: params.assetAmount,
        sharesMinted: shares,
        totalShares: pool.totalShares,
    };
}

export function processTx(engine: HybridLiquidityEngine, data: TransactionPayload, sender: string, transactionId?: string): LiquidityResult {
    return engine.createPool(
        sender,
        {
            assetId: parseAssetId(data.assetId),
            routeType: parseRouteType(data.routeType),
            baseAmount: parseAmount(data.baseAmount, 'baseAmount'),
            assetAmount: parseAmount(data.assetAmount, 'assetAmount'),
        },
        transactionId
    );
}
