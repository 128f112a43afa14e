import { EngineConfig } from '../../config.js';
import type { HybridLiquidityEngine } from '../../engine.js';
import { EngineError, EngineErrorCode } from '../../errors.js';
import logger from '../../logger.js';
import { BigIntMath } from '../../utils/bigint.js';
import { applySwapFee, calculatePriceImpactBps, generatePoolId, getAmountOut } from '../../utils/pool.js';
import validate from '../../validation/index.js';
import {
    parseAmount,
    parseAssetId,
    parseDeadline,
    parseRouteType,
    parseSwapDirection,
    validateAccountId,
    validateAssetId,
    validateDeadlineField,
    validateRouteType,
    validateSwapDirection,
} from '../../validation/pool.js';
import { OperationContext } from '../context.js';
import { TransactionPayload } from '../types.js';
import { PoolRecord, SwapDirection, SwapParams, SwapQuote, SwapResult } from './pool-interfaces.js';

export function validateTx(data: TransactionPayload, sender: string): { valid: boolean; error?: string } {
    if (!validateAccountId(sender)) {
        return { valid: false, error: 'invalid sender' };
    }
    if (!validateAssetId(data.assetId) || !validateRouteType(data.routeType)) {
        return { valid: false, error: 'invalid pool' };
    }
    if (!validateSwapDirection(data.direction)) {
        return { valid: false, error: 'invalid direction' };
    }
    if (!validate.bigint(data.amountIn, false, false)) {
        logger.warn('[pool-swap] amountIn must be a positive integer.');
        return { valid: false, error: 'amountIn must be a positive integer' };
    }
    if (!validate.bigint(data.minAmountOut, true, false)) {
        logger.warn('[pool-swap] minAmountOut must be a non-negative integer.');
        return { valid: false, error: 'minAmountOut must be a non-negative integer' };
    }
    if (!validateDeadlineField(data.deadline)) {
        return { valid: false, error: 'invalid deadline' };
    }
    return { valid: true };
}

/**
 * Deadline is checked once, at entry. 0 or absent means none.
 */
export function checkDeadline(deadline: number | undefined, now: number, config: EngineConfig): void {
    if (deadline === undefined) return;
    if (!validate.integer(deadline, true, false)) {
        throw new EngineError(EngineErrorCode.INVALID_INPUT, `Invalid deadline ${deadline}`, { deadline: String(deadline) });
    }
    if (deadline === 0) return;
    if (now > deadline) {
        throw new EngineError(EngineErrorCode.DEADLINE_EXPIRED, `Deadline ${deadline} has passed (now ${now})`, { deadline: String(deadline) });
    }
    if (deadline > now + config.maxDeadlineHorizon) {
        throw new EngineError(EngineErrorCode.INVALID_INPUT, `Deadline ${deadline} is more than ${config.maxDeadlineHorizon}s ahead`, {
            deadline: String(deadline),
        });
    }
}

/**
 * Fee first, then the constant-product output on what is left. Read-only.
 */
export function quoteSwap(pool: PoolRecord, direction: SwapDirection, amountIn: bigint, minAmountOut: bigint, config: EngineConfig): SwapQuote {
    if (amountIn <= 0n) {
        throw new EngineError(EngineErrorCode.INVALID_INPUT, 'amountIn must be positive');
    }
    const buying = direction === SwapDirection.BUY;
    const reserveIn = buying ? pool.reserveBase : pool.reserveAsset;
    const reserveOut = buying ? pool.reserveAsset : pool.reserveBase;

    const { amountInAfterFee, feeAmount } = applySwapFee(amountIn, config.swapFeeBps);
    const amountOut = amountInAfterFee > 0n ? getAmountOut(amountInAfterFee, reserveIn, reserveOut) : 0n;

    if (amountOut < minAmountOut) {
        throw new EngineError(EngineErrorCode.SLIPPAGE_EXCEEDED, `Output ${amountOut} is below the minimum of ${minAmountOut}`, {
            poolId: pool._id,
            amountOut: amountOut.toString(),
        });
    }
    if (amountOut === 0n || amountOut >= reserveOut) {
        throw new EngineError(EngineErrorCode.INSUFFICIENT_LIQUIDITY, `Swap of ${amountIn} on ${pool._id} yields ${amountOut}`, { poolId: pool._id });
    }

    return {
        poolId: pool._id,
        direction,
        tokenIn: buying ? pool.baseAssetId : pool.assetId,
        tokenOut: buying ? pool.assetId : pool.baseAssetId,
        amountIn,
        amountInAfterFee,
        amountOut,
        feeAmount,
        protocolFee: BigIntMath.bps(feeAmount, config.protocolFeeShareBps),
        priceImpactBps: calculatePriceImpactBps(amountIn, reserveIn),
        reserveIn,
        reserveOut,
    };
}

/**
 * Quote, breaker check and ledger mutation for one pool. Moves no funds.
 */
export function executeSwapHop(ctx: OperationContext, poolId: string, direction: SwapDirection, amountIn: bigint, minAmountOut: bigint): SwapResult {
    const pool = ctx.ledger.requirePool(poolId);
    const quote = quoteSwap(pool, direction, amountIn, minAmountOut, ctx.config);
    ctx.breaker.check(poolId, quote.priceImpactBps);

    const retainedFee = quote.feeAmount - quote.protocolFee;
    const reserveInDelta = quote.amountIn - quote.protocolFee;
    const buying = direction === SwapDirection.BUY;
    const updated = ctx.ledger.recordSwap(poolId, {
        reserveBaseDelta: buying ? reserveInDelta : -quote.amountOut,
        reserveAssetDelta: buying ? -quote.amountOut : reserveInDelta,
        retainedFee,
        feeSide: buying ? 'base' : 'asset',
        volume: buying ? quote.amountIn : quote.amountOut,
        now: ctx.now,
    });
    ctx.fees.accrue(quote.tokenIn, quote.protocolFee);

    logger.trace(`[pool-swap] ${poolId} ${direction}: ${quote.amountIn} ${quote.tokenIn} -> ${quote.amountOut} ${quote.tokenOut}`);
    return { ...quote, newPrice: updated.lastPrice };
}

/**
 * Single-hop swap: Validate, Quote, CircuitBreakerCheck, Mutate, Transfer, Emit.
 */
export function swap(ctx: OperationContext, params: SwapParams): SwapResult {
    checkDeadline(params.deadline, ctx.now, ctx.config);
    const poolId = generatePoolId(params.assetId, params.routeType);
    const result = executeSwapHop(ctx, poolId, params.direction, params.amountIn, params.minAmountOut);

    ctx.settle([
        { assetId: result.tokenIn, from: ctx.caller, to: ctx.config.engineAddress, amount: result.amountIn },
        { assetId: result.tokenOut, from: ctx.config.engineAddress, to: ctx.caller, amount: result.amountOut },
    ]);

    ctx.emit('swap', 'executed', {
        poolId,
        trader: ctx.caller,
        direction: result.direction,
        tokenIn: result.tokenIn,
        tokenOut: result.tokenOut,
        amountIn: result.amountIn,
        amountOut: result.amountOut,
        feeAmount: result.feeAmount,
        protocolFee: result.protocolFee,
        priceImpactBps: result.priceImpactBps,
        newPrice: result.newPrice,
    });
    return result;
}

export function processTx(engine: HybridLiquidityEngine, data: TransactionPayload, sender: string, transactionId?: string): SwapResult {
    return engine.swap(
        sender,
        {
            assetId: parseAssetId(data.assetId),
            routeType: parseRouteType(data.routeType),
            direction: parseSwapDirection(data.direction),
            amountIn: parseAmount(data.amountIn, 'amountIn'),
            minAmountOut: parseAmount(data.minAmountOut, 'minAmountOut'),
            deadline: parseDeadline(data.deadline),
        },
        transactionId
    );
}
