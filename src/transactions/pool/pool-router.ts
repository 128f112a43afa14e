import { EngineConfig } from '../../config.js';
import type { HybridLiquidityEngine } from '../../engine.js';
import { EngineError, EngineErrorCode, isEngineError } from '../../errors.js';
import logger from '../../logger.js';
import validate from '../../validation/index.js';
import {
    parseAmount,
    parseAssetId,
    parseDeadline,
    validateAccountId,
    validateAssetId,
    validateDeadlineField,
} from '../../validation/pool.js';
import { OperationContext } from '../context.js';
import { TransactionPayload } from '../types.js';
import { PoolLedger } from './pool-ledger.js';
import { RouteQuote, RouteType, SmartSwapParams, SmartSwapResult, SwapDirection, TradeHop } from './pool-interfaces.js';
import { checkDeadline, executeSwapHop, quoteSwap } from './pool-swap.js';

interface RouteLeg {
    available: boolean;
    output: bigint;
}

export function validateTx(data: TransactionPayload, sender: string): { valid: boolean; error?: string } {
    if (!validateAccountId(sender)) {
        return { valid: false, error: 'invalid sender' };
    }
    if (!validateAssetId(data.fromAssetId, 'fromAssetId') || !validateAssetId(data.toAssetId, 'toAssetId')) {
        return { valid: false, error: 'invalid asset' };
    }
    if (data.fromAssetId === data.toAssetId) {
        logger.warn('[pool-router] fromAssetId and toAssetId must differ.');
        return { valid: false, error: 'fromAssetId and toAssetId must differ' };
    }
    if (!validate.bigint(data.amountIn, false, false)) {
        logger.warn('[pool-router] amountIn must be a positive integer.');
        return { valid: false, error: 'amountIn must be a positive integer' };
    }
    if (!validate.bigint(data.minAmountOut, true, false)) {
        return { valid: false, error: 'minAmountOut must be a non-negative integer' };
    }
    if (!validateDeadlineField(data.deadline)) {
        return { valid: false, error: 'invalid deadline' };
    }
    return { valid: true };
}

function assertRoutable(fromAssetId: string, toAssetId: string, amountIn: bigint): void {
    if (fromAssetId === toAssetId) {
        throw new EngineError(EngineErrorCode.INVALID_INPUT, 'Cannot route an asset into itself', { assetId: fromAssetId });
    }
    if (amountIn <= 0n) {
        throw new EngineError(EngineErrorCode.INVALID_INPUT, 'amountIn must be positive');
    }
}

// Sell on the source pool, buy on the destination pool, both on the same base.
function quoteLeg(ledger: PoolLedger, config: EngineConfig, routeType: RouteType, fromAssetId: string, toAssetId: string, amountIn: bigint): RouteLeg {
    const fromPool = ledger.findPool(fromAssetId, routeType);
    const toPool = ledger.findPool(toAssetId, routeType);
    if (!fromPool || !toPool) return { available: false, output: 0n };
    try {
        const sell = quoteSwap(fromPool, SwapDirection.SELL, amountIn, 0n, config);
        const buy = quoteSwap(toPool, SwapDirection.BUY, sell.amountOut, 0n, config);
        return { available: true, output: buy.amountOut };
    } catch (error) {
        if (!isEngineError(error)) throw error;
        logger.debug(`[pool-router] ${routeType} route ${fromAssetId}->${toAssetId} cannot be quoted: ${error.message}`);
        return { available: true, output: 0n };
    }
}

/**
 * Expected output of both two-hop routes. A missing or unquotable route reports 0.
 */
export function quoteRoutes(ledger: PoolLedger, config: EngineConfig, fromAssetId: string, toAssetId: string, amountIn: bigint): RouteQuote {
    assertRoutable(fromAssetId, toAssetId, amountIn);
    const native = quoteLeg(ledger, config, RouteType.NATIVE, fromAssetId, toAssetId, amountIn);
    const utility = quoteLeg(ledger, config, RouteType.UTILITY, fromAssetId, toAssetId, amountIn);
    return {
        nativeOutput: native.output,
        utilityOutput: utility.output,
        preferUtility: utility.output > native.output,
        nativeAvailable: native.available,
        utilityAvailable: utility.available,
    };
}

/**
 * Runs both hops of the preferred route as one operation. Only the net
 * movement is settled; the intermediate base never leaves custody.
 */
export function executeSmartSwap(ctx: OperationContext, params: SmartSwapParams): SmartSwapResult {
    checkDeadline(params.deadline, ctx.now, ctx.config);
    const routes = quoteRoutes(ctx.ledger, ctx.config, params.fromAssetId, params.toAssetId, params.amountIn);
    if (!routes.nativeAvailable && !routes.utilityAvailable) {
        throw new EngineError(EngineErrorCode.NO_ROUTE_AVAILABLE, `No route from ${params.fromAssetId} to ${params.toAssetId}`, {
            fromAssetId: params.fromAssetId,
            toAssetId: params.toAssetId,
        });
    }
    const routeType = routes.preferUtility || !routes.nativeAvailable ? RouteType.UTILITY : RouteType.NATIVE;

    const fromPool = ctx.ledger.findPool(params.fromAssetId, routeType);
    const toPool = ctx.ledger.findPool(params.toAssetId, routeType);
    if (!fromPool || !toPool) {
        throw new EngineError(EngineErrorCode.NO_ROUTE_AVAILABLE, `The ${routeType} route is incomplete`, { routeType });
    }

    const first = executeSwapHop(ctx, fromPool._id, SwapDirection.SELL, params.amountIn, 0n);
    const second = executeSwapHop(ctx, toPool._id, SwapDirection.BUY, first.amountOut, params.minAmountOut);
    const hops: TradeHop[] = [first, second].map(hop => ({
        poolId: hop.poolId,
        tokenIn: hop.tokenIn,
        tokenOut: hop.tokenOut,
        amountIn: hop.amountIn,
        amountOut: hop.amountOut,
        priceImpactBps: hop.priceImpactBps,
    }));

    ctx.settle([
        { assetId: params.fromAssetId, from: ctx.caller, to: ctx.config.engineAddress, amount: params.amountIn },
        { assetId: params.toAssetId, from: ctx.config.engineAddress, to: ctx.caller, amount: second.amountOut },
    ]);

    ctx.emit('router', 'smart_swap', {
        trader: ctx.caller,
        routeType,
        fromAssetId: params.fromAssetId,
        toAssetId: params.toAssetId,
        amountIn: params.amountIn,
        intermediateAmount: first.amountOut,
        amountOut: second.amountOut,
        hops,
    });
    logger.debug(`[pool-router] ${ctx.caller} routed ${params.amountIn} ${params.fromAssetId} -> ${second.amountOut} ${params.toAssetId} via ${routeType}`);

    return { routeType, hops, amountIn: params.amountIn, amountOut: second.amountOut };
}

export function processTx(engine: HybridLiquidityEngine, data: TransactionPayload, sender: string, transactionId?: string): SmartSwapResult {
    return engine.executeSmartSwap(
        sender,
        {
            fromAssetId: parseAssetId(data.fromAssetId, 'fromAssetId'),
            toAssetId: parseAssetId(data.toAssetId, 'toAssetId'),
            amountIn: parseAmount(data.amountIn, 'amountIn'),
            minAmountOut: parseAmount(data.minAmountOut, 'minAmountOut'),
            deadline: parseDeadline(data.deadline),
        },
        transactionId
    );
}
