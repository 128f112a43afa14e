import { EngineConfig } from '../../config.js';
import { EngineError, EngineErrorCode } from '../../errors.js';
import logger from '../../logger.js';
import { EngineState, StateJournal } from '../../state.js';
import { BPS_DENOMINATOR, PRECISION, calculateSpotPrice, generatePoolId, integerSqrt } from '../../utils/pool.js';
import { validateSlippageBps } from '../../validation/pool.js';
import {
    accumulatePrice,
    computeTwap,
    creditShares,
    debitShares,
    getPositionId,
    recordVolume,
    refreshPrice,
    toPoolSnapshot,
} from './pool-helpers.js';
import { PoolRecord, PoolReserves, PoolSnapshot, RouteType, SwapDelta } from './pool-interfaces.js';

/**
 * Per-asset, per-route pool state plus the provider share table.
 * A pool with zero shares outstanding does not exist as far as every
 * operation here is concerned.
 */
export class PoolLedger {
    private journal: StateJournal | null = null;

    constructor(
        private readonly state: EngineState,
        private readonly config: EngineConfig
    ) {}

    /**
     * Runs `fn` with every pool write backed up in `journal` first.
     */
    withJournal<T>(journal: StateJournal, fn: () => T): T {
        this.journal = journal;
        try {
            return fn();
        } finally {
            this.journal = null;
        }
    }

    baseAssetFor(routeType: RouteType): string {
        return routeType === RouteType.NATIVE ? this.config.nativeAssetId : this.config.utilityAssetId;
    }

    getPool(poolId: string): PoolRecord | undefined {
        const pool = this.state.pools[poolId];
        return pool && pool.totalShares > 0n ? pool : undefined;
    }

    findPool(assetId: string, routeType: RouteType): PoolRecord | undefined {
        return this.getPool(generatePoolId(assetId, routeType));
    }

    requirePool(poolId: string): PoolRecord {
        const pool = this.getPool(poolId);
        if (!pool) {
            throw new EngineError(EngineErrorCode.POOL_NOT_FOUND, `Pool ${poolId} does not exist`, { poolId });
        }
        return pool;
    }

    listPools(): PoolRecord[] {
        return Object.values(this.state.pools)
            .filter(pool => pool.totalShares > 0n)
            .sort((a, b) => (a._id < b._id ? -1 : a._id > b._id ? 1 : 0));
    }

    create(assetId: string, routeType: RouteType, baseAmount: bigint, assetAmount: bigint, provider: string, now: number): { pool: PoolRecord; shares: bigint } {
        const poolId = generatePoolId(assetId, routeType);
        this.journal?.touchPool(poolId);
        if (this.getPool(poolId)) {
            throw new EngineError(EngineErrorCode.POOL_EXISTS, `Pool ${poolId} already exists`, { poolId });
        }
        if (baseAmount <= 0n || assetAmount <= 0n) {
            throw new EngineError(EngineErrorCode.INVALID_INPUT, 'Initial liquidity amounts must be positive');
        }

        const rootLiquidity = integerSqrt(baseAmount * assetAmount);
        const minimumLiquidity = BigInt(this.config.minimumLiquidity);
        if (rootLiquidity <= minimumLiquidity) {
            throw new EngineError(EngineErrorCode.INSUFFICIENT_LIQUIDITY, `Initial liquidity ${rootLiquidity} is at or below the floor of ${minimumLiquidity}`, {
                poolId,
            });
        }
        const shares = rootLiquidity * PRECISION;

        const pool: PoolRecord = {
            _id: poolId,
            assetId,
            routeType,
            baseAssetId: this.baseAssetFor(routeType),
            reserveBase: baseAmount,
            reserveAsset: assetAmount,
            totalShares: shares,
            lastPrice: calculateSpotPrice(baseAmount, assetAmount),
            cumulativePrice: 0n,
            lastPriceUpdateTime: now,
            observations: [{ timestamp: now, cumulativePrice: 0n }],
            volumeWindow: 0n,
            volumeWindowStart: now,
            feeAccruedBase: 0n,
            feeAccruedAsset: 0n,
            creator: provider,
            createdAt: now,
        };
        this.state.pools[poolId] = pool;
        this.state.providerIndex[poolId] = [];
        creditShares(this.state, poolId, provider, shares, now);
        logger.debug(`[pool-ledger] Pool ${poolId} created by ${provider} with ${baseAmount}/${assetAmount}, shares ${shares}`);
        return { pool, shares };
    }

    getReserves(poolId: string): PoolReserves {
        const pool = this.requirePool(poolId);
        return { reserveBase: pool.reserveBase, reserveAsset: pool.reserveAsset, totalShares: pool.totalShares };
    }

    /**
     * Proportional deposit: the asset side is derived from the base amount at the current ratio.
     */
    addLiquidity(
        poolId: string,
        baseAmount: bigint,
        maxSlippageBps: number,
        provider: string,
        now: number,
        maxAssetAmount?: bigint
    ): { assetAmount: bigint; shares: bigint } {
        const pool = this.requirePool(poolId);
        this.journal?.touchPool(poolId);
        if (baseAmount <= 0n) {
            throw new EngineError(EngineErrorCode.INVALID_INPUT, 'baseAmount must be positive');
        }
        if (!validateSlippageBps(maxSlippageBps)) {
            throw new EngineError(EngineErrorCode.INVALID_INPUT, `Invalid slippage bound ${maxSlippageBps}`, { poolId });
        }
        const assetAmount = (baseAmount * pool.reserveAsset) / pool.reserveBase;
        const shares = (baseAmount * pool.totalShares) / pool.reserveBase;
        if (assetAmount <= 0n || shares <= 0n) {
            throw new EngineError(EngineErrorCode.INVALID_INPUT, `Deposit of ${baseAmount} is too small for pool ${poolId}`, { poolId });
        }

        const impliedSlippageBps = (assetAmount * BPS_DENOMINATOR) / pool.reserveAsset;
        if (impliedSlippageBps > BigInt(maxSlippageBps)) {
            throw new EngineError(EngineErrorCode.SLIPPAGE_EXCEEDED, `Implied slippage ${impliedSlippageBps} bps exceeds the ${maxSlippageBps} bps bound`, {
                poolId,
            });
        }
        if (maxAssetAmount !== undefined && assetAmount > maxAssetAmount) {
            throw new EngineError(EngineErrorCode.SLIPPAGE_EXCEEDED, `Required asset amount ${assetAmount} exceeds the cap of ${maxAssetAmount}`, { poolId });
        }

        accumulatePrice(pool, now, this.config.twapObservationLimit);
        pool.reserveBase += baseAmount;
        pool.reserveAsset += assetAmount;
        pool.totalShares += shares;
        pool.lastPrice = calculateSpotPrice(pool.reserveBase, pool.reserveAsset);
        creditShares(this.state, poolId, provider, shares, now);
        return { assetAmount, shares };
    }

    /**
     * Burns shares and takes both sides out pro rata. Removing the last shares closes the pool.
     */
    removeLiquidity(poolId: string, shares: bigint, provider: string, now: number): { baseOut: bigint; assetOut: bigint; poolClosed: boolean } {
        const pool = this.requirePool(poolId);
        this.journal?.touchPool(poolId);
        if (shares <= 0n) {
            throw new EngineError(EngineErrorCode.INVALID_INPUT, 'shares must be positive');
        }
        const owned = this.getProviderShares(poolId, provider);
        if (owned < shares) {
            throw new EngineError(EngineErrorCode.INSUFFICIENT_BALANCE, `Provider ${provider} holds ${owned} shares of ${poolId}, requested ${shares}`, {
                poolId,
                provider,
            });
        }

        const baseOut = (shares * pool.reserveBase) / pool.totalShares;
        const assetOut = (shares * pool.reserveAsset) / pool.totalShares;
        if (baseOut <= 0n || assetOut <= 0n) {
            throw new EngineError(EngineErrorCode.INVALID_INPUT, `Withdrawal of ${shares} shares rounds to zero`, { poolId });
        }

        debitShares(this.state, poolId, provider, shares, now);
        pool.totalShares -= shares;

        if (pool.totalShares === 0n) {
            delete this.state.pools[poolId];
            delete this.state.providerIndex[poolId];
            logger.debug(`[pool-ledger] Pool ${poolId} closed after the last shares were withdrawn by ${provider}`);
            return { baseOut, assetOut, poolClosed: true };
        }

        accumulatePrice(pool, now, this.config.twapObservationLimit);
        pool.reserveBase -= baseOut;
        pool.reserveAsset -= assetOut;
        pool.lastPrice = calculateSpotPrice(pool.reserveBase, pool.reserveAsset);
        return { baseOut, assetOut, poolClosed: false };
    }

    recordSwap(poolId: string, delta: SwapDelta): PoolRecord {
        const pool = this.requirePool(poolId);
        this.journal?.touchPool(poolId);
        pool.reserveBase += delta.reserveBaseDelta;
        pool.reserveAsset += delta.reserveAssetDelta;
        if (delta.feeSide === 'base') {
            pool.feeAccruedBase += delta.retainedFee;
        } else {
            pool.feeAccruedAsset += delta.retainedFee;
        }
        refreshPrice(pool, delta.now, this.config.twapObservationLimit);
        recordVolume(pool, delta.volume, delta.now, this.config.volumeWindowSeconds);
        pool.lastTradeAt = delta.now;
        return pool;
    }

    getProviderShares(poolId: string, provider: string): bigint {
        return this.state.positions[getPositionId(poolId, provider)]?.shares ?? 0n;
    }

    listProviders(poolId: string): string[] {
        return [...(this.state.providerIndex[poolId] ?? [])];
    }

    getTwap(poolId: string, windowSeconds: number, now: number): bigint {
        return computeTwap(this.requirePool(poolId), windowSeconds, now);
    }

    snapshot(poolId: string): PoolSnapshot {
        const pool = this.requirePool(poolId);
        return toPoolSnapshot(pool, this.state.providerIndex[poolId]?.length ?? 0);
    }
}
