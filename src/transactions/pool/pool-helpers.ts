import { EngineState } from '../../state.js';
import { calculateSpotPrice } from '../../utils/pool.js';
import { PoolRecord, PoolSnapshot, ProviderPosition } from './pool-interfaces.js';

export function getPositionId(poolId: string, provider: string): string {
    return `${poolId}:${provider}`;
}

/**
 * Adds the time-weighted contribution of the current price since the last
 * update and records an observation for TWAP lookups.
 */
export function accumulatePrice(pool: PoolRecord, now: number, observationLimit: number): void {
    const elapsed = now - pool.lastPriceUpdateTime;
    if (elapsed <= 0) return;
    pool.cumulativePrice += pool.lastPrice * BigInt(elapsed);
    pool.lastPriceUpdateTime = now;
    pool.observations.push({ timestamp: now, cumulativePrice: pool.cumulativePrice });
    if (pool.observations.length > observationLimit) {
        pool.observations.splice(0, pool.observations.length - observationLimit);
    }
}

export function refreshPrice(pool: PoolRecord, now: number, observationLimit: number): void {
    accumulatePrice(pool, now, observationLimit);
    pool.lastPrice = calculateSpotPrice(pool.reserveBase, pool.reserveAsset);
}

// Rolling window: reset once it fully elapses, otherwise accumulate
export function recordVolume(pool: PoolRecord, volume: bigint, now: number, windowSeconds: number): void {
    if (now >= pool.volumeWindowStart + windowSeconds) {
        pool.volumeWindow = 0n;
        pool.volumeWindowStart = now;
    }
    pool.volumeWindow += volume;
}

/**
 * Time-weighted average price over the last `windowSeconds`. History shorter
 * than the window is averaged from the oldest retained observation.
 */
export function computeTwap(pool: PoolRecord, windowSeconds: number, now: number): bigint {
    const observations = pool.observations;
    if (observations.length === 0 || windowSeconds <= 0) return pool.lastPrice;
    const start = Math.max(now - windowSeconds, observations[0].timestamp);
    const elapsed = now - start;
    if (elapsed <= 0) return pool.lastPrice;
    return (cumulativePriceAt(pool, now) - cumulativePriceAt(pool, start)) / BigInt(elapsed);
}

// Price between two consecutive observations is constant, so it is recovered from their difference.
function cumulativePriceAt(pool: PoolRecord, timestamp: number): bigint {
    const observations = pool.observations;
    let k = 0;
    while (k + 1 < observations.length && observations[k + 1].timestamp <= timestamp) k++;
    const anchor = observations[k];
    const next = observations[k + 1];
    const price = next
        ? (next.cumulativePrice - anchor.cumulativePrice) / BigInt(next.timestamp - anchor.timestamp)
        : pool.lastPrice;
    return anchor.cumulativePrice + price * BigInt(Math.max(0, timestamp - anchor.timestamp));
}

/**
 * Credits shares to a provider, appending to the pool's ordered index on first deposit.
 */
export function creditShares(state: EngineState, poolId: string, provider: string, shares: bigint, now: number): ProviderPosition {
    const positionId = getPositionId(poolId, provider);
    const existing = state.positions[positionId];
    if (existing) {
        existing.shares += shares;
        existing.lastUpdatedAt = now;
        return existing;
    }
    const index = state.providerIndex[poolId] ?? (state.providerIndex[poolId] = []);
    const position: ProviderPosition = {
        _id: positionId,
        poolId,
        provider,
        shares,
        indexSlot: index.length,
        createdAt: now,
        lastUpdatedAt: now,
    };
    index.push(provider);
    state.positions[positionId] = position;
    return position;
}

/**
 * Debits shares; a position that reaches zero leaves the index by swap-and-pop.
 * The caller has already checked the balance.
 */
export function debitShares(state: EngineState, poolId: string, provider: string, shares: bigint, now: number): bigint {
    const positionId = getPositionId(poolId, provider);
    const position = state.positions[positionId];
    if (!position) return 0n;
    position.shares -= shares;
    position.lastUpdatedAt = now;
    if (position.shares > 0n) return position.shares;

    const index = state.providerIndex[poolId] ?? [];
    const lastProvider = index[index.length - 1];
    if (lastProvider !== undefined && lastProvider !== provider) {
        index[position.indexSlot] = lastProvider;
        const moved = state.positions[getPositionId(poolId, lastProvider)];
        if (moved) moved.indexSlot = position.indexSlot;
    }
    index.pop();
    delete state.positions[positionId];
    return 0n;
}

export function toPoolSnapshot(pool: PoolRecord, providerCount: number): PoolSnapshot {
    return {
        poolId: pool._id,
        assetId: pool.assetId,
        routeType: pool.routeType,
        baseAssetId: pool.baseAssetId,
        reserveBase: pool.reserveBase,
        reserveAsset: pool.reserveAsset,
        totalShares: pool.totalShares,
        lastPrice: pool.lastPrice,
        cumulativePrice: pool.cumulativePrice,
        lastPriceUpdateTime: pool.lastPriceUpdateTime,
        volumeWindow: pool.volumeWindow,
        volumeWindowStart: pool.volumeWindowStart,
        feeAccruedBase: pool.feeAccruedBase,
        feeAccruedAsset: pool.feeAccruedAsset,
        providerCount,
        createdAt: pool.createdAt,
        lastTradeAt: pool.lastTradeAt,
    };
}
