import type { HybridLiquidityEngine } from '../engine.js';
import { EngineError, EngineErrorCode } from '../errors.js';
import logger from '../logger.js';
import { LiquidityResult, RouteType } from '../transactions/pool/pool-interfaces.js';

export interface InitialLiquidity {
    baseAmount: bigint;
    assetAmount: bigint;
}

export interface FractionalListing {
    creator: string;
    assetId: string;
    native?: InitialLiquidity;
    utility?: InitialLiquidity;
}

/**
 * Opens the pools for a freshly fractionalized asset. Each pool is its own
 * engine write: if the utility pool fails, the native pool already exists.
 */
export function listFractionalAsset(engine: HybridLiquidityEngine, listing: FractionalListing): LiquidityResult[] {
    if (!listing.native && !listing.utility) {
        throw new EngineError(EngineErrorCode.INVALID_INPUT, `Listing for ${listing.assetId} provides no liquidity`, { assetId: listing.assetId });
    }
    const results: LiquidityResult[] = [];
    if (listing.native) {
        results.push(engine.createPool(listing.creator, { assetId: listing.assetId, routeType: RouteType.NATIVE, ...listing.native }));
    }
    if (listing.utility) {
        results.push(engine.createPool(listing.creator, { assetId: listing.assetId, routeType: RouteType.UTILITY, ...listing.utility }));
    }
    logger.info(`[asset-factory] Listed ${listing.assetId} for ${listing.creator} in ${results.map(result => result.poolId).join(', ')}`);
    return results;
}
