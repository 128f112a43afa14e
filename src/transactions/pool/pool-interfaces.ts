// Pool interfaces. Ledger state uses bigint; raw transaction payloads accept string | bigint.

export enum RouteType {
    NATIVE = 'native',
    UTILITY = 'utility',
}

export enum SwapDirection {
    BUY = 'buy', // base in, listed asset out
    SELL = 'sell', // listed asset in, base out
}

export interface PriceObservation {
    timestamp: number;
    cumulativePrice: bigint;
}

export interface PoolRecord {
    _id: string;
    assetId: string;
    routeType: RouteType;
    baseAssetId: string;
    reserveBase: bigint;
    reserveAsset: bigint;
    totalShares: bigint;
    lastPrice: bigint; // reserveBase / reserveAsset, scaled by PRECISION
    cumulativePrice: bigint;
    lastPriceUpdateTime: number;
    observations: PriceObservation[];
    volumeWindow: bigint; // base-asset units
    volumeWindowStart: number;
    feeAccruedBase: bigint;
    feeAccruedAsset: bigint;
    creator: string;
    createdAt: number;
    lastTradeAt?: number;
}

// Represents a provider's share in a liquidity pool, stored apart from the pool record
export interface ProviderPosition {
    _id: string; // poolId:provider
    poolId: string;
    provider: string;
    shares: bigint;
    indexSlot: number; // position inside the pool's provider index
    createdAt: number;
    lastUpdatedAt: number;
}

export interface PoolReserves {
    reserveBase: bigint;
    reserveAsset: bigint;
    totalShares: bigint;
}

export interface SwapDelta {
    reserveBaseDelta: bigint;
    reserveAssetDelta: bigint;
    retainedFee: bigint;
    feeSide: 'base' | 'asset';
    volume: bigint;
    now: number;
}

export interface PoolSnapshot extends PoolReserves {
    poolId: string;
    assetId: string;
    routeType: RouteType;
    baseAssetId: string;
    lastPrice: bigint;
    cumulativePrice: bigint;
    lastPriceUpdateTime: number;
    volumeWindow: bigint;
    volumeWindowStart: number;
    feeAccruedBase: bigint;
    feeAccruedAsset: bigint;
    providerCount: number;
    createdAt: number;
    lastTradeAt?: number;
}

export type PoolCreateData = {
    assetId: string;
    routeType: RouteType | string;
    baseAmount: string | bigint;
    assetAmount: string | bigint;
};

export type PoolAddLiquidityData = {
    assetId: string;
    routeType: RouteType | string;
    baseAmount: string | bigint;
    maxSlippageBps: number;
    maxAssetAmount?: string | bigint;
};

export type PoolRemoveLiquidityData = {
    assetId: string;
    routeType: RouteType | string;
    shares: string | bigint;
    minBaseOut?: string | bigint;
    minAssetOut?: string | bigint;
};

export type PoolSwapData = {
    assetId: string;
    routeType: RouteType | string;
    direction: SwapDirection | string;
    amountIn: string | bigint;
    minAmountOut: string | bigint;
    deadline?: number; // unix seconds, 0 or absent for none
};

export type SmartSwapData = {
    fromAssetId: string;
    toAssetId: string;
    amountIn: string | bigint;
    minAmountOut: string | bigint;
    deadline?: number;
};

export interface CreatePoolParams {
    assetId: string;
    routeType: RouteType;
    baseAmount: bigint;
    assetAmount: bigint;
}

export interface AddLiquidityParams {
    assetId: string;
    routeType: RouteType;
    baseAmount: bigint;
    maxSlippageBps: number;
    maxAssetAmount?: bigint;
}

export interface RemoveLiquidityParams {
    assetId: string;
    routeType: RouteType;
    shares: bigint;
    minBaseOut?: bigint;
    minAssetOut?: bigint;
}

export interface SwapParams {
    assetId: string;
    routeType: RouteType;
    direction: SwapDirection;
    amountIn: bigint;
    minAmountOut: bigint;
    deadline?: number;
}

export interface SmartSwapParams {
    fromAssetId: string;
    toAssetId: string;
    amountIn: bigint;
    minAmountOut: bigint;
    deadline?: number;
}

export interface LiquidityResult {
    poolId: string;
    baseAmount: bigint;
    assetAmount: bigint;
    sharesMinted: bigint;
    totalShares: bigint;
}

export interface RemoveLiquidityResult {
    poolId: string;
    sharesBurned: bigint;
    baseOut: bigint;
    assetOut: bigint;
    poolClosed: boolean;
}

export interface SwapQuote {
    poolId: string;
    direction: SwapDirection;
    tokenIn: string;
    tokenOut: string;
    amountIn: bigint;
    amountInAfterFee: bigint;
    amountOut: bigint;
    feeAmount: bigint;
    protocolFee: bigint;
    priceImpactBps: bigint;
    reserveIn: bigint;
    reserveOut: bigint;
}

export interface SwapResult extends SwapQuote {
    newPrice: bigint;
}

export interface TradeHop {
    poolId: string;
    tokenIn: string;
    tokenOut: string;
    amountIn: bigint;
    amountOut: bigint;
    priceImpactBps: bigint;
}

export interface RouteQuote {
    nativeOutput: bigint;
    utilityOutput: bigint;
    preferUtility: boolean;
    nativeAvailable: boolean;
    utilityAvailable: boolean;
}

export interface SmartSwapResult {
    routeType: RouteType;
    hops: TradeHop[];
    amountIn: bigint;
    amountOut: bigint;
}
