import { EngineError, EngineErrorCode } from '../errors.js';
import { RouteType } from '../transactions/pool/pool-interfaces.js';

// 18-decimal fixed-point scale for prices and shares
export const PRECISION = 10n ** 18n;
export const BPS_DENOMINATOR = 10000n;

/**
 * Generates a pool ID from the listed asset and the route type
 *
 * @param assetId - Listed asset identifier
 * @param routeType - Which base the pool is priced in
 * @returns Pool ID, e.g. ART_NATIVE
 */
export function generatePoolId(assetId: string, routeType: RouteType): string {
    return `${assetId}_${routeType.toUpperCase()}`;
}

/**
 * floor(sqrt(x)) by Newton iteration. Callers rely on this exact sequence so
 * share counts match bit-for-bit.
 */
export function integerSqrt(x: bigint): bigint {
    if (x < 0n) {
        throw new EngineError(EngineErrorCode.INVALID_INPUT, 'Square root of negative numbers is not supported');
    }
    if (x === 0n) return 0n;
    let y = x;
    let z = (x + 1n) / 2n;
    while (z < y) {
        y = z;
        z = (x / z + z) / 2n;
    }
    return y;
}

/**
 * Calculates the output amount for a swap using the constant product formula.
 * Fees are not applied here; pass the fee-adjusted input.
 *
 * @param amountIn - Amount of input tokens
 * @param reserveIn - Reserve of input token in the pool
 * @param reserveOut - Reserve of output token in the pool
 * @returns floor(amountIn * reserveOut / (reserveIn + amountIn))
 */
export function getAmountOut(amountIn: bigint, reserveIn: bigint, reserveOut: bigint): bigint {
    if (amountIn <= 0n || reserveIn <= 0n || reserveOut <= 0n) {
        throw new EngineError(EngineErrorCode.INVALID_INPUT, 'amountIn and both reserves must be positive', {
            amountIn: amountIn.toString(),
            reserveIn: reserveIn.toString(),
            reserveOut: reserveOut.toString(),
        });
    }
    const scaledAmountIn = amountIn * PRECISION;
    const numerator = scaledAmountIn * reserveOut;
    const denominator = reserveIn * PRECISION + scaledAmountIn;
    return numerator / denominator;
}

/**
 * Takes the trading fee off the input before quoting.
 */
export function applySwapFee(amountIn: bigint, feeBps: number): { amountInAfterFee: bigint; feeAmount: bigint } {
    const amountInAfterFee = (amountIn * (BPS_DENOMINATOR - BigInt(feeBps))) / BPS_DENOMINATOR;
    return { amountInAfterFee, feeAmount: amountIn - amountInAfterFee };
}

/**
 * Price impact of a swap in basis points of the input reserve
 */
export function calculatePriceImpactBps(amountIn: bigint, reserveIn: bigint): bigint {
    if (reserveIn <= 0n) return BPS_DENOMINATOR;
    return (amountIn * BPS_DENOMINATOR) / reserveIn;
}

/**
 * reserveBase / reserveAsset scaled by PRECISION
 */
export function calculateSpotPrice(reserveBase: bigint, reserveAsset: bigint): bigint {
    if (reserveAsset <= 0n) return 0n;
    return (reserveBase * PRECISION) / reserveAsset;
}
