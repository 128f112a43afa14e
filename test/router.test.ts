import './setup.js';

import assert from 'assert';
import { beforeEach, describe, it } from 'node:test';

import { EngineErrorCode } from '../src/errors.js';
import { RouteType } from '../src/transactions/pool/pool-interfaces.js';
import { ENGINE, NATIVE, TestEngine, UTIL, expectEngineError, seedPool, setupEngine } from './helpers.js';

describe('smart router', () => {
    let t: TestEngine;

    beforeEach(() => {
        t = setupEngine();
        seedPool(t, 'alice', 'XAU', RouteType.NATIVE, 1_000_000n, 10_000n);
        seedPool(t, 'alice', 'YEN', RouteType.NATIVE, 2_000_000n, 50_000n);
        t.bank.mint('trader', 'XAU', 500n);
    });

    const route = (amountIn: bigint, minAmountOut = 0n, toAssetId = 'YEN') =>
        t.engine.executeSmartSwap('trader', { fromAssetId: 'XAU', toAssetId, amountIn, minAmountOut });

    describe('quoteRoutes', () => {
        it('quotes the native route and reports the missing utility route', () => {
            assert.deepStrictEqual(t.engine.quoteRoutes('XAU', 'YEN', 500n), {
                nativeOutput: 1_155n,
                utilityOutput: 0n,
                preferUtility: false,
                nativeAvailable: true,
                utilityAvailable: false,
            });
        });

        it('returns the same quote on repeated calls and leaves the reserves alone', () => {
            const xau = t.engine.getReserves('XAU', RouteType.NATIVE);
            const yen = t.engine.getReserves('YEN', RouteType.NATIVE);

            const first = t.engine.quoteRoutes('XAU', 'YEN', 500n);
            const second = t.engine.quoteRoutes('XAU', 'YEN', 500n);
            assert.deepStrictEqual(first, second);
            assert.deepStrictEqual(t.engine.getReserves('XAU', RouteType.NATIVE), xau);
            assert.deepStrictEqual(t.engine.getReserves('YEN', RouteType.NATIVE), yen);
            assert.deepStrictEqual(t.engine.listProtocolFees(), {});
        });

        it('prefers the utility route only when it pays strictly more', () => {
            seedPool(t, 'alice', 'XAU', RouteType.UTILITY, 400_000n, 10_000n);
            seedPool(t, 'alice', 'YEN', RouteType.UTILITY, 1_000_000n, 50_000n);
            const quote = t.engine.quoteRoutes('XAU', 'YEN', 500n);
            assert.strictEqual(quote.utilityOutput, 928n);
            assert.strictEqual(quote.nativeOutput, 1_155n);
            assert.strictEqual(quote.preferUtility, false);
        });

        it('reports an unquotable route as available with no output', () => {
            assert.deepStrictEqual(t.engine.quoteRoutes('XAU', 'YEN', 1n), {
                nativeOutput: 0n,
                utilityOutput: 0n,
                preferUtility: false,
                nativeAvailable: true,
                utilityAvailable: false,
            });
        });

        it('rejects routing an asset into itself', () => {
            expectEngineError(() => t.engine.quoteRoutes('XAU', 'XAU', 500n), EngineErrorCode.INVALID_INPUT);
            expectEngineError(() => route(500n, 0n, 'XAU'), EngineErrorCode.INVALID_INPUT);
        });
    });

    describe('executeSmartSwap', () => {
        it('sells into the base and buys the target in one operation', () => {
            const result = route(500n, 1_155n);

            assert.strictEqual(result.routeType, RouteType.NATIVE);
            assert.strictEqual(result.amountOut, 1_155n);
            assert.deepStrictEqual(result.hops, [
                { poolId: 'XAU_NATIVE', tokenIn: 'XAU', tokenOut: NATIVE, amountIn: 500n, amountOut: 47_437n, priceImpactBps: 500n },
                { poolId: 'YEN_NATIVE', tokenIn: NATIVE, tokenOut: 'YEN', amountIn: 47_437n, amountOut: 1_155n, priceImpactBps: 237n },
            ]);

            assert.deepStrictEqual(t.engine.getReserves('XAU', RouteType.NATIVE), {
                reserveBase: 952_563n,
                reserveAsset: 10_499n,
                totalShares: 100_000n * 10n ** 18n,
            });
            assert.deepStrictEqual(t.engine.getReserves('YEN', RouteType.NATIVE), {
                reserveBase: 2_047_366n,
                reserveAsset: 48_845n,
                totalShares: 316_227n * 10n ** 18n,
            });
            assert.deepStrictEqual(t.engine.listProtocolFees(), { XAU: 1n, [NATIVE]: 71n });
        });

        it('only settles the net movement', () => {
            route(500n);
            assert.strictEqual(t.bank.balanceOf('XAU', 'trader'), 0n);
            assert.strictEqual(t.bank.balanceOf('YEN', 'trader'), 1_155n);
            assert.strictEqual(t.bank.balanceOf(NATIVE, 'trader'), 0n);
            // the intermediate base never left custody
            assert.strictEqual(t.bank.balanceOf(NATIVE, ENGINE), 3_000_000n);
            assert.strictEqual(t.bank.balanceOf('XAU', ENGINE), 10_500n);
            assert.strictEqual(t.bank.balanceOf('YEN', ENGINE), 48_845n);
        });

        it('takes the utility route when it pays more', () => {
            seedPool(t, 'alice', 'XAU', RouteType.UTILITY, 2_000_000n, 10_000n);
            seedPool(t, 'alice', 'YEN', RouteType.UTILITY, 2_000_000n, 50_000n);

            const result = route(500n);
            assert.strictEqual(result.routeType, RouteType.UTILITY);
            assert.strictEqual(result.amountOut, 2_257n);
            assert.strictEqual(result.hops[0].amountOut, 94_875n);
            assert.strictEqual(t.engine.getProtocolFees(UTIL), 142n);
            assert.strictEqual(t.engine.getProtocolFees(NATIVE), 0n);
            assert.strictEqual(t.engine.getReserves('XAU', RouteType.NATIVE).reserveAsset, 10_000n);
        });

        it('falls back to the utility route when the native one is missing', () => {
            seedPool(t, 'alice', 'GEM', RouteType.UTILITY, 2_000_000n, 50_000n);
            seedPool(t, 'alice', 'XAU', RouteType.UTILITY, 2_000_000n, 10_000n);
            const result = t.engine.executeSmartSwap('trader', { fromAssetId: 'XAU', toAssetId: 'GEM', amountIn: 500n, minAmountOut: 0n });
            assert.strictEqual(result.routeType, RouteType.UTILITY);
            assert.strictEqual(result.amountOut, 2_257n);
        });

        it('fails when neither route exists', () => {
            expectEngineError(() => route(500n, 0n, 'GEM'), EngineErrorCode.NO_ROUTE_AVAILABLE);
            assert.strictEqual(t.bank.balanceOf('XAU', 'trader'), 500n);
        });

        it('fails when the chosen route cannot execute', () => {
            expectEngineError(() => route(1n), EngineErrorCode.INSUFFICIENT_LIQUIDITY);
        });

        it('rolls back the first hop when the second misses the minimum', () => {
            expectEngineError(() => route(500n, 1_156n), EngineErrorCode.SLIPPAGE_EXCEEDED);
            assert.deepStrictEqual(t.engine.getReserves('XAU', RouteType.NATIVE), {
                reserveBase: 1_000_000n,
                reserveAsset: 10_000n,
                totalShares: 100_000n * 10n ** 18n,
            });
            assert.deepStrictEqual(t.engine.listProtocolFees(), {});
            assert.strictEqual(t.bank.balanceOf('XAU', 'trader'), 500n);
            assert.deepStrictEqual(t.engine.getEvents({ category: 'router' }), []);
        });

        it('keeps the breaker tripped after rolling back a second-hop trip', () => {
            seedPool(t, 'alice', 'ZED', RouteType.NATIVE, 100_000n, 5_000n);
            expectEngineError(() => route(500n, 0n, 'ZED'), EngineErrorCode.CIRCUIT_BREAKER_TRIGGERED);

            const status = t.engine.getCircuitBreakerStatus();
            assert.strictEqual(status.active, true);
            assert.strictEqual(status.trippedPool, 'ZED_NATIVE');
            assert.strictEqual(t.engine.getReserves('XAU', RouteType.NATIVE).reserveAsset, 10_000n);
            assert.strictEqual(t.bank.balanceOf('XAU', 'trader'), 500n);

            const [tripped] = t.engine.getEvents({ category: 'breaker', action: 'tripped' });
            assert.deepStrictEqual(tripped.data, { poolId: 'ZED_NATIVE', priceImpactBps: '4743', operation: 'executeSmartSwap' });
            expectEngineError(() => route(500n), EngineErrorCode.SYSTEM_PAUSED);
        });

        it('records the route taken', () => {
            route(500n);
            const [event] = t.engine.getEvents({ category: 'router', action: 'smart_swap' });
            assert.strictEqual(event.actor, 'trader');
            assert.strictEqual(event.data.routeType, 'native');
            assert.strictEqual(event.data.intermediateAmount, '47437');
            assert.strictEqual(event.data.amountOut, '1155');
        });
    });
});
