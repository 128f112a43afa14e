import './setup.js';

import assert from 'assert';
import { beforeEach, describe, it } from 'node:test';

import { EngineErrorCode } from '../src/errors.js';
import { RouteType, SwapDirection } from '../src/transactions/pool/pool-interfaces.js';
import { ENGINE, NATIVE, START, TestEngine, UTIL, expectEngineError, seedPool, setupEngine } from './helpers.js';

const POOL = 'ART_NATIVE';

describe('swap', () => {
    let t: TestEngine;

    beforeEach(() => {
        t = setupEngine();
        seedPool(t, 'alice', 'ART', RouteType.NATIVE, 1_000_000n, 1_000n);
        t.bank.mint('bob', NATIVE, 100_000n);
    });

    const buy = (amountIn: bigint, minAmountOut = 0n, deadline?: number) =>
        t.engine.swap('bob', { assetId: 'ART', routeType: RouteType.NATIVE, direction: SwapDirection.BUY, amountIn, minAmountOut, deadline });

    it('buys the listed asset with the base and splits the fee', () => {
        const result = buy(100_000n, 90n);

        assert.strictEqual(result.amountOut, 90n);
        assert.strictEqual(result.feeAmount, 300n);
        assert.strictEqual(result.protocolFee, 150n);
        assert.strictEqual(result.amountInAfterFee, 99_700n);
        assert.strictEqual(result.priceImpactBps, 1000n);
        assert.strictEqual(result.tokenIn, NATIVE);
        assert.strictEqual(result.tokenOut, 'ART');
        assert.strictEqual(result.newPrice, 1_208_626_373_626_373_626_373n);

        const pool = t.engine.getPool('ART', RouteType.NATIVE);
        assert.ok(pool);
        assert.strictEqual(pool.reserveBase, 1_099_850n);
        assert.strictEqual(pool.reserveAsset, 910n);
        assert.strictEqual(pool.feeAccruedBase, 150n);
        assert.strictEqual(pool.volumeWindow, 100_000n);
        assert.strictEqual(pool.lastTradeAt, START);
        assert.strictEqual(t.engine.getProtocolFees(NATIVE), 150n);

        assert.strictEqual(t.bank.balanceOf(NATIVE, 'bob'), 0n);
        assert.strictEqual(t.bank.balanceOf('ART', 'bob'), 90n);
        // custody covers the reserves plus the protocol fees held
        assert.strictEqual(t.bank.balanceOf(NATIVE, ENGINE), 1_100_000n);
        assert.strictEqual(t.bank.balanceOf('ART', ENGINE), 910n);
    });

    it('sells the listed asset back for the base', () => {
        buy(100_000n);
        const result = t.engine.swap('bob', { assetId: 'ART', routeType: RouteType.NATIVE, direction: SwapDirection.SELL, amountIn: 50n, minAmountOut: 56_000n });

        assert.strictEqual(result.amountOut, 56_196n);
        assert.strictEqual(result.feeAmount, 1n);
        assert.strictEqual(result.protocolFee, 0n);
        assert.strictEqual(result.priceImpactBps, 549n);
        assert.deepStrictEqual(t.engine.getReserves('ART', RouteType.NATIVE), {
            reserveBase: 1_043_654n,
            reserveAsset: 960n,
            totalShares: 31_622n * 10n ** 18n,
        });
        const pool = t.engine.getPool('ART', RouteType.NATIVE);
        assert.ok(pool);
        assert.strictEqual(pool.feeAccruedAsset, 1n);
        assert.strictEqual(pool.volumeWindow, 156_196n);
        assert.strictEqual(t.bank.balanceOf('ART', 'bob'), 40n);
        assert.strictEqual(t.bank.balanceOf(NATIVE, 'bob'), 56_196n);
        assert.strictEqual(t.engine.getProtocolFees('ART'), 0n);
    });

    it('never lets the product of the reserves shrink across buys and sells', () => {
        t.bank.mint('bob', NATIVE, 200_000n);
        t.bank.mint('bob', 'ART', 200n);
        const trades: [SwapDirection, bigint][] = [
            [SwapDirection.BUY, 100_000n],
            [SwapDirection.SELL, 50n],
            [SwapDirection.SELL, 3n],
            [SwapDirection.SELL, 2n],
            [SwapDirection.BUY, 5_000n],
            [SwapDirection.SELL, 7n],
            [SwapDirection.BUY, 150_000n],
            [SwapDirection.SELL, 120n],
            [SwapDirection.BUY, 3_000n],
        ];

        let reserves = t.engine.getReserves('ART', RouteType.NATIVE);
        for (const [direction, amountIn] of trades) {
            t.engine.swap('bob', { assetId: 'ART', routeType: RouteType.NATIVE, direction, amountIn, minAmountOut: 1n });
            const next = t.engine.getReserves('ART', RouteType.NATIVE);
            assert.ok(next.reserveBase * next.reserveAsset >= reserves.reserveBase * reserves.reserveAsset, `k shrank after ${direction} ${amountIn}`);
            reserves = next;
        }
        assert.strictEqual(reserves.reserveBase, 1_045_251n);
        assert.strictEqual(reserves.reserveAsset, 965n);
    });

    it('rejects output below the minimum and changes nothing', () => {
        const reserves = t.engine.getReserves('ART', RouteType.NATIVE);
        expectEngineError(() => buy(100_000n, 91n), EngineErrorCode.SLIPPAGE_EXCEEDED);
        assert.deepStrictEqual(t.engine.getReserves('ART', RouteType.NATIVE), reserves);
        assert.strictEqual(t.bank.balanceOf(NATIVE, 'bob'), 100_000n);
        assert.strictEqual(t.engine.getProtocolFees(NATIVE), 0n);
        assert.deepStrictEqual(t.engine.getEvents({ category: 'swap' }), []);
    });

    it('rejects an input that rounds to nothing after the fee', () => {
        expectEngineError(() => buy(1n), EngineErrorCode.INSUFFICIENT_LIQUIDITY);
    });

    it('rejects swaps on a pool that does not exist', () => {
        expectEngineError(
            () => t.engine.swap('bob', { assetId: 'GEM', routeType: RouteType.NATIVE, direction: SwapDirection.BUY, amountIn: 10n, minAmountOut: 0n }),
            EngineErrorCode.POOL_NOT_FOUND
        );
    });

    describe('deadline', () => {
        it('fails once the deadline has passed', () => {
            t.clock.advance(10);
            expectEngineError(() => buy(100_000n, 0n, START + 9), EngineErrorCode.DEADLINE_EXPIRED);
        });

        it('rejects a deadline further out than the horizon', () => {
            expectEngineError(() => buy(100_000n, 0n, START + 3601), EngineErrorCode.INVALID_INPUT);
        });

        it('rejects a deadline that is not a whole non-negative number', () => {
            t.clock.advance(100_000);
            expectEngineError(() => buy(100_000n, 0n, Number.NaN), EngineErrorCode.INVALID_INPUT);
            expectEngineError(() => buy(100_000n, 0n, START + 1.5), EngineErrorCode.INVALID_INPUT);
            expectEngineError(() => buy(100_000n, 0n, -1), EngineErrorCode.INVALID_INPUT);
            assert.strictEqual(t.engine.getReserves('ART', RouteType.NATIVE).reserveBase, 1_000_000n);
            assert.strictEqual(t.bank.balanceOf(NATIVE, 'bob'), 100_000n);
        });

        it('accepts a deadline at the horizon, now, or none', () => {
            assert.strictEqual(buy(10_000n, 0n, START + 3600).amountOut, 9n);
            assert.ok(buy(10_000n, 0n, START).amountOut > 0n);
            assert.ok(buy(10_000n, 0n, 0).amountOut > 0n);
        });
    });

    describe('quoteSwap', () => {
        it('matches what the swap then executes and does not move state', () => {
            const first = t.engine.quoteSwap('ART', RouteType.NATIVE, SwapDirection.BUY, 100_000n);
            const second = t.engine.quoteSwap('ART', RouteType.NATIVE, SwapDirection.BUY, 100_000n);
            assert.deepStrictEqual(first, second);
            assert.strictEqual(t.engine.getReserves('ART', RouteType.NATIVE).reserveBase, 1_000_000n);

            const executed = buy(100_000n);
            assert.strictEqual(executed.amountOut, first.amountOut);
            assert.strictEqual(executed.feeAmount, first.feeAmount);
            assert.strictEqual(executed.protocolFee, first.protocolFee);
            assert.strictEqual(executed.priceImpactBps, first.priceImpactBps);
        });

        it('quotes a sell on a fresh pool', () => {
            const quote = t.engine.quoteSwap('ART', RouteType.NATIVE, SwapDirection.SELL, 10n);
            assert.strictEqual(quote.amountOut, 8_919n);
            assert.strictEqual(quote.feeAmount, 1n);
            assert.strictEqual(quote.protocolFee, 0n);
            assert.strictEqual(quote.priceImpactBps, 100n);
            assert.strictEqual(quote.poolId, POOL);
        });

        it('rejects a non-positive amount', () => {
            expectEngineError(() => t.engine.quoteSwap('ART', RouteType.NATIVE, SwapDirection.BUY, 0n), EngineErrorCode.INVALID_INPUT);
        });
    });

    it('settles utility pools in the utility asset', () => {
        seedPool(t, 'alice', 'ART', RouteType.UTILITY, 1_000_000n, 1_000n);
        t.bank.mint('carol', UTIL, 100_000n);
        const result = t.engine.swap('carol', { assetId: 'ART', routeType: RouteType.UTILITY, direction: SwapDirection.BUY, amountIn: 100_000n, minAmountOut: 0n });

        assert.strictEqual(result.poolId, 'ART_UTILITY');
        assert.strictEqual(result.tokenIn, UTIL);
        assert.strictEqual(result.amountOut, 90n);
        assert.strictEqual(t.engine.getProtocolFees(UTIL), 150n);
        assert.strictEqual(t.engine.getProtocolFees(NATIVE), 0n);
        // the native pool is untouched
        assert.strictEqual(t.engine.getReserves('ART', RouteType.NATIVE).reserveBase, 1_000_000n);
    });

    describe('settlement failures', () => {
        it('rolls back when the trader cannot pay', () => {
            t.bank.mint('dave', NATIVE, 50_000n);
            expectEngineError(
                () => t.engine.swap('dave', { assetId: 'ART', routeType: RouteType.NATIVE, direction: SwapDirection.BUY, amountIn: 100_000n, minAmountOut: 0n }),
                EngineErrorCode.TRANSFER_FAILED
            );
            assert.strictEqual(t.engine.getReserves('ART', RouteType.NATIVE).reserveAsset, 1_000n);
            assert.strictEqual(t.engine.getProtocolFees(NATIVE), 0n);
            assert.strictEqual(t.bank.balanceOf(NATIVE, 'dave'), 50_000n);
        });

        it('refunds the input when the payout is rejected', () => {
            t.bank.freezeAsset('ART');
            expectEngineError(() => buy(100_000n), EngineErrorCode.TRANSFER_FAILED);
            t.bank.unfreezeAsset('ART');

            assert.strictEqual(t.bank.balanceOf(NATIVE, 'bob'), 100_000n);
            assert.strictEqual(t.bank.balanceOf(NATIVE, ENGINE), 1_000_000n);
            assert.strictEqual(t.engine.getReserves('ART', RouteType.NATIVE).reserveBase, 1_000_000n);
            assert.strictEqual(t.engine.getPool('ART', RouteType.NATIVE)?.lastTradeAt, undefined);
        });
    });

    describe('circuit breaker threshold', () => {
        beforeEach(() => {
            t.bank.mint('bob', NATIVE, 200_000n);
        });

        it('lets an impact equal to the threshold through', () => {
            const result = buy(200_000n);
            assert.strictEqual(result.priceImpactBps, 2000n);
            assert.strictEqual(result.amountOut, 166n);
            assert.strictEqual(result.feeAmount, 600n);
            assert.strictEqual(result.protocolFee, 300n);
            assert.strictEqual(t.engine.getCircuitBreakerStatus().active, false);
        });

        it('trips on an impact above the threshold and reverts the swap', () => {
            expectEngineError(() => buy(250_000n), EngineErrorCode.CIRCUIT_BREAKER_TRIGGERED);

            const status = t.engine.getCircuitBreakerStatus();
            assert.strictEqual(status.active, true);
            assert.strictEqual(status.trippedPool, POOL);
            assert.strictEqual(status.trippedAt, START);
            assert.strictEqual(t.engine.getReserves('ART', RouteType.NATIVE).reserveBase, 1_000_000n);
            assert.strictEqual(t.bank.balanceOf(NATIVE, 'bob'), 300_000n);
            expectEngineError(() => buy(10_000n), EngineErrorCode.SYSTEM_PAUSED);
        });
    });

    it('emits a swap event with serialized amounts', () => {
        buy(100_000n);
        const [event] = t.engine.getEvents({ category: 'swap', action: 'executed' });
        assert.strictEqual(event.actor, 'bob');
        assert.strictEqual(event.timestamp, START);
        assert.deepStrictEqual(event.data, {
            poolId: POOL,
            trader: 'bob',
            direction: 'buy',
            tokenIn: NATIVE,
            tokenOut: 'ART',
            amountIn: '100000',
            amountOut: '90',
            feeAmount: '300',
            protocolFee: '150',
            priceImpactBps: '1000',
            newPrice: '1208626373626373626373',
        });
    });
});
