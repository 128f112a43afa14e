import './setup.js';

import assert from 'assert';
import { describe, it } from 'node:test';

import { EngineErrorCode } from '../src/errors.js';
import { RouteType, SwapDirection } from '../src/transactions/pool/pool-interfaces.js';
import { parseBigInt, serializeBigInts, toBigInt } from '../src/utils/bigint.js';
import validate from '../src/validation/index.js';
import {
    parseAmount,
    parseDeadline,
    parseOptionalAmount,
    parseRouteType,
    parseSwapDirection,
    validateAccountId,
    validateAssetId,
    validateDeadlineField,
    validateSlippageBps,
} from '../src/validation/pool.js';
import { expectEngineError } from './helpers.js';

describe('validation', () => {
    describe('asset ids', () => {
        it('accepts upper-case ids with inner dashes', () => {
            assert.strictEqual(validateAssetId('ART'), true);
            assert.strictEqual(validateAssetId('MONA-LISA-01'), true);
        });

        it('rejects anything else', () => {
            assert.strictEqual(validateAssetId('art'), false);
            assert.strictEqual(validateAssetId('-ART'), false);
            assert.strictEqual(validateAssetId('ART-'), false);
            assert.strictEqual(validateAssetId('A'), false);
            assert.strictEqual(validateAssetId('A'.repeat(33)), false);
            assert.strictEqual(validateAssetId('ART_X'), false);
            assert.strictEqual(validateAssetId(42), false);
        });
    });

    it('checks account ids for length only', () => {
        assert.strictEqual(validateAccountId('alice'), true);
        assert.strictEqual(validateAccountId('fee-treasury.main'), true);
        assert.strictEqual(validateAccountId(''), false);
        assert.strictEqual(validateAccountId('x'.repeat(65)), false);
        assert.strictEqual(validateAccountId(undefined), false);
    });

    it('validates integer amounts given as strings, numbers or bigints', () => {
        assert.strictEqual(validate.bigint('100'), true);
        assert.strictEqual(validate.bigint(100n), true);
        assert.strictEqual(validate.bigint(100), true);
        assert.strictEqual(validate.bigint('0'), false);
        assert.strictEqual(validate.bigint('0', true), true);
        assert.strictEqual(validate.bigint('-1', true), false);
        assert.strictEqual(validate.bigint('1.5'), false);
        assert.strictEqual(validate.bigint('1e6'), false);
        assert.strictEqual(validate.bigint('1' + '0'.repeat(36)), false);
        assert.strictEqual(validate.bigint('5', false, false, 10n), false);
    });

    it('bounds slippage and deadlines', () => {
        assert.strictEqual(validateSlippageBps(0), true);
        assert.strictEqual(validateSlippageBps(10000), true);
        assert.strictEqual(validateSlippageBps(10001), false);
        assert.strictEqual(validateSlippageBps(1.5), false);
        assert.strictEqual(validateDeadlineField(undefined), true);
        assert.strictEqual(validateDeadlineField(0), true);
        assert.strictEqual(validateDeadlineField(-1), false);
        assert.strictEqual(validateDeadlineField('1700000000'), false);
    });

    describe('parsers', () => {
        it('narrows route types and directions', () => {
            assert.strictEqual(parseRouteType('utility'), RouteType.UTILITY);
            assert.strictEqual(parseSwapDirection('sell'), SwapDirection.SELL);
            expectEngineError(() => parseRouteType('UTILITY'), EngineErrorCode.INVALID_INPUT);
            expectEngineError(() => parseSwapDirection('hold'), EngineErrorCode.INVALID_INPUT);
        });

        it('parses amounts and optional fields', () => {
            assert.strictEqual(parseAmount(' 0042 ', 'amountIn'), 42n);
            assert.strictEqual(parseOptionalAmount(undefined, 'minBaseOut'), undefined);
            assert.strictEqual(parseOptionalAmount('7', 'minBaseOut'), 7n);
            expectEngineError(() => parseAmount('ten', 'amountIn'), EngineErrorCode.INVALID_INPUT);
            assert.strictEqual(parseDeadline(undefined), undefined);
            assert.strictEqual(parseDeadline(1_700_000_000), 1_700_000_000);
            expectEngineError(() => parseDeadline(-5), EngineErrorCode.INVALID_INPUT);
        });
    });

    describe('bigint helpers', () => {
        it('converts loose inputs', () => {
            assert.strictEqual(toBigInt(undefined), 0n);
            assert.strictEqual(toBigInt('-007'), -7n);
            assert.strictEqual(toBigInt(3.9), 3n);
            assert.strictEqual(parseBigInt('12x'), null);
            assert.strictEqual(parseBigInt(Number.MAX_SAFE_INTEGER + 2), null);
        });

        it('serializes nested bigints and drops undefined fields', () => {
            assert.deepStrictEqual(serializeBigInts({ a: 1n, b: [2n, 'x'], c: undefined, d: { e: null } }), { a: '1', b: ['2', 'x'], d: { e: null } });
        });
    });
});
