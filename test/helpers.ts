import './setup.js';

import assert from 'assert';

import { EngineConfig } from '../src/config.js';
import { HybridLiquidityEngine } from '../src/engine.js';
import { EngineErrorCode, isEngineError } from '../src/errors.js';
import { EmergencyControls } from '../src/integrations/emergency-controls.js';
import { RouteType } from '../src/transactions/pool/pool-interfaces.js';
import { InMemoryAssetBank } from '../src/utils/asset-bank.js';

export const NATIVE = 'NATIVE';
export const UTIL = 'UTIL';
export const ENGINE = 'hybrid-engine';
export const OWNER = 'engine-owner';
export const TREASURY = 'fee-treasury';
export const START = 1_700_000_000;

export class ManualClock {
    constructor(public time: number = START) {}

    now = (): number => this.time;

    advance(seconds: number): void {
        this.time += seconds;
    }
}

export interface TestEngine {
    engine: HybridLiquidityEngine;
    bank: InMemoryAssetBank;
    clock: ManualClock;
}

export function setupEngine(options: { config?: Partial<EngineConfig>; bank?: InMemoryAssetBank; emergencyControls?: EmergencyControls } = {}): TestEngine {
    const clock = new ManualClock();
    const bank = options.bank ?? new InMemoryAssetBank();
    const engine = new HybridLiquidityEngine({ config: options.config, bank, clock: clock.now, emergencyControls: options.emergencyControls });
    return { engine, bank, clock };
}

/**
 * Mints what the creator needs and opens the pool.
 */
export function seedPool(t: TestEngine, creator: string, assetId: string, routeType: RouteType, baseAmount: bigint, assetAmount: bigint): void {
    const baseAssetId = routeType === RouteType.NATIVE ? NATIVE : UTIL;
    t.bank.mint(creator, baseAssetId, baseAmount);
    t.bank.mint(creator, assetId, assetAmount);
    t.engine.createPool(creator, { assetId, routeType, baseAmount, assetAmount });
}

export function expectEngineError(fn: () => unknown, code: EngineErrorCode): void {
    assert.throws(fn, (error: unknown) => {
        assert.ok(isEngineError(error), `expected an EngineError, got ${String(error)}`);
        assert.strictEqual(error.code, code);
        return true;
    });
}
