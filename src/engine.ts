import baseConfig, { EngineConfig } from './config.js';
import { EngineError, EngineErrorCode, isEngineError } from './errors.js';
import { EmergencyControls } from './integrations/emergency-controls.js';
import logger from './logger.js';
import { EngineState, StateJournal, createEngineState } from './state.js';
import { CircuitBreaker, CircuitBreakerStatus } from './transactions/breaker/circuit-breaker.js';
import { resetCircuitBreaker } from './transactions/breaker/breaker-reset.js';
import { setFeeRecipient, setPaused } from './transactions/admin/engine-admin.js';
import { OperationContext } from './transactions/context.js';
import { FeeCollectResult, collectFees } from './transactions/fees/fee-collect.js';
import { ProtocolFeeLedger } from './transactions/fees/fee-ledger.js';
import { addLiquidity } from './transactions/pool/pool-add-liquidity.js';
import { createPool } from './transactions/pool/pool-create.js';
import {
    AddLiquidityParams,
    CreatePoolParams,
    LiquidityResult,
    PoolReserves,
    PoolSnapshot,
    RemoveLiquidityParams,
    RemoveLiquidityResult,
    RouteQuote,
    RouteType,
    SmartSwapParams,
    SmartSwapResult,
    SwapDirection,
    SwapParams,
    SwapQuote,
    SwapResult,
} from './transactions/pool/pool-interfaces.js';
import { PoolLedger } from './transactions/pool/pool-ledger.js';
import { removeLiquidity } from './transactions/pool/pool-remove-liquidity.js';
import { executeSmartSwap, quoteRoutes } from './transactions/pool/pool-router.js';
import { quoteSwap, swap } from './transactions/pool/pool-swap.js';
import { AssetBank, InMemoryAssetBank, settleTransfers } from './utils/asset-bank.js';
import { transactionIdFor } from './utils/deterministic-id.js';
import { EventCategory, EventDocument, EventLogger, PendingEvent } from './utils/event-logger.js';
import { ExecutionGuard } from './utils/execution-guard.js';
import { generatePoolId } from './utils/pool.js';

export type Clock = () => number;

export interface EngineOptions {
    config?: Partial<EngineConfig>;
    bank?: AssetBank;
    clock?: Clock;
    emergencyControls?: EmergencyControls;
    events?: EventLogger;
}

const systemClock: Clock = () => Math.floor(Date.now() / 1000);

/**
 * Dual-route constant-product AMM. Every write holds the engine lease for its
 * whole duration and either commits in full or leaves no trace, apart from a
 * circuit-breaker trip which survives the rollback.
 */
export class HybridLiquidityEngine {
    readonly config: EngineConfig;
    readonly bank: AssetBank;
    readonly events: EventLogger;

    private readonly clock: Clock;
    private readonly emergencyControls?: EmergencyControls;
    private readonly state: EngineState;
    private readonly ledger: PoolLedger;
    private readonly fees: ProtocolFeeLedger;
    private readonly breaker: CircuitBreaker;
    private readonly guard = new ExecutionGuard();
    private sequence = 0;

    constructor(options: EngineOptions = {}) {
        this.config = baseConfig.read(options.config);
        this.bank = options.bank ?? new InMemoryAssetBank();
        this.clock = options.clock ?? systemClock;
        this.emergencyControls = options.emergencyControls;
        this.events = options.events ?? new EventLogger(this.config.eventJournalLimit);

        this.state = createEngineState(this.clock(), this.config.feeRecipient);
        this.ledger = new PoolLedger(this.state, this.config);
        this.fees = new ProtocolFeeLedger(this.state);
        this.breaker = new CircuitBreaker(this.state, this.config);
        logger.info(`[engine] ${this.config.engineName} ready at ${this.config.engineAddress} (native ${this.config.nativeAssetId}, utility ${this.config.utilityAssetId})`);
    }

    now(): number {
        return this.clock();
    }

    // --- writes ---

    createPool(caller: string, params: CreatePoolParams, transactionId?: string): LiquidityResult {
        return this.execute('createPool', caller, true, ctx => createPool(ctx, params), transactionId);
    }

    addLiquidity(caller: string, params: AddLiquidityParams, transactionId?: string): LiquidityResult {
        return this.execute('addLiquidity', caller, true, ctx => addLiquidity(ctx, params), transactionId);
    }

    removeLiquidity(caller: string, params: RemoveLiquidityParams, transactionId?: string): RemoveLiquidityResult {
        return this.execute('removeLiquidity', caller, true, ctx => removeLiquidity(ctx, params), transactionId);
    }

    swap(caller: string, params: SwapParams, transactionId?: string): SwapResult {
        return this.execute('swap', caller, true, ctx => swap(ctx, params), transactionId);
    }

    executeSmartSwap(caller: string, params: SmartSwapParams, transactionId?: string): SmartSwapResult {
        return this.execute('executeSmartSwap', caller, true, ctx => executeSmartSwap(ctx, params), transactionId);
    }

    collectFees(caller: string, assetId: string, transactionId?: string): FeeCollectResult {
        return this.execute('collectFees', caller, false, ctx => collectFees(ctx, assetId), transactionId);
    }

    resetCircuitBreaker(caller: string, transactionId?: string): CircuitBreakerStatus {
        return this.execute('resetCircuitBreaker', caller, false, ctx => resetCircuitBreaker(ctx), transactionId);
    }

    pause(caller: string, transactionId?: string): boolean {
        return this.execute('pause', caller, false, ctx => setPaused(ctx, true), transactionId);
    }

    unpause(caller: string, transactionId?: string): boolean {
        return this.execute('unpause', caller, false, ctx => setPaused(ctx, false), transactionId);
    }

    setFeeRecipient(caller: string, recipient: string, transactionId?: string): string {
        return this.execute('setFeeRecipient', caller, false, ctx => setFeeRecipient(ctx, recipient), transactionId);
    }

    // --- reads ---

    getPool(assetId: string, routeType: RouteType): PoolSnapshot | undefined {
        const poolId = generatePoolId(assetId, routeType);
        return this.ledger.getPool(poolId) ? this.ledger.snapshot(poolId) : undefined;
    }

    getPoolById(poolId: string): PoolSnapshot | undefined {
        return this.ledger.getPool(poolId) ? this.ledger.snapshot(poolId) : undefined;
    }

    listPools(): PoolSnapshot[] {
        return this.ledger.listPools().map(pool => this.ledger.snapshot(pool._id));
    }

    getReserves(assetId: string, routeType: RouteType): PoolReserves {
        return this.ledger.getReserves(generatePoolId(assetId, routeType));
    }

    getTwap(poolId: string, windowSeconds: number): bigint {
        return this.ledger.getTwap(poolId, windowSeconds, this.clock());
    }

    getProviderShares(poolId: string, provider: string): bigint {
        return this.ledger.getProviderShares(poolId, provider);
    }

    listProviders(poolId: string): string[] {
        return this.ledger.listProviders(poolId);
    }

    quoteSwap(assetId: string, routeType: RouteType, direction: SwapDirection, amountIn: bigint): SwapQuote {
        const pool = this.ledger.requirePool(generatePoolId(assetId, routeType));
        return quoteSwap(pool, direction, amountIn, 0n, this.config);
    }

    quoteRoutes(fromAssetId: string, toAssetId: string, amountIn: bigint): RouteQuote {
        return quoteRoutes(this.ledger, this.config, fromAssetId, toAssetId, amountIn);
    }

    getProtocolFees(assetId: string): bigint {
        return this.fees.balanceOf(assetId);
    }

    listProtocolFees(): Record<string, bigint> {
        return this.fees.balances();
    }

    getCircuitBreakerStatus(): CircuitBreakerStatus {
        return this.breaker.status();
    }

    getFeeRecipient(): string {
        return this.state.feeRecipient;
    }

    isPaused(): boolean {
        return this.pauseReason() !== null;
    }

    getEvents(filter: { category?: EventCategory; action?: string } = {}): EventDocument[] {
        return this.events.getEvents(filter);
    }

    private pauseReason(): string | null {
        if (this.breaker.active) return 'circuit breaker is active';
        if (this.state.paused) return 'engine is paused by its owner';
        if (this.emergencyControls?.isContractPaused(this.config.engineAddress)) return 'emergency controls have paused the engine';
        return null;
    }

    /**
     * Runs one write under the lease. On failure the journal rolls the state
     * back; a breaker trip is then re-applied and announced on its own.
     */
    private execute<T>(operation: string, caller: string, gated: boolean, fn: (ctx: OperationContext) => T, transactionId?: string): T {
        const lease = this.guard.acquire(operation);
        try {
            const now = this.clock();
            this.sequence += 1;
            const txId = transactionId ?? transactionIdFor(operation, caller, now, this.sequence);

            if (gated) {
                const reason = this.pauseReason();
                if (reason !== null) {
                    throw new EngineError(EngineErrorCode.SYSTEM_PAUSED, `Cannot ${operation}: ${reason}`, { operation });
                }
            }

            const journal = new StateJournal(this.state);
            const pending: PendingEvent[] = [];
            const ctx: OperationContext = {
                config: this.config,
                state: this.state,
                ledger: this.ledger,
                fees: this.fees,
                breaker: this.breaker,
                bank: this.bank,
                now,
                caller,
                transactionId: txId,
                emit: (category, action, data) => {
                    pending.push({ category, action, actor: caller, data });
                },
                settle: instructions => settleTransfers(this.bank, instructions),
            };

            try {
                const result = this.ledger.withJournal(journal, () => fn(ctx));
                this.events.flush(pending, now, txId);
                return result;
            } catch (error) {
                journal.rollback();
                logger.debug(`[engine] ${operation} rolled back pools [${journal.touchedPools().join(', ')}]`);
                if (isEngineError(error, EngineErrorCode.CIRCUIT_BREAKER_TRIGGERED)) {
                    const poolId = error.details?.poolId;
                    this.breaker.trip(now, poolId);
                    this.events.logEvent('breaker', 'tripped', caller, { poolId, priceImpactBps: error.details?.priceImpactBps, operation }, now, txId);
                }
                throw error;
            }
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.debug(`[engine] ${operation} by ${caller} failed: ${message}`);
            throw error;
        } finally {
            lease.release();
        }
    }
}

export default HybridLiquidityEngine;
