import { EngineConfig } from '../config.js';
import { EngineState } from '../state.js';
import { AssetBank, TransferInstruction } from '../utils/asset-bank.js';
import { EventCategory } from '../utils/event-logger.js';
import { CircuitBreaker } from './breaker/circuit-breaker.js';
import { ProtocolFeeLedger } from './fees/fee-ledger.js';
import { PoolLedger } from './pool/pool-ledger.js';

/**
 * What a mutating operation sees while it holds the engine lease.
 * Events are buffered until commit. Transfers settle immediately, all or
 * nothing per `settle` call, so operations settle last.
 */
export interface OperationContext {
    readonly config: EngineConfig;
    readonly state: EngineState;
    readonly ledger: PoolLedger;
    readonly fees: ProtocolFeeLedger;
    readonly breaker: CircuitBreaker;
    readonly bank: AssetBank;
    readonly now: number;
    readonly caller: string;
    readonly transactionId: string;
    emit(category: EventCategory, action: string, data: Record<string, unknown>): void;
    settle(instructions: TransferInstruction[]): void;
}
