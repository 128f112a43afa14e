import cloneDeep from 'clone-deep';

import { getPositionId } from './transactions/pool/pool-helpers.js';
import { PoolRecord, ProviderPosition } from './transactions/pool/pool-interfaces.js';

export interface CircuitBreakerState {
    active: boolean;
    lastResetTime: number;
    trippedAt?: number;
    trippedPool?: string;
}

/**
 * Everything the engine owns, as plain objects and arrays.
 */
export interface EngineState {
    pools: Record<string, PoolRecord>;
    positions: Record<string, ProviderPosition>;
    providerIndex: Record<string, string[]>;
    protocolFees: Record<string, bigint>;
    breaker: CircuitBreakerState;
    paused: boolean;
    feeRecipient: string;
}

export function createEngineState(now: number, feeRecipient: string): EngineState {
    return {
        pools: {},
        positions: {},
        providerIndex: {},
        protocolFees: {},
        breaker: { active: false, lastResetTime: now },
        paused: false,
        feeRecipient,
    };
}

interface PoolBackup {
    pool?: PoolRecord;
    providers?: string[];
    positions: ProviderPosition[];
}

/**
 * Undo log for one write. Scalars and the fee table are copied up front; a
 * pool, its provider index and its positions are cloned on first touch.
 */
export class StateJournal {
    private readonly touched = new Map<string, PoolBackup>();
    private readonly protocolFees: Record<string, bigint>;
    private readonly breaker: CircuitBreakerState;
    private readonly paused: boolean;
    private readonly feeRecipient: string;

    constructor(private readonly state: EngineState) {
        this.protocolFees = { ...state.protocolFees };
        this.breaker = { ...state.breaker };
        this.paused = state.paused;
        this.feeRecipient = state.feeRecipient;
    }

    touchPool(poolId: string): void {
        if (this.touched.has(poolId)) return;
        const pool = this.state.pools[poolId];
        const providers = this.state.providerIndex[poolId];
        const positions: ProviderPosition[] = [];
        for (const provider of providers ?? []) {
            const position = this.state.positions[getPositionId(poolId, provider)];
            if (position) positions.push({ ...position });
        }
        this.touched.set(poolId, {
            pool: pool === undefined ? undefined : cloneDeep(pool),
            providers: providers === undefined ? undefined : [...providers],
            positions,
        });
    }

    touchedPools(): string[] {
        return [...this.touched.keys()];
    }

    // Restores in place so components holding the state reference see the rollback.
    rollback(): void {
        const state = this.state;
        for (const [poolId, backup] of this.touched) {
            for (const provider of state.providerIndex[poolId] ?? []) {
                delete state.positions[getPositionId(poolId, provider)];
            }
            if (backup.pool) state.pools[poolId] = backup.pool;
            else delete state.pools[poolId];
            if (backup.providers) state.providerIndex[poolId] = backup.providers;
            else delete state.providerIndex[poolId];
            for (const position of backup.positions) {
                state.positions[position._id] = position;
            }
        }
        state.protocolFees = this.protocolFees;
        state.breaker = this.breaker;
        state.paused = this.paused;
        state.feeRecipient = this.feeRecipient;
    }
}
