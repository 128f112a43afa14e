import type { HybridLiquidityEngine } from '../../engine.js';
import { validateAccountId } from '../../validation/pool.js';
import { OperationContext } from '../context.js';
import { TransactionPayload } from '../types.js';
import { CircuitBreakerStatus } from './circuit-breaker.js';

export function validateTx(_data: TransactionPayload, sender: string): { valid: boolean; error?: string } {
    if (!validateAccountId(sender)) {
        return { valid: false, error: 'invalid sender' };
    }
    return { valid: true };
}

// Anyone may reset once the cooldown since the previous reset has elapsed.
export function resetCircuitBreaker(ctx: OperationContext): CircuitBreakerStatus {
    const wasActive = ctx.breaker.active;
    ctx.breaker.reset(ctx.now);
    ctx.emit('breaker', 'reset', { wasActive, resetAt: ctx.now });
    return ctx.breaker.status();
}

export function processTx(engine: HybridLiquidityEngine, _data: TransactionPayload, sender: string, transactionId?: string): CircuitBreakerStatus {
    return engine.resetCircuitBreaker(sender, transactionId);
}
