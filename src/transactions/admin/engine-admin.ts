import type { HybridLiquidityEngine } from '../../engine.js';
import { EngineError, EngineErrorCode } from '../../errors.js';
import logger from '../../logger.js';
import { parseAccountId, validateAccountId } from '../../validation/pool.js';
import { OperationContext } from '../context.js';
import { TransactionPayload } from '../types.js';

export function validateTx(_data: TransactionPayload, sender: string): { valid: boolean; error?: string } {
    if (!validateAccountId(sender)) {
        return { valid: false, error: 'invalid sender' };
    }
    return { valid: true };
}

export function validateFeeRecipientTx(data: TransactionPayload, sender: string): { valid: boolean; error?: string } {
    if (!validateAccountId(sender) || !validateAccountId(data.recipient)) {
        return { valid: false, error: 'invalid account' };
    }
    return { valid: true };
}

function requireOwner(ctx: OperationContext, action: string): void {
    if (ctx.caller !== ctx.config.owner) {
        logger.warn(`[engine-admin] ${ctx.caller} attempted ${action} without owner rights`);
        throw new EngineError(EngineErrorCode.UNAUTHORIZED, `Only the engine owner may ${action}`, { caller: ctx.caller });
    }
}

export function setPaused(ctx: OperationContext, paused: boolean): boolean {
    requireOwner(ctx, paused ? 'pause the engine' : 'unpause the engine');
    if (ctx.state.paused !== paused) {
        ctx.state.paused = paused;
        ctx.emit('admin', paused ? 'paused' : 'unpaused', { owner: ctx.caller });
    }
    return ctx.state.paused;
}

export function setFeeRecipient(ctx: OperationContext, recipient: string): string {
    requireOwner(ctx, 'change the fee recipient');
    if (!validateAccountId(recipient)) {
        throw new EngineError(EngineErrorCode.INVALID_INPUT, `Invalid fee recipient ${recipient}`);
    }
    const previous = ctx.state.feeRecipient;
    ctx.state.feeRecipient = recipient;
    ctx.emit('admin', 'fee_recipient_changed', { previous, recipient });
    return recipient;
}

export function processPauseTx(engine: HybridLiquidityEngine, _data: TransactionPayload, sender: string, transactionId?: string): boolean {
    return engine.pause(sender, transactionId);
}

export function processUnpauseTx(engine: HybridLiquidityEngine, _data: TransactionPayload, sender: string, transactionId?: string): boolean {
    return engine.unpause(sender, transactionId);
}

export function processFeeRecipientTx(engine: HybridLiquidityEngine, data: TransactionPayload, sender: string, transactionId?: string): string {
    return engine.setFeeRecipient(sender, parseAccountId(data.recipient), transactionId);
}
