import type { HybridLiquidityEngine } from '../../engine.js';
import { EngineError, EngineErrorCode } from '../../errors.js';
import { parseAssetId, validateAccountId, validateAssetId } from '../../validation/pool.js';
import { OperationContext } from '../context.js';
import { TransactionPayload } from '../types.js';

export interface FeeCollectResult {
    assetId: string;
    amount: bigint;
    recipient: string;
}

export function validateTx(data: TransactionPayload, sender: string): { valid: boolean; error?: string } {
    if (!validateAccountId(sender)) {
        return { valid: false, error: 'invalid sender' };
    }
    if (!validateAssetId(data.assetId)) {
        return { valid: false, error: 'invalid assetId' };
    }
    return { valid: true };
}

/**
 * Pays the protocol fees held for one asset out to the fee recipient.
 * Only the recipient or the owner may trigger it.
 */
export function collectFees(ctx: OperationContext, assetId: string): FeeCollectResult {
    const recipient = ctx.state.feeRecipient;
    if (ctx.caller !== recipient && ctx.caller !== ctx.config.owner) {
        throw new EngineError(EngineErrorCode.UNAUTHORIZED, `${ctx.caller} may not collect protocol fees`, { caller: ctx.caller });
    }
    const amount = ctx.fees.take(assetId);
    if (amount === 0n) {
        throw new EngineError(EngineErrorCode.NO_FEES_TO_COLLECT, `No protocol fees held in ${assetId}`, { assetId });
    }

    ctx.settle([{ assetId, from: ctx.config.engineAddress, to: recipient, amount }]);
    ctx.emit('fees', 'collected', { assetId, amount, recipient });
    return { assetId, amount, recipient };
}

export function processTx(engine: HybridLiquidityEngine, data: TransactionPayload, sender: string, transactionId?: string): FeeCollectResult {
    return engine.collectFees(sender, parseAssetId(data.assetId), transactionId);
}
