import type { HybridLiquidityEngine } from '../engine.js';
import { isEngineError } from '../errors.js';
import logger from '../logger.js';
import { JsonValue, serializeBigInts } from '../utils/bigint.js';
import * as engineAdmin from './admin/engine-admin.js';
import * as breakerReset from './breaker/breaker-reset.js';
import * as feeCollect from './fees/fee-collect.js';
import * as poolAddLiquidity from './pool/pool-add-liquidity.js';
import * as poolCreate from './pool/pool-create.js';
import * as poolRemoveLiquidity from './pool/pool-remove-liquidity.js';
import * as poolRouter from './pool/pool-router.js';
import * as poolSwap from './pool/pool-swap.js';
import { TransactionPayload, TransactionType } from './types.js';

// Define the base transaction interface
export interface Transaction {
    type: TransactionType;
    sender: string;
    data: TransactionPayload;
    id?: string; // Unique transaction ID, derived by the engine when absent
}

export interface TransactionResult {
    success: boolean;
    error?: string;
    code?: string;
    result?: JsonValue;
}

// Define transaction handler interface
interface TransactionHandler {
    validate: (data: TransactionPayload, sender: string) => { valid: boolean; error?: string };
    process: (engine: HybridLiquidityEngine, data: TransactionPayload, sender: string, id?: string) => unknown;
}

const transactionHandlers: { [key in TransactionType]: TransactionHandler } = {
    [TransactionType.POOL_CREATE]: { validate: poolCreate.validateTx, process: poolCreate.processTx },
    [TransactionType.POOL_ADD_LIQUIDITY]: { validate: poolAddLiquidity.validateTx, process: poolAddLiquidity.processTx },
    [TransactionType.POOL_REMOVE_LIQUIDITY]: { validate: poolRemoveLiquidity.validateTx, process: poolRemoveLiquidity.processTx },
    [TransactionType.POOL_SWAP]: { validate: poolSwap.validateTx, process: poolSwap.processTx },
    [TransactionType.SMART_SWAP]: { validate: poolRouter.validateTx, process: poolRouter.processTx },
    [TransactionType.FEE_COLLECT]: { validate: feeCollect.validateTx, process: feeCollect.processTx },
    [TransactionType.BREAKER_RESET]: { validate: breakerReset.validateTx, process: breakerReset.processTx },
    [TransactionType.ENGINE_PAUSE]: { validate: engineAdmin.validateTx, process: engineAdmin.processPauseTx },
    [TransactionType.ENGINE_UNPAUSE]: { validate: engineAdmin.validateTx, process: engineAdmin.processUnpauseTx },
    [TransactionType.ENGINE_SET_FEE_RECIPIENT]: { validate: engineAdmin.validateFeeRecipientTx, process: engineAdmin.processFeeRecipientTx },
};

export function isTransactionType(value: unknown): value is TransactionType {
    return typeof value === 'number' && Object.prototype.hasOwnProperty.call(transactionHandlers, value);
}

/**
 * Validates and applies one transaction against the engine. Engine failures
 * come back as `{ success: false, error, code }`; anything else is rethrown.
 */
export function processTransaction(engine: HybridLiquidityEngine, tx: Transaction): TransactionResult {
    const txHandler = transactionHandlers[tx.type];
    if (!txHandler) {
        logger.warn(`[transactions] No handler for transaction type ${tx.type}`);
        return { success: false, error: `unknown transaction type ${tx.type}`, code: 'INVALID_INPUT' };
    }

    const validation = txHandler.validate(tx.data, tx.sender);
    if (!validation.valid) {
        logger.debug(`[transactions] Transaction ${tx.id ?? '(unnamed)'} of type ${TransactionType[tx.type]} rejected: ${validation.error}`);
        return { success: false, error: validation.error ?? 'invalid transaction', code: 'INVALID_INPUT' };
    }

    try {
        const result = txHandler.process(engine, tx.data, tx.sender, tx.id);
        return { success: true, result: serializeBigInts(result) };
    } catch (error) {
        if (!isEngineError(error)) throw error;
        logger.warn(`[transactions] ${TransactionType[tx.type]} by ${tx.sender} failed with ${error.code}: ${error.message}`);
        return { success: false, error: error.message, code: error.code };
    }
}

export default { processTransaction, isTransactionType };
