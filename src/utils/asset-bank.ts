import { EngineError, EngineErrorCode } from '../errors.js';
import logger from '../logger.js';

/**
 * Token custody the engine moves funds through. A transfer either fully
 * happens and returns true, or is rejected and returns false.
 */
export interface AssetBank {
    balanceOf(assetId: string, account: string): bigint;
    transfer(assetId: string, from: string, to: string, amount: bigint): boolean;
}

export interface TransferInstruction {
    assetId: string;
    from: string;
    to: string;
    amount: bigint;
}

/**
 * Balance book kept in memory, keyed by account then asset.
 */
export class InMemoryAssetBank implements AssetBank {
    private balances: Record<string, Record<string, bigint>> = {};
    private frozen = new Set<string>();

    balanceOf(assetId: string, account: string): bigint {
        return this.balances[account]?.[assetId] ?? 0n;
    }

    mint(account: string, assetId: string, amount: bigint): void {
        this.adjustBalance(account, assetId, amount);
    }

    // Frozen assets reject every transfer, the way a paused token contract would
    freezeAsset(assetId: string): void {
        this.frozen.add(assetId);
    }

    unfreezeAsset(assetId: string): void {
        this.frozen.delete(assetId);
    }

    transfer(assetId: string, from: string, to: string, amount: bigint): boolean {
        if (amount < 0n || this.frozen.has(assetId)) {
            logger.warn(`[asset-bank] Transfer of ${amount} ${assetId} from ${from} to ${to} rejected`);
            return false;
        }
        const currentBalance = this.balanceOf(assetId, from);
        if (currentBalance < amount) {
            logger.warn(`[asset-bank] Insufficient balance for ${from}: has ${currentBalance} ${assetId}, needs ${amount}`);
            return false;
        }
        this.adjustBalance(from, assetId, -amount);
        this.adjustBalance(to, assetId, amount);
        logger.trace(`[asset-bank] Moved ${amount} ${assetId} from ${from} to ${to}`);
        return true;
    }

    private adjustBalance(account: string, assetId: string, amount: bigint): void {
        const accountBalances = this.balances[account] ?? (this.balances[account] = {});
        accountBalances[assetId] = (accountBalances[assetId] ?? 0n) + amount;
    }
}

function reverseTransfers(bank: AssetBank, completed: TransferInstruction[]): void {
    for (const done of [...completed].reverse()) {
        if (!bank.transfer(done.assetId, done.to, done.from, done.amount)) {
            logger.fatal(`[asset-bank] CRITICAL: Could not reverse transfer of ${done.amount} ${done.assetId} from ${done.to} back to ${done.from}`);
        }
    }
}

/**
 * Executes transfers in order. If one is rejected or throws, every transfer
 * already made is reversed before the failure propagates.
 */
export function settleTransfers(bank: AssetBank, instructions: TransferInstruction[]): void {
    const completed: TransferInstruction[] = [];
    for (const instruction of instructions) {
        if (instruction.amount === 0n) continue;
        let accepted: boolean;
        try {
            accepted = bank.transfer(instruction.assetId, instruction.from, instruction.to, instruction.amount);
        } catch (error) {
            reverseTransfers(bank, completed);
            throw error;
        }
        if (accepted) {
            completed.push(instruction);
            continue;
        }

        reverseTransfers(bank, completed);
        throw new EngineError(
            EngineErrorCode.TRANSFER_FAILED,
            `Transfer of ${instruction.amount} ${instruction.assetId} from ${instruction.from} to ${instruction.to} was rejected`,
            { assetId: instruction.assetId, from: instruction.from, to: instruction.to }
        );
    }
}
