import { EngineState } from '../../state.js';

/**
 * Protocol fees per settlement asset, waiting to be collected.
 */
export class ProtocolFeeLedger {
    constructor(private readonly state: EngineState) {}

    accrue(assetId: string, amount: bigint): void {
        if (amount <= 0n) return;
        this.state.protocolFees[assetId] = this.balanceOf(assetId) + amount;
    }

    balanceOf(assetId: string): bigint {
        return this.state.protocolFees[assetId] ?? 0n;
    }

    // Zeroes the entry and hands back what it held
    take(assetId: string): bigint {
        const amount = this.balanceOf(assetId);
        delete this.state.protocolFees[assetId];
        return amount;
    }

    balances(): Record<string, bigint> {
        return { ...this.state.protocolFees };
    }
}
