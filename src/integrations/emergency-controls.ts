import logger from '../logger.js';

/**
 * External pause authority. The engine asks it before every gated mutation
 * and never writes to it.
 */
export interface EmergencyControls {
    isContractPaused(address: string): boolean;
}

/**
 * In-process registry of paused contract addresses, keyed by guardian.
 * A contract stays paused while at least one guardian holds a pause on it.
 */
export class GuardianPauseRegistry implements EmergencyControls {
    private readonly guardians: Set<string>;
    private readonly holds = new Map<string, Set<string>>();

    constructor(guardians: string[]) {
        this.guardians = new Set(guardians);
    }

    isGuardian(account: string): boolean {
        return this.guardians.has(account);
    }

    pauseContract(guardian: string, address: string): void {
        this.requireGuardian(guardian);
        const holders = this.holds.get(address) ?? new Set<string>();
        holders.add(guardian);
        this.holds.set(address, holders);
        logger.warn(`[emergency-controls] ${guardian} paused ${address}`);
    }

    releaseContract(guardian: string, address: string): void {
        this.requireGuardian(guardian);
        const holders = this.holds.get(address);
        if (!holders) return;
        holders.delete(guardian);
        if (holders.size === 0) this.holds.delete(address);
        logger.info(`[emergency-controls] ${guardian} released ${address}`);
    }

    isContractPaused(address: string): boolean {
        return this.holds.has(address);
    }

    private requireGuardian(account: string): void {
        if (!this.guardians.has(account)) {
            throw new Error(`${account} is not a guardian`);
        }
    }
}
