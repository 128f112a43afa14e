import { EngineConfig } from '../../config.js';
import { EngineError, EngineErrorCode } from '../../errors.js';
import logger from '../../logger.js';
import { CircuitBreakerState, EngineState } from '../../state.js';

export interface CircuitBreakerStatus extends CircuitBreakerState {
    thresholdBps: number;
    cooldownPeriod: number;
    resettableAt: number;
}

/**
 * One breaker for the whole engine. Price impact is measured per pool, but a
 * trip halts every pool until someone resets it after the cooldown.
 */
export class CircuitBreaker {
    constructor(
        private readonly state: EngineState,
        private readonly config: EngineConfig
    ) {}

    get active(): boolean {
        return this.state.breaker.active;
    }

    status(): CircuitBreakerStatus {
        const breaker = this.state.breaker;
        return {
            ...breaker,
            thresholdBps: this.config.circuitBreakerThresholdBps,
            cooldownPeriod: this.config.circuitBreakerCooldown,
            resettableAt: breaker.lastResetTime + this.config.circuitBreakerCooldown,
        };
    }

    /**
     * Throws CIRCUIT_BREAKER_TRIGGERED when the impact is over the threshold.
     * The engine flips the flag after rolling the failed call back.
     */
    check(poolId: string, priceImpactBps: bigint): void {
        if (priceImpactBps <= BigInt(this.config.circuitBreakerThresholdBps)) return;
        throw new EngineError(
            EngineErrorCode.CIRCUIT_BREAKER_TRIGGERED,
            `Price impact of ${priceImpactBps} bps on ${poolId} exceeds the ${this.config.circuitBreakerThresholdBps} bps threshold`,
            { poolId, priceImpactBps: priceImpactBps.toString() }
        );
    }

    trip(now: number, poolId?: string): void {
        this.state.breaker.active = true;
        this.state.breaker.trippedAt = now;
        this.state.breaker.trippedPool = poolId;
        logger.warn(`[circuit-breaker] Tripped${poolId ? ` by ${poolId}` : ''} at ${now}; trading halted`);
    }

    reset(now: number): void {
        const resettableAt = this.state.breaker.lastResetTime + this.config.circuitBreakerCooldown;
        if (now < resettableAt) {
            throw new EngineError(EngineErrorCode.COOLDOWN_ACTIVE, `Circuit breaker cannot be reset before ${resettableAt}`, {
                resettableAt: String(resettableAt),
            });
        }
        this.state.breaker = { active: false, lastResetTime: now };
        logger.info(`[circuit-breaker] Reset at ${now}`);
    }
}
