import { EngineError, EngineErrorCode } from '../errors.js';
import logger from '../logger.js';

export interface ExecutionLease {
    readonly operation: string;
    release(): void;
}

/**
 * Single-writer lock for the whole engine. A lease is taken at the start of
 * every mutating call and released in `finally`; a second acquire while one is
 * held means the call re-entered the engine.
 */
export class ExecutionGuard {
    private current: string | null = null;

    get busy(): boolean {
        return this.current !== null;
    }

    acquire(operation: string): ExecutionLease {
        if (this.current !== null) {
            logger.warn(`[execution-guard] ${operation} attempted while ${this.current} is in progress`);
            throw new EngineError(EngineErrorCode.REENTRANT_CALL, `Cannot start ${operation} while ${this.current} is in progress`, {
                operation,
                inProgress: this.current,
            });
        }
        this.current = operation;
        let released = false;
        return {
            operation,
            release: () => {
                if (released) return;
                released = true;
                this.current = null;
            },
        };
    }

    run<T>(operation: string, fn: () => T): T {
        const lease = this.acquire(operation);
        try {
            return fn();
        } finally {
            lease.release();
        }
    }
}
