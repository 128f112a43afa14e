export type ErrorKind =
    | 'InvalidInput'
    | 'NotFound'
    | 'AlreadyExists'
    | 'InsufficientLiquidity'
    | 'InsufficientBalance'
    | 'SlippageExceeded'
    | 'CircuitBreakerTriggered'
    | 'Paused'
    | 'DeadlineExpired'
    | 'Unauthorized'
    | 'TransferFailed'
    | 'CooldownActive';

export enum EngineErrorCode {
    INVALID_INPUT = 'INVALID_INPUT',
    POOL_NOT_FOUND = 'POOL_NOT_FOUND',
    POOL_EXISTS = 'POOL_EXISTS',
    INSUFFICIENT_LIQUIDITY = 'INSUFFICIENT_LIQUIDITY',
    INSUFFICIENT_BALANCE = 'INSUFFICIENT_BALANCE',
    SLIPPAGE_EXCEEDED = 'SLIPPAGE_EXCEEDED',
    CIRCUIT_BREAKER_TRIGGERED = 'CIRCUIT_BREAKER_TRIGGERED',
    SYSTEM_PAUSED = 'SYSTEM_PAUSED',
    DEADLINE_EXPIRED = 'DEADLINE_EXPIRED',
    UNAUTHORIZED = 'UNAUTHORIZED',
    REENTRANT_CALL = 'REENTRANT_CALL',
    TRANSFER_FAILED = 'TRANSFER_FAILED',
    NO_ROUTE_AVAILABLE = 'NO_ROUTE_AVAILABLE',
    NO_FEES_TO_COLLECT = 'NO_FEES_TO_COLLECT',
    COOLDOWN_ACTIVE = 'COOLDOWN_ACTIVE',
}

const ERROR_KINDS: Record<EngineErrorCode, ErrorKind> = {
    [EngineErrorCode.INVALID_INPUT]: 'InvalidInput',
    [EngineErrorCode.POOL_NOT_FOUND]: 'NotFound',
    [EngineErrorCode.POOL_EXISTS]: 'AlreadyExists',
    [EngineErrorCode.INSUFFICIENT_LIQUIDITY]: 'InsufficientLiquidity',
    [EngineErrorCode.INSUFFICIENT_BALANCE]: 'InsufficientBalance',
    [EngineErrorCode.SLIPPAGE_EXCEEDED]: 'SlippageExceeded',
    [EngineErrorCode.CIRCUIT_BREAKER_TRIGGERED]: 'CircuitBreakerTriggered',
    [EngineErrorCode.SYSTEM_PAUSED]: 'Paused',
    [EngineErrorCode.DEADLINE_EXPIRED]: 'DeadlineExpired',
    [EngineErrorCode.UNAUTHORIZED]: 'Unauthorized',
    [EngineErrorCode.REENTRANT_CALL]: 'Unauthorized',
    [EngineErrorCode.TRANSFER_FAILED]: 'TransferFailed',
    [EngineErrorCode.NO_ROUTE_AVAILABLE]: 'NotFound',
    [EngineErrorCode.NO_FEES_TO_COLLECT]: 'NotFound',
    [EngineErrorCode.COOLDOWN_ACTIVE]: 'CooldownActive',
};

/**
 * Error raised by every engine operation. Carries a stable code for callers
 * and the broader kind it belongs to.
 */
export class EngineError extends Error {
    public readonly code: EngineErrorCode;
    public readonly kind: ErrorKind;
    public readonly details?: Record<string, string>;

    constructor(code: EngineErrorCode, message: string, details?: Record<string, string>) {
        super(message);
        this.name = 'EngineError';
        this.code = code;
        this.kind = ERROR_KINDS[code];
        this.details = details;
    }
}

export function isEngineError(error: unknown, code?: EngineErrorCode): error is EngineError {
    return error instanceof EngineError && (code === undefined || error.code === code);
}
