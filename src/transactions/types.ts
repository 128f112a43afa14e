export enum TransactionType {
    // Pool Transactions
    POOL_CREATE = 16,
    POOL_ADD_LIQUIDITY = 17,
    POOL_REMOVE_LIQUIDITY = 18,
    POOL_SWAP = 19,
    SMART_SWAP = 40,

    // Fees and circuit breaker
    FEE_COLLECT = 41,
    BREAKER_RESET = 42,

    // Engine administration
    ENGINE_PAUSE = 43,
    ENGINE_UNPAUSE = 44,
    ENGINE_SET_FEE_RECIPIENT = 45,
}

// Raw transaction data as it arrives over the wire; each handler narrows it.
export type TransactionPayload = Record<string, unknown>;
