const config = {
    engineName: 'Hybrid Liquidity Engine',
    engineAddress: 'hybrid-engine',
    owner: 'engine-owner',
    feeRecipient: 'fee-treasury',
    nativeAssetId: 'NATIVE',
    utilityAssetId: 'UTIL',
    assetIdAllowedChars: 'ABCDEFGHIJKLMNOPQRSTUVWXYZ1234567890-',
    assetIdMaxLength: 32,
    assetIdMinLength: 2,
    accountIdMaxLength: 64,
    swapFeeBps: 30, // 0.3% in basis points
    protocolFeeShareBps: 5000, // half of the swap fee goes to the protocol ledger
    circuitBreakerThresholdBps: 2000, // 20% price impact
    circuitBreakerCooldown: 3600, // seconds
    minimumLiquidity: '1000',
    maxDeadlineHorizon: 3600, // seconds
    volumeWindowSeconds: 86400,
    twapObservationLimit: 144,
    royaltyDeadlineSeconds: 300,
    eventJournalLimit: 1000,
    maxValue: '999999999999999999999999999999999999',
};

export type EngineConfig = typeof config;

/**
 * Merges per-engine overrides on top of the defaults.
 */
function read(overrides: Partial<EngineConfig> = {}): EngineConfig {
    const defined: Partial<EngineConfig> = {};
    for (const [key, value] of Object.entries(overrides)) {
        if (value !== undefined) Object.assign(defined, { [key]: value });
    }
    return { ...config, ...defined };
}

export default { ...config, read };
