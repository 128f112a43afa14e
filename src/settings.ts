// Runtime settings sourced from environment variables

export const apiPort: number = process.env.API_PORT ? Number(process.env.API_PORT) : 3000;
export const logLevel: string = process.env.LOG_LEVEL || 'info';
export const mongoUrl: string = process.env.MONGO_URL || 'mongodb://localhost:27017';
export const mongoDb: string = process.env.MONGO_DB || 'hybrid_engine';
export const useMongoEvents: boolean = process.env.USE_MONGO_EVENTS === 'true';

export const engineOwner: string = process.env.ENGINE_OWNER || '';
export const feeRecipient: string = process.env.FEE_RECIPIENT || '';
export const nativeAssetId: string = process.env.NATIVE_ASSET || '';
export const utilityAssetId: string = process.env.UTILITY_ASSET || '';

export default {
    apiPort,
    logLevel,
    mongoUrl,
    mongoDb,
    useMongoEvents,
    engineOwner,
    feeRecipient,
    nativeAssetId,
    utilityAssetId,
};
