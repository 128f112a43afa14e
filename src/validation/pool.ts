import config from '../config.js';
import { EngineError, EngineErrorCode } from '../errors.js';
import logger from '../logger.js';
import { RouteType, SwapDirection } from '../transactions/pool/pool-interfaces.js';
import { parseBigInt } from '../utils/bigint.js';
import validate from './index.js';

const routeTypes: string[] = Object.values(RouteType);
const swapDirections: string[] = Object.values(SwapDirection);

/**
 * Validates a listed asset id: upper-case letters, digits and dashes, no dash at either end
 */
export const validateAssetId = (value: unknown, field = 'assetId'): value is string => {
    if (!validate.string(value, config.assetIdMaxLength, config.assetIdMinLength, config.assetIdAllowedChars.replace('-', ''), '-')) {
        logger.warn(`[pool-validation] Invalid ${field}: ${String(value)}.`);
        return false;
    }
    return true;
};

export const validateAccountId = (value: unknown): value is string => {
    if (!validate.string(value, config.accountIdMaxLength, 1)) {
        logger.warn(`[pool-validation] Invalid account id: ${String(value)}.`);
        return false;
    }
    return true;
};

export const validateRouteType = (value: unknown): value is RouteType => {
    if (typeof value !== 'string' || !routeTypes.includes(value)) {
        logger.warn(`[pool-validation] Invalid routeType: ${String(value)}. Expected one of ${routeTypes.join(', ')}.`);
        return false;
    }
    return true;
};

export const validateSwapDirection = (value: unknown): value is SwapDirection => {
    if (typeof value !== 'string' || !swapDirections.includes(value)) {
        logger.warn(`[pool-validation] Invalid direction: ${String(value)}. Expected one of ${swapDirections.join(', ')}.`);
        return false;
    }
    return true;
};

/**
 * Deadline is unix seconds; absent or 0 means no deadline. Expiry and horizon are checked against engine time.
 */
export const validateDeadlineField = (value: unknown): value is number | undefined => {
    if (value === undefined) return true;
    if (!validate.integer(value, true, false)) {
        logger.warn(`[pool-validation] Invalid deadline: ${String(value)}.`);
        return false;
    }
    return true;
};

/**
 * Slippage bound in basis points, 0 to 10000 inclusive
 */
export const validateSlippageBps = (value: unknown): value is number => {
    if (!validate.integer(value, true, false, 10000)) {
        logger.warn(`[pool-validation] Invalid maxSlippageBps: ${String(value)}.`);
        return false;
    }
    return true;
};

/**
 * Narrowing versions of the checks above for payloads that already passed validateTx
 */
export function parseRouteType(value: unknown): RouteType {
    if (!validateRouteType(value)) {
        throw new EngineError(EngineErrorCode.INVALID_INPUT, `Unknown route type ${String(value)}`);
    }
    return value;
}

export function parseSwapDirection(value: unknown): SwapDirection {
    if (!validateSwapDirection(value)) {
        throw new EngineError(EngineErrorCode.INVALID_INPUT, `Unknown swap direction ${String(value)}`);
    }
    return value;
}

export function parseAmount(value: unknown, field: string): bigint {
    const amount = parseBigInt(value);
    if (amount === null) {
        throw new EngineError(EngineErrorCode.INVALID_INPUT, `${field} must be an integer amount`, { field });
    }
    return amount;
}

export function parseOptionalAmount(value: unknown, field: string): bigint | undefined {
    return value === undefined ? undefined : parseAmount(value, field);
}

export function parseAssetId(value: unknown, field = 'assetId'): string {
    if (!validateAssetId(value, field)) {
        throw new EngineError(EngineErrorCode.INVALID_INPUT, `Invalid ${field}`, { field });
    }
    return value;
}

export function parseAccountId(value: unknown): string {
    if (!validateAccountId(value)) {
        throw new EngineError(EngineErrorCode.INVALID_INPUT, 'Invalid account id');
    }
    return value;
}

export function parseSlippageBps(value: unknown): number {
    if (!validateSlippageBps(value)) {
        throw new EngineError(EngineErrorCode.INVALID_INPUT, 'maxSlippageBps must be between 0 and 10000');
    }
    return value;
}

export function parseDeadline(value: unknown): number | undefined {
    if (value === undefined) return undefined;
    if (!validate.integer(value, true, false)) {
        throw new EngineError(EngineErrorCode.INVALID_INPUT, 'Invalid deadline');
    }
    return value;
}
