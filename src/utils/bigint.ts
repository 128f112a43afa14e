/**
 * Convert a value to BigInt, handling null, undefined, and string inputs
 */
export function toBigInt(value: string | bigint | number | null | undefined): bigint {
    if (value === null || value === undefined) return BigInt(0);
    if (typeof value === 'bigint') return value;
    if (typeof value === 'number') return BigInt(Math.floor(value));
    const trimmed = value.trim();
    if (trimmed.startsWith('-')) {
        return -BigInt(trimmed.slice(1).replace(/^0+/, '') || '0');
    }
    // Remove padding before converting to BigInt
    return BigInt(trimmed.replace(/^0+/, '') || '0');
}

/**
 * Like toBigInt, but returns null instead of throwing on malformed input.
 * Only plain base-10 integers are accepted.
 */
export function parseBigInt(value: unknown): bigint | null {
    if (typeof value === 'bigint') return value;
    if (typeof value === 'number') return Number.isSafeInteger(value) ? BigInt(value) : null;
    if (typeof value !== 'string' || !/^-?\d+$/.test(value.trim())) return null;
    return toBigInt(value);
}

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Recursively turns every bigint in a value into its decimal string so it can be sent as JSON.
 */
export function serializeBigInts(value: unknown): JsonValue {
    if (typeof value === 'bigint') return value.toString();
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
    if (Array.isArray(value)) return value.map(item => serializeBigInts(item));
    if (typeof value === 'object') {
        const result: { [key: string]: JsonValue } = {};
        for (const [key, entry] of Object.entries(value)) {
            if (entry !== undefined) result[key] = serializeBigInts(entry);
        }
        return result;
    }
    return String(value);
}

/**
 * Safely perform arithmetic with BigInt values
 */
export const BigIntMath = {
    // Basis-point share of a value, rounded down
    bps(value: bigint, basisPoints: number | bigint): bigint {
        return (value * BigInt(basisPoints)) / 10000n;
    },
};
