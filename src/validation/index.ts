import bigint from './bigint.js';
import integer from './integer.js';
import string from './string.js';

/**
 * Validation module interface
 */
export interface ValidationModule {
    integer: (value: unknown, canBeZero?: boolean, canBeNegative?: boolean, max?: number, min?: number) => value is number;
    string: (value: unknown, maxLength?: number, minLength?: number, allowedChars?: string, allowedCharsMiddle?: string) => value is string;
    bigint: (value: unknown, allowZero?: boolean, allowNegative?: boolean, minValue?: bigint) => boolean;
}

/**
 * Validation module with functions for validating different data types
 */
const validation: ValidationModule = {
    integer,
    string,
    bigint,
};

export default validation;
