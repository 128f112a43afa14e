import { Request, Response } from 'express';

import { EngineError, ErrorKind } from '../../errors.js';
import logger from '../../logger.js';
import { parseBigInt, serializeBigInts } from '../../utils/bigint.js';

const STATUS_BY_KIND: Record<ErrorKind, number> = {
    InvalidInput: 400,
    NotFound: 404,
    AlreadyExists: 409,
    Unauthorized: 403,
    Paused: 503,
    DeadlineExpired: 422,
    InsufficientLiquidity: 422,
    InsufficientBalance: 422,
    SlippageExceeded: 422,
    CircuitBreakerTriggered: 422,
    TransferFailed: 422,
    CooldownActive: 429,
};

function queryString(req: Request, name: string): string | undefined {
    const value = req.query[name];
    return typeof value === 'string' ? value : undefined;
}

/**
 * Get pagination parameters from request query
 * @param req Express request object
 * @returns Object with limit, skip, and page properties
 */
export const getPagination = (req: Request) => {
    const limit = Math.min(parseInt(queryString(req, 'limit') ?? '', 10) || 10, 100);
    const offset = parseInt(queryString(req, 'offset') ?? '', 10) || 0;
    return {
        limit,
        skip: offset,
        page: Math.floor(offset / limit) + 1,
    };
};

export const getQueryParam = queryString;

export const getQueryAmount = (req: Request, name: string): bigint | null => parseBigInt(queryString(req, name));

/**
 * Sends a JSON body with every bigint written as a decimal string
 */
export const sendJson = (res: Response, body: unknown, status = 200): void => {
    res.status(status).json(serializeBigInts(body));
};

export const sendEngineError = (res: Response, error: EngineError): void => {
    res.status(STATUS_BY_KIND[error.kind]).json({ success: false, error: error.message, code: error.code, kind: error.kind });
};

export const sendServerError = (res: Response, context: string, error: unknown): void => {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`[http] ${context}: ${message}`);
    res.status(500).json({ success: false, error: context });
};
