import { NextFunction, Request, Response } from 'express';
import { createModuleLogger } from '../lib/logger';
import { AppError, InsufficientFundsError, RequestValidationError } from '../utils/errors';

const log = createModuleLogger('http');

export const notFoundHandler = (req: Request, res: Response): void => {
    res.status(404).json({ status: 'error', code: 'NOT_FOUND', message: `Route ${req.method} ${req.path} not found` });
};

// Express recognises error middleware by its four parameters.
export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof AppError) {
        if (err.statusCode >= 500) log.error({ err, path: req.path }, err.message);
        else log.info({ code: err.code, path: req.path }, err.message);

        res.status(err.statusCode).json({
            status: 'error',
            code: err.code,
            message: err.message,
            retryable: err.retryable,
            ...(err instanceof InsufficientFundsError ? { data: { balance: err.balance, requested: err.requested } } : {}),
            ...(err instanceof RequestValidationError ? { details: err.details } : {}),
        });
        return;
    }

    if (err instanceof SyntaxError) {
        res.status(400).json({ status: 'error', code: 'INVALID_JSON', message: 'Malformed JSON body' });
        return;
    }

    log.error({ err, path: req.path }, 'Unhandled error');
    res.status(500).json({ status: 'error', code: 'INTERNAL_ERROR', message: 'Internal Server Error' });
};
