export type ValidationCode =
    | 'ESTABLISHMENT_CLOSED'
    | 'STAFF_UNAVAILABLE'
    | 'SCHEDULE_BLOCKED'
    | 'TIME_CONFLICT'
    | 'SERVICE_MISMATCH'
    | 'INVALID_AMOUNT'
    | 'ALREADY_IN_QUEUE';

/**
 * Base class for errors that map onto a client-facing HTTP response.
 * `retryable` marks failures the caller may safely repeat.
 */
export class AppError extends Error {
    constructor(
        message: string,
        readonly statusCode: number,
        readonly code: string,
        readonly retryable: boolean = false,
    ) {
        super(message);
        this.name = new.target.name;
    }
}

/** Booking or request rejected for a reason the user can correct. */
export class ValidationError extends AppError {
    constructor(readonly reason: ValidationCode, message: string) {
        super(message, 400, reason);
    }
}

/** Illegal status transition. */
export class StateError extends AppError {
    constructor(message: string) {
        super(message, 409, 'INVALID_STATE');
    }
}

export class InsufficientFundsError extends AppError {
    constructor(readonly balance: number, readonly requested: number) {
        super(`Insufficient wallet balance: ${balance.toFixed(2)} available, ${requested.toFixed(2)} requested`, 402, 'INSUFFICIENT_FUNDS');
    }
}

/** Payment provider unreachable or timed out. */
export class ExternalServiceError extends AppError {
    constructor(readonly service: string, message: string, readonly originalError?: unknown) {
        super(`${service}: ${message}`, 502, 'EXTERNAL_SERVICE_ERROR', true);
    }
}

export class NotFoundError extends AppError {
    constructor(entity: string, id: string) {
        super(`${entity} ${id} not found`, 404, 'NOT_FOUND');
    }
}

export class ForbiddenError extends AppError {
    constructor(message = 'Not allowed') {
        super(message, 403, 'FORBIDDEN');
    }
}

/** A compare-and-set write lost a race; the whole batch was rolled back. */
export class ConcurrencyError extends AppError {
    constructor(message: string) {
        super(message, 409, 'CONCURRENT_MODIFICATION', true);
    }
}

/** Request body or query failed schema validation. */
export class RequestValidationError extends AppError {
    constructor(message: string, readonly details: { field: string; message: string }[] = []) {
        super(message, 400, 'INVALID_REQUEST');
    }
}

export class WebhookVerificationError extends AppError {
    constructor(message: string) {
        super(message, 400, 'INVALID_WEBHOOK');
    }
}
