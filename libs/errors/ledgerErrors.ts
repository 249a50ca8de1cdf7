/**
 * Policy Ledger Error Taxonomy
 * Every rejection carries a machine-readable code and category so callers
 * can decide whether a retry makes sense without parsing messages.
 */

export type ErrorCategory =
    | 'VALIDATION'     // Bad input; rejected before any state change
    | 'AUTHORIZATION'  // Wrong caller; rejected, no state change
    | 'STATE'          // Policy state forbids the operation
    | 'RESOURCE'       // Pooled balance too low; retryable once funded
    | 'TRANSFER';      // Transfer failed after commit; commit compensated

export type ValidationErrorCode =
    | 'INVALID_PREMIUM'
    | 'INVALID_SCHEDULE'
    | 'INSUFFICIENT_COVERAGE_RATIO'
    | 'INVALID_AMOUNT'
    | 'INVALID_TIER'
    | 'INVALID_INPUT';

export type StateErrorCode =
    | 'POLICY_NOT_FOUND'
    | 'POLICY_NOT_ACTIVE'
    | 'ALREADY_PAID'
    | 'DELAY_BELOW_THRESHOLD'
    | 'DEPARTURE_ALREADY_PASSED'
    | 'DEPARTURE_NOT_REACHED'
    | 'PAYOUT_PENDING'
    | 'NO_PAYOUT_TIERS';

export type LedgerErrorCode =
    | ValidationErrorCode
    | StateErrorCode
    | 'UNAUTHORIZED'
    | 'INSUFFICIENT_POOL'
    | 'TRANSFER_FAILED';

export abstract class PolicyLedgerError extends Error {
    abstract readonly category: ErrorCategory;
    readonly code: LedgerErrorCode;
    readonly statusCode: number;

    protected constructor(code: LedgerErrorCode, message: string, statusCode: number) {
        super(message);
        this.code = code;
        this.statusCode = statusCode;
    }
}

export class ValidationError extends PolicyLedgerError {
    override readonly category = 'VALIDATION';

    constructor(code: ValidationErrorCode, message: string) {
        super(code, message, 400);
        this.name = 'ValidationError';
        Object.setPrototypeOf(this, ValidationError.prototype);
    }
}

export class AuthorizationError extends PolicyLedgerError {
    override readonly category = 'AUTHORIZATION';

    constructor(
        public readonly caller: string,
        public readonly capability: string,
        message?: string
    ) {
        super('UNAUTHORIZED', message ?? `Caller ${caller} lacks capability ${capability}`, 403);
        this.name = 'AuthorizationError';
        Object.setPrototypeOf(this, AuthorizationError.prototype);
    }
}

export class StateError extends PolicyLedgerError {
    override readonly category = 'STATE';

    constructor(
        code: StateErrorCode,
        message: string,
        public readonly policyId?: number
    ) {
        super(code, message, code === 'POLICY_NOT_FOUND' ? 404 : 409);
        this.name = 'StateError';
        Object.setPrototypeOf(this, StateError.prototype);
    }
}

export class ResourceError extends PolicyLedgerError {
    override readonly category = 'RESOURCE';

    constructor(
        public readonly required: bigint,
        public readonly available: bigint
    ) {
        super(
            'INSUFFICIENT_POOL',
            `Pooled balance ${available.toString()} cannot cover ${required.toString()}`,
            503
        );
        this.name = 'ResourceError';
        Object.setPrototypeOf(this, ResourceError.prototype);
    }
}

/**
 * Raised when a transfer fails after the ledger committed the movement.
 * `compensated` tells operators whether the commit was rolled back; when it
 * is false the ledger and the rail disagree and need manual reconciliation.
 */
export class TransferFailedError extends PolicyLedgerError {
    override readonly category = 'TRANSFER';
    public override cause?: unknown;

    constructor(
        public readonly reference: string,
        public readonly amount: bigint,
        public readonly compensated: boolean,
        cause: unknown
    ) {
        super(
            'TRANSFER_FAILED',
            `Transfer ${reference} of ${amount.toString()} failed${compensated ? '; ledger commit reverted' : ''}`,
            500
        );
        this.name = 'TransferFailedError';
        this.cause = cause;
        Object.setPrototypeOf(this, TransferFailedError.prototype);
    }
}

export function isPolicyLedgerError(err: unknown): err is PolicyLedgerError {
    return err instanceof PolicyLedgerError;
}
