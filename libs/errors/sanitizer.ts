import { logger } from '../logging/logger.js';
import crypto from 'crypto';

/**
 * Wraps errors raised by collaborators (database, transfer rails) in a
 * generic message with an incident ID for log correlation. The original
 * detail is logged once, at construction, and never returned to callers.
 */

export class LedgerSystemError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public readonly sqlState?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        public readonly category: 'SEC' | 'OPS' | 'FIN' = 'OPS',
        options?: { cause?: unknown; contextLabel?: string; sqlState?: string }
    ) {
        super(publicMessage);
        this.name = 'LedgerSystemError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.sqlState = options?.sqlState;
        this.cause = options?.cause;

        logger.error({
            incidentId: this.incidentId,
            category: this.category,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

function readStringField(err: object, field: 'message' | 'stack' | 'code'): string | undefined {
    const value: unknown = Reflect.get(err, field);
    return typeof value === 'string' ? value : undefined;
}

export const ErrorSanitizer = {
    /**
     * Catches and wraps any error into a sanitized LedgerSystemError.
     */
    sanitize: (err: unknown, contextLabel: string, category: 'SEC' | 'OPS' | 'FIN' = 'OPS'): LedgerSystemError => {
        if (err instanceof LedgerSystemError) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;
        let sqlState: string | undefined;

        if (typeof err === 'string') {
            originalErrorMessage = err;
        } else if (err && typeof err === 'object') {
            originalErrorMessage = readStringField(err, 'message') ?? String(err);
            originalErrorStack = readStringField(err, 'stack');
            sqlState = readStringField(err, 'code');
        } else {
            originalErrorMessage = String(err);
        }

        return new LedgerSystemError(
            `An internal ledger error occurred. Please contact support with ID: ${contextLabel}`,
            { originalError: originalErrorMessage, stack: originalErrorStack, context: contextLabel },
            category,
            { cause: err, contextLabel, sqlState }
        );
    }
};
