/**
 * Monotonic Policy ID Sequence
 *
 * Hands out positive integer policy IDs in strictly increasing order.
 * IDs are never reused, even when the policy that held one is cancelled.
 */

import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('PolicyIdSequence');

/**
 * Error thrown when the sequence can no longer produce a safe integer.
 */
export class SequenceExhaustedError extends Error {
    readonly code = 'SEQUENCE_EXHAUSTED';
    readonly statusCode = 503;

    constructor(public readonly lastIssued: number) {
        super(`Policy ID sequence exhausted after ${lastIssued}`);
        this.name = 'SequenceExhaustedError';
    }
}

export class PolicyIdSequence {
    private lastIssued: number;

    /**
     * @param startAfter - last ID already issued (0 for a fresh ledger)
     */
    constructor(startAfter = 0) {
        if (!Number.isSafeInteger(startAfter) || startAfter < 0) {
            throw new Error(`Sequence start must be a non-negative safe integer, got ${startAfter}`);
        }
        this.lastIssued = startAfter;
    }

    public next(): number {
        if (this.lastIssued >= Number.MAX_SAFE_INTEGER) {
            logger.fatal({ lastIssued: this.lastIssued }, 'Policy ID sequence exhausted');
            throw new SequenceExhaustedError(this.lastIssued);
        }
        this.lastIssued += 1;
        return this.lastIssued;
    }

    /**
     * Last issued ID, 0 if none.
     */
    public current(): number {
        return this.lastIssued;
    }
}
