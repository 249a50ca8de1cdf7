/**
 * Outbound value transfer rail. Implemented outside the ledger (wallet,
 * bank rail, chain client). The ledger commits before calling transfer()
 * and compensates if it rejects.
 */

export interface TransferRequest {
    readonly to: string;
    readonly amount: bigint;
    /** Stable per movement, e.g. "payout:42"; rails may use it for idempotency. */
    readonly reference: string;
}

export interface TransferReceipt {
    readonly reference: string;
    readonly railReference?: string;
}

export interface FundsTransferGateway {
    transfer(request: TransferRequest): Promise<TransferReceipt>;
}

/**
 * Current time in Unix seconds.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export function transferReference(kind: 'payout' | 'refund' | 'withdrawal', id: number | string): string {
    return `${kind}:${id}`;
}
