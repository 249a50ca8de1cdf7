import { getComponentLogger } from "../logging/logger.js";
import { ResourceError, ValidationError } from "../errors/ledgerErrors.js";

const logger = getComponentLogger("PooledBalance");

/**
 * Pooled Balance
 * The single global account every premium credits and every payout,
 * refund or withdrawal debits. Zero-overdraft: a debit either covers in
 * full or leaves the balance untouched.
 */
export class PooledBalance {
    private balance: bigint;

    constructor(initial: bigint = 0n) {
        if (initial < 0n) {
            throw new Error("PooledBalance: initial balance cannot be negative");
        }
        this.balance = initial;
    }

    current(): bigint {
        return this.balance;
    }

    credit(amount: bigint): bigint {
        PooledBalance.ensurePositive(amount);
        this.balance += amount;
        return this.balance;
    }

    /**
     * Check-then-debit as one synchronous step, so no other settlement can
     * interleave between the check and the write.
     */
    debit(amount: bigint): bigint {
        PooledBalance.ensurePositive(amount);
        if (this.balance < amount) {
            logger.warn({
                available: this.balance.toString(),
                required: amount.toString()
            }, "Insufficient pooled balance");
            throw new ResourceError(amount, this.balance);
        }
        this.balance -= amount;
        return this.balance;
    }

    private static ensurePositive(amount: bigint): void {
        if (amount <= 0n) {
            throw new ValidationError("INVALID_AMOUNT", `Amount must be positive, got ${amount.toString()}`);
        }
    }
}
