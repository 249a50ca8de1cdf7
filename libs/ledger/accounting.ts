import crypto from "crypto";
import { getComponentLogger } from "../logging/logger.js";
import { PolicyId } from "../policy/policy.js";

const logger = getComponentLogger("LedgerAccounting");

export const GENESIS_HASH = "0".repeat(64);

export type JournalEntryType = "PREMIUM" | "PAYOUT" | "REFUND" | "DEPOSIT" | "WITHDRAWAL";

export interface JournalEntry {
    readonly sequence: number;
    readonly type: JournalEntryType;
    readonly amount: bigint;
    readonly policyId: PolicyId | null;
    readonly counterparty: string;
    readonly recordedAt: number;
    readonly integrity: {
        readonly prevHash: string;
        readonly hash: string;
    };
}

export interface LedgerTotals {
    readonly premiumsCollected: bigint;
    readonly payoutsProcessed: bigint;
    readonly refundsIssued: bigint;
}

export interface ChainVerification {
    valid: boolean;
    violationIndex?: number;
    reason?: string;
}

type JournalContent = Omit<JournalEntry, "integrity">;

function hashEntry(content: JournalContent, prevHash: string): string {
    const serialized = JSON.stringify({ ...content, amount: content.amount.toString() });
    return crypto.createHash("sha256").update(serialized + prevHash).digest("hex");
}

/**
 * Ledger Accounting
 * Append-only journal of committed money movements with running totals.
 * Each entry is hash-chained to its predecessor; totals only grow.
 */
export class LedgerAccounting {
    private readonly journal: JournalEntry[] = [];
    private premiumsCollected = 0n;
    private payoutsProcessed = 0n;
    private refundsIssued = 0n;

    recordPremium(policyId: PolicyId, holder: string, amount: bigint, at: number): JournalEntry {
        this.premiumsCollected += amount;
        return this.append("PREMIUM", amount, policyId, holder, at);
    }

    recordPayout(policyId: PolicyId, holder: string, amount: bigint, at: number): JournalEntry {
        this.payoutsProcessed += amount;
        return this.append("PAYOUT", amount, policyId, holder, at);
    }

    recordRefund(policyId: PolicyId, holder: string, amount: bigint, at: number): JournalEntry {
        this.refundsIssued += amount;
        return this.append("REFUND", amount, policyId, holder, at);
    }

    recordDeposit(from: string, amount: bigint, at: number): JournalEntry {
        return this.append("DEPOSIT", amount, null, from, at);
    }

    recordWithdrawal(to: string, amount: bigint, at: number): JournalEntry {
        return this.append("WITHDRAWAL", amount, null, to, at);
    }

    totals(): LedgerTotals {
        return Object.freeze({
            premiumsCollected: this.premiumsCollected,
            payoutsProcessed: this.payoutsProcessed,
            refundsIssued: this.refundsIssued
        });
    }

    entries(): readonly JournalEntry[] {
        return Object.freeze([...this.journal]);
    }

    /**
     * Re-derives every hash from genesis and reports the first break.
     */
    verifyChain(entries: readonly JournalEntry[] = this.journal): ChainVerification {
        let lastHash = GENESIS_HASH;

        for (const [i, entry] of entries.entries()) {
            if (entry.integrity.prevHash !== lastHash) {
                return {
                    valid: false,
                    violationIndex: i,
                    reason: `Chain broken at entry ${i}: prevHash mismatch. Expected ${lastHash}, found ${entry.integrity.prevHash}`
                };
            }

            const { integrity, ...content } = entry;
            const computed = hashEntry(content, integrity.prevHash);
            if (computed !== integrity.hash) {
                return {
                    valid: false,
                    violationIndex: i,
                    reason: `Integrity violation at entry ${i}: hash mismatch. Computed ${computed}, found ${integrity.hash}`
                };
            }

            lastHash = integrity.hash;
        }

        return { valid: true };
    }

    private append(
        type: JournalEntryType,
        amount: bigint,
        policyId: PolicyId | null,
        counterparty: string,
        recordedAt: number
    ): JournalEntry {
        const prevHash = this.journal.at(-1)?.integrity.hash ?? GENESIS_HASH;
        const content: JournalContent = {
            sequence: this.journal.length + 1,
            type,
            amount,
            policyId,
            counterparty,
            recordedAt
        };
        const hash = hashEntry(content, prevHash);
        const entry: JournalEntry = Object.freeze({ ...content, integrity: Object.freeze({ prevHash, hash }) });
        this.journal.push(entry);

        logger.debug({
            journalEntry: type,
            sequence: entry.sequence,
            policyId,
            amount: amount.toString(),
            integrityHash: hash.substring(0, 16) + "..."
        }, "Journal entry committed");

        return entry;
    }
}
