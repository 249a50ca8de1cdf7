/**
 * Policy Lifecycle Orchestrator
 *
 * Entry point for every state-changing ledger call. Validates input,
 * authorizes the caller, serializes work per policy, drives the store and
 * payout engine, books money movements and publishes events once the
 * operation has committed.
 *
 * Money movement discipline: the pool is debited and the policy committed
 * BEFORE the transfer is attempted. A rejected transfer restores the
 * policy, credits the pool back and surfaces as TransferFailedError.
 *
 * Events raised under a policy lock are published after the lock is
 * released, so listeners may call back into the lifecycle.
 */

import { AuthorizationPolicy } from '../auth/authorize.js';
import { KeyedMutex } from '../concurrency/KeyedMutex.js';
import {
    isPolicyLedgerError,
    PolicyLedgerError,
    ResourceError,
    StateError,
    TransferFailedError,
    ValidationError
} from '../errors/ledgerErrors.js';
import { DomainEventBus } from '../events/eventBus.js';
import { LedgerEvent, PayoutReason } from '../events/events.js';
import {
    Clock,
    FundsTransferGateway,
    systemClock,
    TransferReceipt,
    TransferRequest,
    transferReference
} from '../funding/transferGateway.js';
import { JournalEntry, LedgerAccounting, LedgerTotals } from '../ledger/accounting.js';
import { PooledBalance } from '../ledger/pooledBalance.js';
import { getComponentLogger } from '../logging/logger.js';
import { DEFAULT_PAYOUT_THRESHOLD_MINUTES, quotePayout } from '../payout/payoutEngine.js';
import { PayoutTier, PayoutTierTable } from '../payout/tierTable.js';
import {
    computeReportedDelay,
    FlightStatus,
    isActive,
    Policy,
    PolicyId
} from '../policy/policy.js';
import { PolicyStore } from '../policy/policyStore.js';
import {
    AccountIdSchema,
    AmountSchema,
    CreatePolicyInputSchema,
    FlightNumberSchema,
    FlightStatusUpdateSchema,
    PolicyIdSchema
} from '../validation/schema.js';
import { validate } from '../validation/zod-middleware.js';

const logger = getComponentLogger('PolicyLifecycle');

export interface PolicyLifecycleDeps {
    store: PolicyStore;
    tiers: PayoutTierTable;
    pool: PooledBalance;
    accounting: LedgerAccounting;
    events: DomainEventBus;
    authorization: AuthorizationPolicy;
    transfers: FundsTransferGateway;
    clock?: Clock;
    locks?: KeyedMutex<PolicyId>;
}

export interface PolicyLifecycleOptions {
    payoutThresholdMinutes?: number;
    /** Share of the premium returned on cancellation, 0-100. */
    cancellationRefundPercent?: number;
    /** Seconds after scheduled departure before a policy may be expired. */
    claimWindowSeconds?: number;
}

export type SettlementStatus = 'SETTLED' | 'DEFERRED' | 'NOT_ELIGIBLE';

export interface FlightStatusOutcome {
    readonly policyId: PolicyId;
    readonly flightStatus: FlightStatus;
    readonly delayMinutes: number;
    readonly settlement: SettlementStatus;
    readonly payout: bigint;
}

export type FlightBatchResult =
    | { readonly policyId: PolicyId; readonly ok: true; readonly outcome: FlightStatusOutcome }
    | { readonly policyId: PolicyId; readonly ok: false; readonly error: PolicyLedgerError };

interface Settlement {
    readonly amount: bigint;
    readonly event: LedgerEvent;
}

/** Result of locked work plus the events it still has to publish. */
interface Committed<T> {
    readonly value: T;
    readonly events: readonly LedgerEvent[];
    readonly at: number;
}

export class PolicyLifecycle {
    private readonly store: PolicyStore;
    private readonly tiers: PayoutTierTable;
    private readonly pool: PooledBalance;
    private readonly accounting: LedgerAccounting;
    private readonly events: DomainEventBus;
    private readonly authorization: AuthorizationPolicy;
    private readonly transfers: FundsTransferGateway;
    private readonly clock: Clock;
    private readonly locks: KeyedMutex<PolicyId>;

    private readonly thresholdMinutes: number;
    private readonly refundPercent: bigint;
    private readonly claimWindowSeconds: number;
    private withdrawalCount = 0;

    constructor(deps: PolicyLifecycleDeps, options: PolicyLifecycleOptions = {}) {
        this.store = deps.store;
        this.tiers = deps.tiers;
        this.pool = deps.pool;
        this.accounting = deps.accounting;
        this.events = deps.events;
        this.authorization = deps.authorization;
        this.transfers = deps.transfers;
        this.clock = deps.clock ?? systemClock;
        this.locks = deps.locks ?? new KeyedMutex<PolicyId>();

        const refundPercent = options.cancellationRefundPercent ?? 90;
        if (!Number.isInteger(refundPercent) || refundPercent < 0 || refundPercent > 100) {
            throw new Error(`cancellationRefundPercent must be an integer 0-100, got ${refundPercent}`);
        }
        this.thresholdMinutes = options.payoutThresholdMinutes ?? DEFAULT_PAYOUT_THRESHOLD_MINUTES;
        this.refundPercent = BigInt(refundPercent);
        this.claimWindowSeconds = options.claimWindowSeconds ?? 24 * 60 * 60;
    }

    // ----------------------------------------------------------------------
    // Policy operations
    // ----------------------------------------------------------------------

    async createPolicy(
        holder: string,
        flightNumber: string,
        scheduledDeparture: number,
        maxPayout: bigint,
        premiumPaid: bigint
    ): Promise<PolicyId> {
        const input = validate(
            CreatePolicyInputSchema,
            { holder, flightNumber, scheduledDeparture, maxPayout, premiumPaid },
            'PolicyLifecycle:createPolicy'
        );

        if (input.premiumPaid <= 0n) {
            throw new ValidationError('INVALID_PREMIUM', 'Premium must be greater than zero');
        }
        const now = this.clock();
        if (input.scheduledDeparture <= now) {
            throw new ValidationError(
                'INVALID_SCHEDULE',
                `Scheduled departure ${input.scheduledDeparture} is not after ${now}`
            );
        }
        if (input.maxPayout < 2n * input.premiumPaid) {
            throw new ValidationError(
                'INSUFFICIENT_COVERAGE_RATIO',
                'Maximum payout must be at least twice the premium'
            );
        }

        const policy = this.store.insert({
            holder: input.holder,
            flightNumber: input.flightNumber,
            scheduledDeparture: input.scheduledDeparture,
            premium: input.premiumPaid,
            maxPayout: input.maxPayout,
            createdAt: now
        });
        this.pool.credit(policy.premium);
        this.accounting.recordPremium(policy.policyId, policy.holder, policy.premium, now);

        logger.info({
            policyId: policy.policyId,
            holder: policy.holder,
            flightNumber: policy.flightNumber,
            premium: policy.premium.toString()
        }, 'Policy created');

        await this.events.publish({
            type: 'PolicyCreated',
            policyId: policy.policyId,
            holder: policy.holder,
            flightNumber: policy.flightNumber
        }, now);

        return policy.policyId;
    }

    /**
     * Records an authority flight report and settles automatically once the
     * delay crosses the threshold. A settlement blocked by an underfunded
     * pool is reported as DEFERRED; the status update itself stands.
     */
    async updateFlightStatus(
        policyId: PolicyId,
        flightStatus: FlightStatus,
        actualDeparture: number,
        caller: string
    ): Promise<FlightStatusOutcome> {
        const id = validate(PolicyIdSchema, policyId, 'PolicyLifecycle:updateFlightStatus');
        const report = validate(
            FlightStatusUpdateSchema,
            { flightStatus, actualDeparture, caller },
            'PolicyLifecycle:updateFlightStatus'
        );
        this.authorization.require({ caller: report.caller, capability: 'flight:report' });

        const committed = await this.locks.runExclusive(id, () =>
            this.applyFlightStatus(id, report.flightStatus, report.actualDeparture)
        );
        return this.publishCommitted(committed);
    }

    /**
     * Applies one flight report to every Active policy on the flight, in
     * index order. Policies that are no longer Active once their lock is
     * held are skipped. Per-policy rejections are collected, not thrown.
     */
    async updateFlightStatusByFlight(
        flightNumber: string,
        flightStatus: FlightStatus,
        actualDeparture: number,
        caller: string
    ): Promise<FlightBatchResult[]> {
        const flight = validate(FlightNumberSchema, flightNumber, 'PolicyLifecycle:updateFlightStatusByFlight');
        const report = validate(
            FlightStatusUpdateSchema,
            { flightStatus, actualDeparture, caller },
            'PolicyLifecycle:updateFlightStatusByFlight'
        );
        this.authorization.require({ caller: report.caller, capability: 'flight:report' });

        const results: FlightBatchResult[] = [];
        for (const id of this.store.listByFlight(flight)) {
            try {
                const committed = await this.locks.runExclusive(id, async () => {
                    const policy = this.store.get(id);
                    if (!policy || !isActive(policy)) return null;
                    return this.applyFlightStatus(id, report.flightStatus, report.actualDeparture);
                });
                if (committed === null) continue;

                const outcome = await this.publishCommitted(committed);
                results.push({ policyId: id, ok: true, outcome });
            } catch (err: unknown) {
                if (!isPolicyLedgerError(err)) throw err;
                logger.error({ policyId: id, flightNumber: flight, code: err.code }, 'Flight report rejected for policy');
                results.push({ policyId: id, ok: false, error: err });
            }
        }

        logger.info({
            flightNumber: flight,
            flightStatus: report.flightStatus,
            applied: results.filter(r => r.ok).length,
            rejected: results.filter(r => !r.ok).length
        }, 'Flight report applied');

        return results;
    }

    async processPayout(policyId: PolicyId, caller: string): Promise<bigint> {
        const id = validate(PolicyIdSchema, policyId, 'PolicyLifecycle:processPayout');
        const who = validate(AccountIdSchema, caller, 'PolicyLifecycle:processPayout');

        const committed = await this.locks.runExclusive(id, async (): Promise<Committed<bigint>> => {
            const policy = this.store.require(id);
            this.authorization.require({ caller: who, capability: 'payout:claim', resourceHolder: policy.holder });

            if (policy.payoutProcessed) {
                throw new StateError('ALREADY_PAID', `Policy ${id} has already been paid`, id);
            }
            if (!isActive(policy)) {
                throw new StateError('POLICY_NOT_ACTIVE', `Policy ${id} is ${policy.status}`, id);
            }
            if (policy.delayMinutes < this.thresholdMinutes) {
                throw new StateError(
                    'DELAY_BELOW_THRESHOLD',
                    `Delay of ${policy.delayMinutes} minutes is below ${this.thresholdMinutes}`,
                    id
                );
            }

            const now = this.clock();
            const settlement = await this.settle(policy, now, policy);
            return { value: settlement.amount, events: [settlement.event], at: now };
        });
        return this.publishCommitted(committed);
    }

    /**
     * Cancels before departure and refunds the configured share of the
     * premium. The retained fee stays in the pool and is not tracked apart.
     */
    async cancelPolicy(policyId: PolicyId, caller: string): Promise<bigint> {
        const id = validate(PolicyIdSchema, policyId, 'PolicyLifecycle:cancelPolicy');
        const who = validate(AccountIdSchema, caller, 'PolicyLifecycle:cancelPolicy');

        const committed = await this.locks.runExclusive(id, async (): Promise<Committed<bigint>> => {
            const policy = this.store.require(id);
            this.authorization.require({ caller: who, capability: 'policy:cancel', resourceHolder: policy.holder });

            if (!isActive(policy)) {
                throw new StateError('POLICY_NOT_ACTIVE', `Policy ${id} is ${policy.status}`, id);
            }
            const now = this.clock();
            if (now >= policy.scheduledDeparture) {
                throw new StateError(
                    'DEPARTURE_ALREADY_PASSED',
                    `Policy ${id} can no longer be cancelled: departure was ${policy.scheduledDeparture}`,
                    id
                );
            }

            const refund = (policy.premium * this.refundPercent) / 100n;
            if (refund > 0n) {
                this.pool.debit(refund);
            }
            this.store.update(id, { status: 'Cancelled' }, now);

            if (refund > 0n) {
                await this.transferOrCompensate(
                    { to: policy.holder, amount: refund, reference: transferReference('refund', id) },
                    () => {
                        this.store.restore(policy);
                        this.pool.credit(refund);
                    }
                );
                this.accounting.recordRefund(id, policy.holder, refund, now);
            }

            logger.info({ policyId: id, refund: refund.toString(), cancelledBy: who }, 'Policy cancelled');

            return { value: refund, events: [{ type: 'PolicyCancelled', policyId: id, refund }], at: now };
        });
        return this.publishCommitted(committed);
    }

    /**
     * Closes a policy whose claim window has elapsed without an eligible
     * delay. The premium stays in the pool.
     */
    async expirePolicy(policyId: PolicyId, caller: string): Promise<void> {
        const id = validate(PolicyIdSchema, policyId, 'PolicyLifecycle:expirePolicy');
        const who = validate(AccountIdSchema, caller, 'PolicyLifecycle:expirePolicy');

        const committed = await this.locks.runExclusive(id, async (): Promise<Committed<void>> => {
            const policy = this.store.require(id);
            this.authorization.require({ caller: who, capability: 'policy:expire', resourceHolder: policy.holder });

            if (!isActive(policy)) {
                throw new StateError('POLICY_NOT_ACTIVE', `Policy ${id} is ${policy.status}`, id);
            }
            const now = this.clock();
            const closesAt = policy.scheduledDeparture + this.claimWindowSeconds;
            if (now < closesAt) {
                throw new StateError('DEPARTURE_NOT_REACHED', `Policy ${id} claim window is open until ${closesAt}`, id);
            }
            if (policy.delayMinutes >= this.thresholdMinutes) {
                throw new StateError('PAYOUT_PENDING', `Policy ${id} is eligible for payout and cannot expire`, id);
            }

            this.store.update(id, { status: 'Expired' }, now);
            logger.info({ policyId: id }, 'Policy expired');

            return { value: undefined, events: [{ type: 'PolicyExpired', policyId: id }], at: now };
        });
        await this.publishCommitted(committed);
    }

    // ----------------------------------------------------------------------
    // Administration
    // ----------------------------------------------------------------------

    async addTier(minDelay: number, maxDelay: number, multiplier: number, caller: string): Promise<number> {
        const who = validate(AccountIdSchema, caller, 'PolicyLifecycle:addTier');
        this.authorization.require({ caller: who, capability: 'tier:append' });

        const index = this.tiers.append({ minDelay, maxDelay, multiplier });
        logger.info({ index, minDelay, maxDelay, multiplier }, 'Payout tier appended');

        await this.events.publish({ type: 'PayoutTierAdded', index, minDelay, maxDelay, multiplier }, this.clock());
        return index;
    }

    async depositFunds(amount: bigint, caller: string): Promise<bigint> {
        const who = validate(AccountIdSchema, caller, 'PolicyLifecycle:depositFunds');
        this.authorization.require({ caller: who, capability: 'pool:deposit' });
        const value = PolicyLifecycle.positiveAmount(amount, 'PolicyLifecycle:depositFunds');

        const now = this.clock();
        const balance = this.pool.credit(value);
        this.accounting.recordDeposit(who, value, now);
        logger.info({ amount: value.toString(), balance: balance.toString() }, 'Pool funded');

        await this.events.publish({ type: 'FundsDeposited', amount: value }, now);
        return balance;
    }

    async withdrawExcess(amount: bigint, caller: string): Promise<bigint> {
        const who = validate(AccountIdSchema, caller, 'PolicyLifecycle:withdrawExcess');
        this.authorization.require({ caller: who, capability: 'pool:withdraw' });
        const value = PolicyLifecycle.positiveAmount(amount, 'PolicyLifecycle:withdrawExcess');

        const now = this.clock();
        this.pool.debit(value);
        this.withdrawalCount += 1;
        await this.transferOrCompensate(
            { to: who, amount: value, reference: transferReference('withdrawal', this.withdrawalCount) },
            () => {
                this.pool.credit(value);
            }
        );
        this.accounting.recordWithdrawal(who, value, now);

        const balance = this.pool.current();
        logger.info({ amount: value.toString(), balance: balance.toString() }, 'Excess funds withdrawn');

        await this.events.publish({ type: 'FundsWithdrawn', amount: value, to: who }, now);
        return balance;
    }

    // ----------------------------------------------------------------------
    // Queries
    // ----------------------------------------------------------------------

    getPolicy(policyId: PolicyId): Policy | null {
        return this.store.get(policyId);
    }

    getPoliciesByHolder(holder: string): readonly PolicyId[] {
        return this.store.listByHolder(holder);
    }

    getPoliciesByFlight(flightNumber: string): readonly PolicyId[] {
        return this.store.listByFlight(flightNumber);
    }

    getPoolBalance(): bigint {
        return this.pool.current();
    }

    getTotals(): LedgerTotals {
        return this.accounting.totals();
    }

    getTiers(): readonly PayoutTier[] {
        return this.tiers.list();
    }

    getJournal(): readonly JournalEntry[] {
        return this.accounting.entries();
    }

    // ----------------------------------------------------------------------
    // Internals (callers hold the policy lock)
    // ----------------------------------------------------------------------

    private async applyFlightStatus(
        id: PolicyId,
        flightStatus: FlightStatus,
        actualDeparture: number
    ): Promise<Committed<FlightStatusOutcome>> {
        const before = this.store.require(id);
        if (!isActive(before)) {
            throw new StateError('POLICY_NOT_ACTIVE', `Policy ${id} is ${before.status}`, id);
        }

        const now = this.clock();
        const reported = computeReportedDelay(flightStatus, before.scheduledDeparture, actualDeparture);
        const delayMinutes = reported === null ? before.delayMinutes : Math.max(before.delayMinutes, reported);

        const updated = this.store.update(id, {
            flightStatus,
            actualDeparture: actualDeparture !== 0 ? actualDeparture : before.actualDeparture,
            delayMinutes
        }, now);

        const pending: LedgerEvent[] = [{ type: 'FlightStatusUpdated', policyId: id, flightStatus, delayMinutes }];
        let settlement: SettlementStatus = 'NOT_ELIGIBLE';
        let payout = 0n;

        if (delayMinutes >= this.thresholdMinutes && !updated.payoutProcessed) {
            try {
                const settled = await this.settle(updated, now, before);
                pending.push(settled.event);
                settlement = 'SETTLED';
                payout = settled.amount;
            } catch (err: unknown) {
                if (!(err instanceof ResourceError)) {
                    if (!(err instanceof TransferFailedError)) {
                        this.store.restore(before);
                    }
                    throw err;
                }
                logger.warn({
                    policyId: id,
                    required: err.required.toString(),
                    available: err.available.toString()
                }, 'Automatic settlement deferred: pool underfunded');
                settlement = 'DEFERRED';
            }
        }

        logger.info({ policyId: id, flightStatus, delayMinutes, settlement }, 'Flight status updated');

        return {
            value: { policyId: id, flightStatus, delayMinutes, settlement, payout },
            events: pending,
            at: now
        };
    }

    private async publishCommitted<T>(committed: Committed<T>): Promise<T> {
        for (const event of committed.events) {
            await this.events.publish(event, committed.at);
        }
        return committed.value;
    }

    /**
     * Shared settlement path. `rollbackTo` is the record restored if the
     * transfer fails, so the whole calling operation is undone.
     */
    private async settle(policy: Policy, now: number, rollbackTo: Policy): Promise<Settlement> {
        const quote = quotePayout(
            policy.premium,
            policy.maxPayout,
            policy.delayMinutes,
            this.tiers.list(),
            this.thresholdMinutes
        );
        const amount = quote.amount;
        const reason: PayoutReason = policy.flightStatus === 'Cancelled' ? 'Flight Cancelled' : 'Flight Delayed';

        if (amount > 0n) {
            this.pool.debit(amount);
        }
        this.store.update(policy.policyId, {
            payoutProcessed: true,
            status: 'Claimed',
            payoutAmount: amount
        }, now);

        if (amount > 0n) {
            await this.transferOrCompensate(
                { to: policy.holder, amount, reference: transferReference('payout', policy.policyId) },
                () => {
                    this.store.restore(rollbackTo);
                    this.pool.credit(amount);
                }
            );
            this.accounting.recordPayout(policy.policyId, policy.holder, amount, now);
        }

        logger.info({
            policyId: policy.policyId,
            amount: amount.toString(),
            capped: quote.capped,
            delayMinutes: policy.delayMinutes,
            reason
        }, 'Payout settled');

        return { amount, event: { type: 'PayoutTriggered', policyId: policy.policyId, amount, reason } };
    }

    private async transferOrCompensate(
        request: TransferRequest,
        compensate: () => void
    ): Promise<TransferReceipt> {
        try {
            return await this.transfers.transfer(request);
        } catch (err: unknown) {
            let compensated = false;
            try {
                compensate();
                compensated = true;
            } catch (compensationError: unknown) {
                logger.fatal({
                    reference: request.reference,
                    error: compensationError instanceof Error ? compensationError.message : String(compensationError)
                }, 'Compensation failed: ledger and transfer rail disagree, manual reconciliation required');
            }

            logger.fatal({
                reference: request.reference,
                to: request.to,
                amount: request.amount.toString(),
                compensated,
                error: err instanceof Error ? err.message : String(err)
            }, 'Transfer failed after ledger commit');

            throw new TransferFailedError(request.reference, request.amount, compensated, err);
        }
    }

    private static positiveAmount(amount: bigint, context: string): bigint {
        const value = validate(AmountSchema, amount, context, 'INVALID_AMOUNT');
        if (value <= 0n) {
            throw new ValidationError('INVALID_AMOUNT', `Amount must be positive, got ${value.toString()}`);
        }
        return value;
    }
}
