import { AuthorizationPolicy } from "../auth/authorize.js";
import { KeyedMutex } from "../concurrency/KeyedMutex.js";
import { Queryable } from "../db/pool.js";
import { DomainEventBus } from "../events/eventBus.js";
import { PolicyEventOutbox } from "../events/PolicyEventOutbox.js";
import { Clock, FundsTransferGateway, systemClock } from "../funding/transferGateway.js";
import { LedgerAccounting } from "../ledger/accounting.js";
import { PooledBalance } from "../ledger/pooledBalance.js";
import { PolicyLifecycle } from "../lifecycle/PolicyLifecycle.js";
import { logger } from "../logging/logger.js";
import { PayoutTierTable } from "../payout/tierTable.js";
import { PolicyId } from "../policy/policy.js";
import { InMemoryPolicyStore, PolicyStore } from "../policy/policyStore.js";
import { LedgerConfig } from "./config/ledger-config.js";

export interface LedgerDependencies {
    transfers: FundsTransferGateway;
    clock?: Clock;
    store?: PolicyStore;
    /** Enables the event outbox when present. */
    outboxClient?: Queryable;
}

export interface Ledger {
    readonly lifecycle: PolicyLifecycle;
    readonly events: DomainEventBus;
    readonly accounting: LedgerAccounting;
    readonly outbox: PolicyEventOutbox | null;
    /** Detaches the outbox subscriber. */
    shutdown(): void;
}

/**
 * Wires one ledger instance from configuration. Every collaborator is
 * constructed here; nothing is shared across instances.
 */
export function createLedger(config: LedgerConfig, deps: LedgerDependencies): Ledger {
    const events = new DomainEventBus();
    const accounting = new LedgerAccounting();

    const lifecycle = new PolicyLifecycle({
        store: deps.store ?? new InMemoryPolicyStore(),
        tiers: new PayoutTierTable(config.payoutTiers),
        pool: new PooledBalance(config.initialPool),
        accounting,
        events,
        authorization: new AuthorizationPolicy(config.authorityId),
        transfers: deps.transfers,
        clock: deps.clock ?? systemClock,
        locks: new KeyedMutex<PolicyId>()
    }, {
        payoutThresholdMinutes: config.payoutThresholdMinutes,
        cancellationRefundPercent: config.cancellationRefundPercent,
        claimWindowSeconds: config.claimWindowSeconds
    });

    let outbox: PolicyEventOutbox | null = null;
    let unsubscribe: () => void = () => undefined;
    if (deps.outboxClient) {
        outbox = new PolicyEventOutbox(deps.outboxClient);
        unsubscribe = events.subscribe(outbox.listener());
    }

    logger.info({
        tiers: config.payoutTiers.length,
        payoutThresholdMinutes: config.payoutThresholdMinutes,
        initialPool: config.initialPool.toString(),
        outboxRunId: outbox?.runId ?? null
    }, "Ledger assembled");

    return {
        lifecycle,
        events,
        accounting,
        outbox,
        shutdown: () => {
            unsubscribe();
        }
    };
}
