export { PolicyLifecycle } from './lifecycle/PolicyLifecycle.js';
export type {
    FlightBatchResult,
    FlightStatusOutcome,
    PolicyLifecycleDeps,
    PolicyLifecycleOptions,
    SettlementStatus
} from './lifecycle/PolicyLifecycle.js';

export { createLedger } from './bootstrap/startup.js';
export type { Ledger, LedgerDependencies } from './bootstrap/startup.js';
export { loadLedgerConfig, DEFAULT_PAYOUT_TIERS } from './bootstrap/config/ledger-config.js';
export type { LedgerConfig } from './bootstrap/config/ledger-config.js';
export { loadDatabaseConfig } from './bootstrap/config/db-config.js';
export { ConfigurationError } from './bootstrap/config-guard.js';

export type { Policy, PolicyId, PolicyStatus, FlightStatus } from './policy/policy.js';
export { MAX_DELAY_MINUTES } from './policy/policy.js';
export { InMemoryPolicyStore } from './policy/policyStore.js';
export type { PolicyStore } from './policy/policyStore.js';

export { PayoutTierTable, findTier } from './payout/tierTable.js';
export type { PayoutTier } from './payout/tierTable.js';
export { computePayout, capPayout, quotePayout, DEFAULT_PAYOUT_THRESHOLD_MINUTES } from './payout/payoutEngine.js';

export { PooledBalance } from './ledger/pooledBalance.js';
export { LedgerAccounting } from './ledger/accounting.js';
export type { JournalEntry, LedgerTotals } from './ledger/accounting.js';

export { AuthorizationPolicy } from './auth/authorize.js';
export type { Capability } from './auth/capabilities.js';

export { DomainEventBus } from './events/eventBus.js';
export type { LedgerEvent, PublishedEvent } from './events/events.js';
export { PolicyEventOutbox } from './events/PolicyEventOutbox.js';

export type { FundsTransferGateway, TransferRequest, TransferReceipt, Clock } from './funding/transferGateway.js';
export { LoggedTransferGateway } from './funding/loggedTransferGateway.js';

export * from './errors/ledgerErrors.js';
