/**
 * In-process stand-ins for the ledger's external collaborators.
 */

import pg from 'pg';
import { AuthorizationPolicy } from '../../libs/auth/authorize.js';
import { KeyedMutex } from '../../libs/concurrency/KeyedMutex.js';
import { Queryable } from '../../libs/db/pool.js';
import { isPolicyLedgerError, LedgerErrorCode } from '../../libs/errors/ledgerErrors.js';
import { DomainEventBus } from '../../libs/events/eventBus.js';
import { PublishedEvent } from '../../libs/events/events.js';
import { FundsTransferGateway, TransferReceipt, TransferRequest } from '../../libs/funding/transferGateway.js';
import { LedgerAccounting } from '../../libs/ledger/accounting.js';
import { PooledBalance } from '../../libs/ledger/pooledBalance.js';
import { PolicyLifecycle, PolicyLifecycleOptions } from '../../libs/lifecycle/PolicyLifecycle.js';
import { PayoutTier, PayoutTierTable } from '../../libs/payout/tierTable.js';
import { PolicyId } from '../../libs/policy/policy.js';
import { InMemoryPolicyStore } from '../../libs/policy/policyStore.js';
import { DEFAULT_PAYOUT_TIERS } from '../../libs/bootstrap/config/ledger-config.js';

export const AUTHORITY = 'authority-ops';
export const HOLDER = 'holder-alice';
export const OTHER_HOLDER = 'holder-bob';
export const STRANGER = 'stranger-mallory';

/** 2023-11-14T22:13:20Z */
export const START = 1_700_000_000;
/** Two hours after START. */
export const DEPARTURE = START + 7200;

export class FakeClock {
    constructor(public now: number = START) { }

    readonly read = (): number => this.now;

    advance(seconds: number): void {
        this.now += seconds;
    }
}

/**
 * Records successful transfers. `failures` makes the next N calls reject;
 * `hold()` parks calls until `releaseAll()`.
 */
export class RecordingTransferGateway implements FundsTransferGateway {
    readonly completed: TransferRequest[] = [];
    readonly attempted: TransferRequest[] = [];
    failures = 0;

    private holding = false;
    private parked: Array<() => void> = [];

    async transfer(request: TransferRequest): Promise<TransferReceipt> {
        this.attempted.push(request);
        if (this.holding) {
            await new Promise<void>(resolve => {
                this.parked.push(resolve);
            });
        }
        if (this.failures > 0) {
            this.failures -= 1;
            throw new Error('rail unavailable');
        }
        this.completed.push(request);
        return { reference: request.reference, railReference: `rail-${this.completed.length}` };
    }

    hold(): void {
        this.holding = true;
    }

    releaseAll(): void {
        this.holding = false;
        const parked = this.parked;
        this.parked = [];
        for (const resume of parked) resume();
    }

    parkedCount(): number {
        return this.parked.length;
    }
}

export interface RecordedQuery {
    text: string;
    params: unknown[];
}

/**
 * Queryable that remembers every call. Inserts whose first two parameters
 * were already seen together report rowCount 0, like a unique key with
 * ON CONFLICT DO NOTHING.
 */
export class FakeQueryable implements Queryable {
    readonly calls: RecordedQuery[] = [];
    failWith: Error | null = null;
    private readonly seenKeys = new Set<string>();

    async query<T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params: unknown[] = []): Promise<pg.QueryResult<T>> {
        this.calls.push({ text, params });
        if (this.failWith) {
            throw this.failWith;
        }

        const key = JSON.stringify(params.slice(0, 2));
        const duplicate = this.seenKeys.has(key);
        this.seenKeys.add(key);

        const rows: T[] = [];
        return {
            command: 'INSERT',
            rowCount: duplicate ? 0 : 1,
            oid: 0,
            fields: [],
            rows
        };
    }
}

export interface LedgerHarness {
    lifecycle: PolicyLifecycle;
    clock: FakeClock;
    transfers: RecordingTransferGateway;
    store: InMemoryPolicyStore;
    pool: PooledBalance;
    accounting: LedgerAccounting;
    tiers: PayoutTierTable;
    bus: DomainEventBus;
    published: PublishedEvent[];
}

export interface HarnessOptions extends PolicyLifecycleOptions {
    initialPool?: bigint;
    tiers?: readonly PayoutTier[];
    locks?: KeyedMutex<PolicyId>;
}

export function buildLedger(options: HarnessOptions = {}): LedgerHarness {
    const { initialPool = 0n, tiers = DEFAULT_PAYOUT_TIERS, locks, ...lifecycleOptions } = options;

    const clock = new FakeClock();
    const transfers = new RecordingTransferGateway();
    const store = new InMemoryPolicyStore();
    const pool = new PooledBalance(initialPool);
    const accounting = new LedgerAccounting();
    const tierTable = new PayoutTierTable(tiers);
    const bus = new DomainEventBus();

    const published: PublishedEvent[] = [];
    bus.subscribe(event => {
        published.push(event);
    });

    const lifecycle = new PolicyLifecycle({
        store,
        tiers: tierTable,
        pool,
        accounting,
        events: bus,
        authorization: new AuthorizationPolicy(AUTHORITY),
        transfers,
        clock: clock.read,
        locks
    }, lifecycleOptions);

    return { lifecycle, clock, transfers, store, pool, accounting, tiers: tierTable, bus, published };
}

/**
 * Creates the standard test policy: premium 1000, cap 10000, departing at DEPARTURE.
 */
export async function createStandardPolicy(
    lifecycle: PolicyLifecycle,
    overrides: { holder?: string; flightNumber?: string; maxPayout?: bigint; premium?: bigint } = {}
): Promise<number> {
    return lifecycle.createPolicy(
        overrides.holder ?? HOLDER,
        overrides.flightNumber ?? 'FC101',
        DEPARTURE,
        overrides.maxPayout ?? 10_000n,
        overrides.premium ?? 1_000n
    );
}

/** Actual departure `minutes` after DEPARTURE. */
export function departedAfter(minutes: number): number {
    return DEPARTURE + minutes * 60;
}

/** assert.throws/rejects predicate matching a ledger error code. */
export function hasCode(code: LedgerErrorCode): (err: unknown) => boolean {
    return (err: unknown) => isPolicyLedgerError(err) && err.code === code;
}
