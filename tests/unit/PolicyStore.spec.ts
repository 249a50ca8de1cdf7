import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { InMemoryPolicyStore } from '../../libs/policy/policyStore.js';
import { PolicyIdSequence } from '../../libs/id/PolicyIdSequence.js';
import { computeReportedDelay, MAX_DELAY_MINUTES, NewPolicy, PolicyPatch } from '../../libs/policy/policy.js';
import { StateError } from '../../libs/errors/ledgerErrors.js';

const base: NewPolicy = {
    holder: 'holder-alice',
    flightNumber: 'FC101',
    scheduledDeparture: 1_700_007_200,
    premium: 1_000n,
    maxPayout: 10_000n,
    createdAt: 1_700_000_000
};

describe('InMemoryPolicyStore', () => {
    let store: InMemoryPolicyStore;

    beforeEach(() => {
        store = new InMemoryPolicyStore();
    });

    it('inserts an Active record with default lifecycle fields', () => {
        const policy = store.insert(base);

        assert.strictEqual(policy.policyId, 1);
        assert.strictEqual(policy.status, 'Active');
        assert.strictEqual(policy.flightStatus, 'OnTime');
        assert.strictEqual(policy.actualDeparture, 0);
        assert.strictEqual(policy.delayMinutes, 0);
        assert.strictEqual(policy.payoutProcessed, false);
        assert.strictEqual(policy.payoutAmount, 0n);
        assert.strictEqual(policy.updatedAt, base.createdAt);
        assert.ok(Object.isFrozen(policy));
    });

    it('allocates strictly increasing IDs and reports the next one', () => {
        assert.strictEqual(store.nextId(), 1);
        store.insert(base);
        store.insert(base);
        assert.strictEqual(store.nextId(), 3);
        assert.strictEqual(store.size(), 2);
    });

    it('continues from a seeded sequence', () => {
        const seeded = new InMemoryPolicyStore(new PolicyIdSequence(41));
        assert.strictEqual(seeded.insert(base).policyId, 42);
    });

    it('indexes by holder and by flight in insertion order', () => {
        store.insert(base);
        store.insert({ ...base, flightNumber: 'FC202' });
        store.insert({ ...base, holder: 'holder-bob' });

        assert.deepStrictEqual(store.listByHolder('holder-alice'), [1, 2]);
        assert.deepStrictEqual(store.listByFlight('FC101'), [1, 3]);
        assert.deepStrictEqual(store.listByFlight('ZZ999'), []);
    });

    it('returns null or POLICY_NOT_FOUND for unknown IDs', () => {
        assert.strictEqual(store.get(7), null);
        assert.throws(
            () => store.require(7),
            (err: unknown) => err instanceof StateError && err.code === 'POLICY_NOT_FOUND' && err.statusCode === 404
        );
    });

    it('applies a patch as a new frozen record', () => {
        const before = store.insert(base);
        const after = store.update(1, { flightStatus: 'Delayed', delayMinutes: 150 }, 1_700_000_100);

        assert.strictEqual(after.delayMinutes, 150);
        assert.strictEqual(after.updatedAt, 1_700_000_100);
        assert.strictEqual(before.delayMinutes, 0);
        assert.ok(Object.isFrozen(after));
    });

    it('refuses to patch immutable fields', () => {
        store.insert(base);
        const sneaky: PolicyPatch & { premium: bigint } = { premium: 1n };
        assert.throws(() => store.update(1, sneaky, 1), /field premium is immutable/);
        assert.strictEqual(store.require(1).premium, 1_000n);
    });

    it('refuses to reset payoutProcessed', () => {
        store.insert(base);
        store.update(1, { payoutProcessed: true, status: 'Claimed' }, 2);
        assert.throws(() => store.update(1, { payoutProcessed: false }, 3), /cannot be reset/);
    });

    it('refuses to leave a terminal status', () => {
        store.insert(base);
        store.update(1, { status: 'Cancelled' }, 2);
        assert.throws(
            () => store.update(1, { status: 'Active' }, 3),
            (err: unknown) => err instanceof StateError && err.code === 'POLICY_NOT_ACTIVE'
        );
    });

    it('restores a snapshot verbatim', () => {
        const snapshot = store.insert(base);
        store.update(1, { payoutProcessed: true, status: 'Claimed', payoutAmount: 2_000n }, 5);

        store.restore(snapshot);
        assert.strictEqual(store.require(1), snapshot);
    });
});

describe('computeReportedDelay', () => {
    const scheduled = 1_700_007_200;

    it('floors whole minutes for a late departure', () => {
        assert.strictEqual(computeReportedDelay('Delayed', scheduled, scheduled + 150 * 60 + 59), 150);
    });

    it('uses the sentinel for a cancellation without a later departure', () => {
        assert.strictEqual(computeReportedDelay('Cancelled', scheduled, 0), MAX_DELAY_MINUTES);
        assert.strictEqual(computeReportedDelay('Cancelled', scheduled, scheduled), MAX_DELAY_MINUTES);
    });

    it('measures a cancellation that still reports a departure', () => {
        assert.strictEqual(computeReportedDelay('Cancelled', scheduled, scheduled + 30 * 60), 30);
    });

    it('carries no delay for other reports', () => {
        assert.strictEqual(computeReportedDelay('Delayed', scheduled, 0), null);
        assert.strictEqual(computeReportedDelay('OnTime', scheduled, scheduled + 9_000), null);
        assert.strictEqual(computeReportedDelay('Departed', scheduled, scheduled + 9_000), null);
    });
});
