/**
 * Unit Tests: Ledger assembly
 *
 * @see libs/bootstrap/startup.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createLedger } from '../../libs/bootstrap/startup.js';
import { loadLedgerConfig } from '../../libs/bootstrap/config/ledger-config.js';
import { LoggedTransferGateway } from '../../libs/funding/loggedTransferGateway.js';
import { AUTHORITY, DEPARTURE, departedAfter, FakeClock, FakeQueryable, HOLDER, RecordingTransferGateway } from '../helpers/fakes.js';

describe('createLedger', () => {
    const config = loadLedgerConfig({
        LEDGER_AUTHORITY_ID: AUTHORITY,
        LEDGER_INITIAL_POOL: '5000',
        LEDGER_CANCELLATION_REFUND_PERCENT: '50'
    });

    it('builds a ledger from configuration', () => {
        const ledger = createLedger(config, { transfers: new RecordingTransferGateway() });

        assert.strictEqual(ledger.lifecycle.getPoolBalance(), 5_000n);
        assert.strictEqual(ledger.lifecycle.getTiers().length, 3);
        assert.strictEqual(ledger.outbox, null);
    });

    it('applies configured options', async () => {
        const clock = new FakeClock();
        const ledger = createLedger(config, { transfers: new RecordingTransferGateway(), clock: clock.read });

        const policyId = await ledger.lifecycle.createPolicy(HOLDER, 'FC101', DEPARTURE, 10_000n, 1_000n);
        assert.strictEqual(await ledger.lifecycle.cancelPolicy(policyId, HOLDER), 500n);
        assert.strictEqual(ledger.accounting.totals().refundsIssued, 500n);
    });

    it('keeps instances independent', async () => {
        const clock = new FakeClock();
        const first = createLedger(config, { transfers: new RecordingTransferGateway(), clock: clock.read });
        const second = createLedger(config, { transfers: new RecordingTransferGateway(), clock: clock.read });

        await first.lifecycle.createPolicy(HOLDER, 'FC101', DEPARTURE, 10_000n, 1_000n);

        assert.strictEqual(second.lifecycle.getPolicy(1), null);
        assert.strictEqual(second.lifecycle.getPoolBalance(), 5_000n);
    });

    it('writes every event to the outbox until shutdown', async () => {
        const clock = new FakeClock();
        const client = new FakeQueryable();
        const ledger = createLedger(config, {
            transfers: new RecordingTransferGateway(),
            clock: clock.read,
            outboxClient: client
        });
        assert.ok(ledger.outbox);

        await ledger.lifecycle.createPolicy(HOLDER, 'FC101', DEPARTURE, 10_000n, 1_000n);
        await ledger.lifecycle.updateFlightStatus(1, 'Delayed', departedAfter(150), AUTHORITY);

        assert.deepStrictEqual(
            client.calls.map(call => call.params[2]),
            ['PolicyCreated', 'FlightStatusUpdated', 'PayoutTriggered']
        );

        ledger.shutdown();
        await ledger.lifecycle.depositFunds(1n, AUTHORITY);
        assert.strictEqual(client.calls.length, 3);
    });

    it('keeps events from a restarted ledger in the same outbox', async () => {
        const clock = new FakeClock();
        const client = new FakeQueryable();
        const firstRun = createLedger(config, { transfers: new RecordingTransferGateway(), clock: clock.read, outboxClient: client });
        await firstRun.lifecycle.createPolicy(HOLDER, 'FC101', DEPARTURE, 10_000n, 1_000n);
        firstRun.shutdown();

        const secondRun = createLedger(config, { transfers: new RecordingTransferGateway(), clock: clock.read, outboxClient: client });
        await secondRun.lifecycle.createPolicy(HOLDER, 'FC101', DEPARTURE, 10_000n, 1_000n);

        assert.ok(firstRun.outbox && secondRun.outbox);
        assert.notStrictEqual(firstRun.outbox.runId, secondRun.outbox.runId);
        assert.deepStrictEqual(
            client.calls.map(call => call.params.slice(0, 3)),
            [
                [firstRun.outbox.runId, 1, 'PolicyCreated'],
                [secondRun.outbox.runId, 1, 'PolicyCreated']
            ]
        );
        assert.strictEqual(await secondRun.outbox.append({ type: 'PolicyExpired', policyId: 1, sequence: 1, occurredAt: 0 }), false);
    });
});

describe('LoggedTransferGateway', () => {
    it('acknowledges with the request reference', async () => {
        const receipt = await new LoggedTransferGateway().transfer({ to: HOLDER, amount: 10n, reference: 'payout:3' });
        assert.deepStrictEqual(receipt, { reference: 'payout:3' });
    });
});
