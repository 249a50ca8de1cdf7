import { describe, it } from 'node:test';
import assert from 'node:assert';
import { REDACT_CENSOR, REDACT_KEYS } from '../../libs/logging/redactionConfig.js';
import pino from 'pino';
import { Writable } from 'stream';

describe('Log Redaction', () => {
    function captureLogger(lines: string[]) {
        const stream = new Writable({
            write(chunk: Buffer, _encoding, callback) {
                lines.push(chunk.toString());
                callback();
            }
        });

        return pino({
            base: null,
            timestamp: false,
            redact: {
                paths: REDACT_KEYS,
                censor: REDACT_CENSOR
            }
        }, stream);
    }

    it('should redact sensitive keys in objects', () => {
        const lines: string[] = [];
        captureLogger(lines).info({
            password: 'test-secret',
            iban: 'TEST-IBAN',
            nested: {
                secret: 'test-secret',
                other: 'safe'
            },
            visible: 'ok'
        }, 'test message');

        assert.strictEqual(lines.length, 1);
        assert.strictEqual(
            lines[0],
            '{"level":30,"password":"[REDACTED]","iban":"[REDACTED]","nested":{"secret":"[REDACTED]","other":"safe"},"visible":"ok","msg":"test message"}\n'
        );
    });

    it('leaves ledger fields readable', () => {
        const lines: string[] = [];
        captureLogger(lines).info({ policyId: 4, amount: '2000', reference: 'payout:4' }, 'Payout settled');

        assert.strictEqual(
            lines[0],
            '{"level":30,"policyId":4,"amount":"2000","reference":"payout:4","msg":"Payout settled"}\n'
        );
    });
});
