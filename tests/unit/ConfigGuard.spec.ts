import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ConfigGuard, ConfigurationError, GuardRule } from '../../libs/bootstrap/config-guard.js';

describe('ConfigGuard', () => {
    const rules: GuardRule[] = [
        { type: 'required', name: 'LEDGER_AUTHORITY_ID' },
        {
            type: 'forbidIf',
            name: 'LEDGER_DEBUG_TRANSFERS',
            when: (env) => env.NODE_ENV === 'production' && env.LEDGER_DEBUG_TRANSFERS === 'true',
            message: 'Debug transfers are forbidden in production'
        },
        {
            type: 'assert',
            check: (env) => env.LEDGER_REGION !== 'unknown',
            message: 'LEDGER_REGION must be known'
        }
    ];

    it('passes a satisfied environment', () => {
        assert.deepStrictEqual(ConfigGuard.evaluate(rules, { LEDGER_AUTHORITY_ID: 'authority-ops' }), []);
        assert.doesNotThrow(() => ConfigGuard.enforce(rules, { LEDGER_AUTHORITY_ID: 'authority-ops' }));
    });

    it('treats a blank required value as missing', () => {
        assert.deepStrictEqual(ConfigGuard.evaluate(rules, { LEDGER_AUTHORITY_ID: '  ' }), [
            'FATAL CONFIG: Required env var LEDGER_AUTHORITY_ID is missing'
        ]);
    });

    it('collects every violation', () => {
        const errors = ConfigGuard.evaluate(rules, {
            NODE_ENV: 'production',
            LEDGER_DEBUG_TRANSFERS: 'true',
            LEDGER_REGION: 'unknown'
        });

        assert.deepStrictEqual(errors, [
            'FATAL CONFIG: Required env var LEDGER_AUTHORITY_ID is missing',
            'FATAL CONFIG: Debug transfers are forbidden in production (Rule: LEDGER_DEBUG_TRANSFERS)',
            'FATAL CONFIG: LEDGER_REGION must be known'
        ]);
    });

    it('records a rule that throws as a violation', () => {
        const errors = ConfigGuard.evaluate([{
            type: 'assert',
            check: () => {
                throw new Error('unreadable');
            },
            message: 'never reported'
        }], {});

        assert.deepStrictEqual(errors, ['Check failed for rule: unreadable']);
    });

    it('throws a ConfigurationError from enforce', () => {
        assert.throws(
            () => ConfigGuard.enforce(rules, {}),
            (err: unknown) =>
                err instanceof ConfigurationError &&
                err.code === 'CONFIG_VIOLATION' &&
                err.message === 'Configuration Guard Violation: FATAL CONFIG: Required env var LEDGER_AUTHORITY_ID is missing'
        );
    });
});
