import { z } from 'zod';
import { ConfigGuard, ConfigurationError, Environment, GuardRule } from '../config-guard.js';
import { PayoutTier } from '../../payout/tierTable.js';
import { DEFAULT_PAYOUT_THRESHOLD_MINUTES } from '../../payout/payoutEngine.js';
import { PayoutTierConfigSchema } from '../../validation/schema.js';

export const DEFAULT_PAYOUT_TIERS: readonly PayoutTier[] = Object.freeze([
    { minDelay: 120, maxDelay: 240, multiplier: 200 },
    { minDelay: 240, maxDelay: 480, multiplier: 300 },
    { minDelay: 480, maxDelay: Number.POSITIVE_INFINITY, multiplier: 500 }
]);

export const DEFAULT_CANCELLATION_REFUND_PERCENT = 90;
export const DEFAULT_CLAIM_WINDOW_SECONDS = 24 * 60 * 60;

function parseJson(raw: string | undefined): unknown {
    return raw === undefined ? undefined : JSON.parse(raw);
}

function isJson(raw: string): boolean {
    try {
        JSON.parse(raw);
        return true;
    } catch {
        return false;
    }
}

export const LEDGER_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'LEDGER_AUTHORITY_ID' },
    {
        type: 'assert',
        check: (env) => env.LEDGER_PAYOUT_TIERS === undefined || isJson(env.LEDGER_PAYOUT_TIERS),
        message: 'LEDGER_PAYOUT_TIERS must be a JSON array of {minDelay, maxDelay, multiplier}'
    },
    {
        type: 'forbidIf',
        name: 'LEDGER_INITIAL_POOL',
        when: (env) => env.LEDGER_INITIAL_POOL !== undefined && !/^\d+$/.test(env.LEDGER_INITIAL_POOL),
        message: 'LEDGER_INITIAL_POOL must be a non-negative integer in minor units'
    }
];

const LedgerConfigSchema = z.object({
    authorityId: z.string().trim().min(1),
    payoutThresholdMinutes: z.coerce.number().int().nonnegative().default(DEFAULT_PAYOUT_THRESHOLD_MINUTES),
    cancellationRefundPercent: z.coerce.number().int().min(0).max(100).default(DEFAULT_CANCELLATION_REFUND_PERCENT),
    claimWindowSeconds: z.coerce.number().int().nonnegative().default(DEFAULT_CLAIM_WINDOW_SECONDS),
    payoutTiers: PayoutTierConfigSchema.optional(),
    initialPool: z.string().regex(/^\d+$/).default('0')
});

export interface LedgerConfig {
    readonly authorityId: string;
    readonly payoutThresholdMinutes: number;
    readonly cancellationRefundPercent: number;
    readonly claimWindowSeconds: number;
    readonly payoutTiers: readonly PayoutTier[];
    readonly initialPool: bigint;
}

/**
 * Reads ledger settings from the environment. Guard violations and schema
 * errors are both reported as a single ConfigurationError.
 */
export function loadLedgerConfig(env: Environment = process.env): LedgerConfig {
    ConfigGuard.enforce(LEDGER_CONFIG_GUARDS, env);

    const result = LedgerConfigSchema.safeParse({
        authorityId: env.LEDGER_AUTHORITY_ID,
        payoutThresholdMinutes: env.LEDGER_PAYOUT_THRESHOLD_MINUTES,
        cancellationRefundPercent: env.LEDGER_CANCELLATION_REFUND_PERCENT,
        claimWindowSeconds: env.LEDGER_CLAIM_WINDOW_SECONDS,
        payoutTiers: parseJson(env.LEDGER_PAYOUT_TIERS),
        initialPool: env.LEDGER_INITIAL_POOL
    });

    if (!result.success) {
        throw new ConfigurationError(
            result.error.issues.map(i => `FATAL CONFIG: ${i.path.join('.')}: ${i.message}`)
        );
    }

    const parsed = result.data;
    const payoutTiers: readonly PayoutTier[] = parsed.payoutTiers === undefined
        ? DEFAULT_PAYOUT_TIERS
        : parsed.payoutTiers.map(tier => ({
            minDelay: tier.minDelay,
            maxDelay: tier.maxDelay ?? Number.POSITIVE_INFINITY,
            multiplier: tier.multiplier
        }));

    return Object.freeze({
        authorityId: parsed.authorityId,
        payoutThresholdMinutes: parsed.payoutThresholdMinutes,
        cancellationRefundPercent: parsed.cancellationRefundPercent,
        claimWindowSeconds: parsed.claimWindowSeconds,
        payoutTiers,
        initialPool: BigInt(parsed.initialPool)
    });
}
