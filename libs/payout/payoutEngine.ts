import { StateError } from '../errors/ledgerErrors.js';
import { findTier, PayoutTier } from './tierTable.js';

/**
 * Minimum delay, in minutes, that makes a policy eligible for payout.
 */
export const DEFAULT_PAYOUT_THRESHOLD_MINUTES = 120;

const MULTIPLIER_SCALE = 100n;

/**
 * Pure payout computation: premium × multiplier / 100 for the matching tier,
 * floored to whole minor units. Zero below the threshold.
 */
export function computePayout(
    premium: bigint,
    delayMinutes: number,
    tiers: readonly PayoutTier[],
    thresholdMinutes: number = DEFAULT_PAYOUT_THRESHOLD_MINUTES
): bigint {
    if (delayMinutes < thresholdMinutes) {
        return 0n;
    }

    const tier = findTier(tiers, delayMinutes);
    if (!tier) {
        throw new StateError('NO_PAYOUT_TIERS', 'Payout tier table is empty');
    }

    return (premium * BigInt(tier.multiplier)) / MULTIPLIER_SCALE;
}

export function capPayout(amount: bigint, maxPayout: bigint): bigint {
    return amount > maxPayout ? maxPayout : amount;
}

export interface PayoutQuote {
    readonly uncapped: bigint;
    readonly amount: bigint;
    readonly capped: boolean;
}

/**
 * Computes and caps in one step.
 */
export function quotePayout(
    premium: bigint,
    maxPayout: bigint,
    delayMinutes: number,
    tiers: readonly PayoutTier[],
    thresholdMinutes: number = DEFAULT_PAYOUT_THRESHOLD_MINUTES
): PayoutQuote {
    const uncapped = computePayout(premium, delayMinutes, tiers, thresholdMinutes);
    const amount = capPayout(uncapped, maxPayout);
    return { uncapped, amount, capped: amount !== uncapped };
}
