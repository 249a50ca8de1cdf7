/**
 * Payout Tier Table
 *
 * Ordered delay-range → multiplier rules. Tiers are appended and never
 * removed or reordered. Ranges are NOT checked for overlap, gaps or order:
 * lookup is first-match in stored order, so an earlier tier shadows any
 * later tier covering the same delays. The last tier doubles as the
 * open-ended fallback for delays past every range.
 */

import { validate } from '../validation/zod-middleware.js';
import { PayoutTierSchema } from '../validation/schema.js';

export interface PayoutTier {
    /** Inclusive, minutes */
    readonly minDelay: number;
    /** Exclusive, minutes; Infinity for an open-ended tier */
    readonly maxDelay: number;
    /** Hundredths: 100 = 1.0× premium */
    readonly multiplier: number;
}

export class PayoutTierTable {
    private readonly tiers: PayoutTier[] = [];

    constructor(initial: readonly PayoutTier[] = []) {
        for (const tier of initial) {
            this.append(tier);
        }
    }

    /**
     * Appends a tier and returns its index.
     */
    append(tier: PayoutTier): number {
        const parsed = validate(PayoutTierSchema, tier, 'PayoutTierTable:append', 'INVALID_TIER');
        const stored: PayoutTier = {
            minDelay: parsed.minDelay,
            maxDelay: parsed.maxDelay,
            multiplier: parsed.multiplier
        };
        Object.freeze(stored);
        this.tiers.push(stored);
        return this.tiers.length - 1;
    }

    list(): readonly PayoutTier[] {
        return Object.freeze([...this.tiers]);
    }

    size(): number {
        return this.tiers.length;
    }
}

/**
 * First tier whose range holds `delayMinutes`, else the last tier.
 * Returns null only for an empty table.
 */
export function findTier(tiers: readonly PayoutTier[], delayMinutes: number): PayoutTier | null {
    for (const tier of tiers) {
        if (tier.minDelay <= delayMinutes && delayMinutes < tier.maxDelay) {
            return tier;
        }
    }
    return tiers[tiers.length - 1] ?? null;
}
