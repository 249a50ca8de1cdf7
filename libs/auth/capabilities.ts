/**
 * Ledger Capability Registry
 *
 * Capabilities are verbs, not roles. The authority holds all of them;
 * a policyholder holds the owner-scoped ones for its own policies only.
 */

export type Capability =
    // Oracle feed
    | 'flight:report'

    // Policy lifecycle
    | 'payout:claim'
    | 'policy:cancel'
    | 'policy:expire'

    // Administration
    | 'tier:append'
    | 'pool:deposit'
    | 'pool:withdraw';

export type ActorRole = 'AUTHORITY' | 'HOLDER' | 'OTHER';

/**
 * Capabilities a holder may exercise on policies it owns.
 */
export const HOLDER_CAPABILITIES: readonly Capability[] = [
    'payout:claim',
    'policy:cancel'
];

export const AUTHORITY_CAPABILITIES: readonly Capability[] = [
    'flight:report',
    'payout:claim',
    'policy:cancel',
    'policy:expire',
    'tier:append',
    'pool:deposit',
    'pool:withdraw'
];
