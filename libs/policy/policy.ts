/**
 * Flight-Delay Policy Model
 *
 * A policy covers exactly one flight for one premium payment. The fields set
 * at creation (holder, flight, schedule, premium, cap) never change; the
 * lifecycle fields only move forward.
 */

export type PolicyId = number;

/**
 * Policy lifecycle status.
 * Active is the only non-terminal status.
 */
export type PolicyStatus = 'Active' | 'Claimed' | 'Expired' | 'Cancelled';

/**
 * Flight status as reported by the authority.
 */
export type FlightStatus = 'OnTime' | 'Delayed' | 'Cancelled' | 'Departed';

/**
 * Delay recorded for a cancelled flight with no usable departure time.
 * Always lands in the last payout tier.
 */
export const MAX_DELAY_MINUTES = Number.MAX_SAFE_INTEGER;

export const SECONDS_PER_MINUTE = 60;

export interface Policy {
    readonly policyId: PolicyId;
    readonly holder: string;
    readonly flightNumber: string;
    /** Unix seconds */
    readonly scheduledDeparture: number;
    readonly premium: bigint;
    readonly maxPayout: bigint;
    readonly status: PolicyStatus;
    readonly flightStatus: FlightStatus;
    /** Unix seconds; 0 while unset */
    readonly actualDeparture: number;
    readonly delayMinutes: number;
    readonly payoutProcessed: boolean;
    readonly payoutAmount: bigint;
    readonly createdAt: number;
    readonly updatedAt: number;
}

export type ImmutablePolicyField =
    | 'policyId'
    | 'holder'
    | 'flightNumber'
    | 'scheduledDeparture'
    | 'premium'
    | 'maxPayout'
    | 'createdAt';

/**
 * Fields a store update may touch.
 */
export type PolicyPatch = Partial<Omit<Policy, ImmutablePolicyField>>;

export interface NewPolicy {
    readonly holder: string;
    readonly flightNumber: string;
    readonly scheduledDeparture: number;
    readonly premium: bigint;
    readonly maxPayout: bigint;
    readonly createdAt: number;
}

const ALLOWED_TRANSITIONS: Record<PolicyStatus, readonly PolicyStatus[]> = {
    Active: ['Claimed', 'Cancelled', 'Expired'],
    Claimed: [],
    Expired: [],
    Cancelled: []
};

export function isActive(policy: Policy): boolean {
    return policy.status === 'Active';
}

export function canTransition(from: PolicyStatus, to: PolicyStatus): boolean {
    return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Minutes between scheduled and actual departure for a reported status.
 * Returns null when the report carries no delay information.
 */
export function computeReportedDelay(
    flightStatus: FlightStatus,
    scheduledDeparture: number,
    actualDeparture: number
): number | null {
    if (flightStatus !== 'Delayed' && flightStatus !== 'Cancelled') {
        return null;
    }
    if (actualDeparture > scheduledDeparture) {
        return Math.floor((actualDeparture - scheduledDeparture) / SECONDS_PER_MINUTE);
    }
    return flightStatus === 'Cancelled' ? MAX_DELAY_MINUTES : null;
}
