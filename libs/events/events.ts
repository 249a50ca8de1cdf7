/**
 * Domain events published to external consumers and indexers.
 * The first three shapes are the public contract; the rest are
 * administrative and lifecycle notifications.
 */

import { FlightStatus, PolicyId } from '../policy/policy.js';

export type PayoutReason = 'Flight Cancelled' | 'Flight Delayed';

export interface PolicyCreated {
    readonly type: 'PolicyCreated';
    readonly policyId: PolicyId;
    readonly holder: string;
    readonly flightNumber: string;
}

export interface FlightStatusUpdated {
    readonly type: 'FlightStatusUpdated';
    readonly policyId: PolicyId;
    readonly flightStatus: FlightStatus;
    readonly delayMinutes: number;
}

export interface PayoutTriggered {
    readonly type: 'PayoutTriggered';
    readonly policyId: PolicyId;
    readonly amount: bigint;
    readonly reason: PayoutReason;
}

export interface PolicyCancelled {
    readonly type: 'PolicyCancelled';
    readonly policyId: PolicyId;
    readonly refund: bigint;
}

export interface PolicyExpired {
    readonly type: 'PolicyExpired';
    readonly policyId: PolicyId;
}

export interface PayoutTierAdded {
    readonly type: 'PayoutTierAdded';
    readonly index: number;
    readonly minDelay: number;
    readonly maxDelay: number;
    readonly multiplier: number;
}

export interface FundsDeposited {
    readonly type: 'FundsDeposited';
    readonly amount: bigint;
}

export interface FundsWithdrawn {
    readonly type: 'FundsWithdrawn';
    readonly amount: bigint;
    readonly to: string;
}

export type LedgerEvent =
    | PolicyCreated
    | FlightStatusUpdated
    | PayoutTriggered
    | PolicyCancelled
    | PolicyExpired
    | PayoutTierAdded
    | FundsDeposited
    | FundsWithdrawn;

export type LedgerEventType = LedgerEvent['type'];

/**
 * An event as delivered to subscribers.
 */
export type PublishedEvent<E extends LedgerEvent = LedgerEvent> = E & {
    readonly sequence: number;
    /** Unix seconds */
    readonly occurredAt: number;
};

export function policyIdOf(event: LedgerEvent): PolicyId | null {
    return 'policyId' in event ? event.policyId : null;
}
