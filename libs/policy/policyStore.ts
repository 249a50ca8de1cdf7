/**
 * Policy Store
 *
 * Authoritative keyed storage for policy records plus two append-only
 * secondary indexes (by flight number, by holder). Records leave the store
 * as frozen copies; every mutation goes through `insert`, `update` or
 * `restore`.
 */

import { StateError } from '../errors/ledgerErrors.js';
import { PolicyIdSequence } from '../id/PolicyIdSequence.js';
import { canTransition, NewPolicy, Policy, PolicyId, PolicyPatch } from './policy.js';

export interface PolicyStore {
    insert(input: NewPolicy): Policy;
    get(policyId: PolicyId): Policy | null;
    /** Like get, but throws POLICY_NOT_FOUND. */
    require(policyId: PolicyId): Policy;
    update(policyId: PolicyId, patch: PolicyPatch, updatedAt: number): Policy;
    /** Puts back a previously read record verbatim. Compensation only. */
    restore(snapshot: Policy): void;
    listByHolder(holder: string): readonly PolicyId[];
    listByFlight(flightNumber: string): readonly PolicyId[];
    /** ID the next insert will receive. */
    nextId(): PolicyId;
    size(): number;
}

const PATCHABLE_FIELDS: ReadonlySet<string> = new Set([
    'status',
    'flightStatus',
    'actualDeparture',
    'delayMinutes',
    'payoutProcessed',
    'payoutAmount'
]);

function appendToIndex(index: Map<string, PolicyId[]>, key: string, policyId: PolicyId): void {
    const ids = index.get(key);
    if (ids) {
        ids.push(policyId);
    } else {
        index.set(key, [policyId]);
    }
}

export class InMemoryPolicyStore implements PolicyStore {
    private readonly records = new Map<PolicyId, Policy>();
    private readonly byHolder = new Map<string, PolicyId[]>();
    private readonly byFlight = new Map<string, PolicyId[]>();

    constructor(private readonly ids: PolicyIdSequence = new PolicyIdSequence()) { }

    insert(input: NewPolicy): Policy {
        const policyId = this.ids.next();
        const record: Policy = {
            policyId,
            holder: input.holder,
            flightNumber: input.flightNumber,
            scheduledDeparture: input.scheduledDeparture,
            premium: input.premium,
            maxPayout: input.maxPayout,
            status: 'Active',
            flightStatus: 'OnTime',
            actualDeparture: 0,
            delayMinutes: 0,
            payoutProcessed: false,
            payoutAmount: 0n,
            createdAt: input.createdAt,
            updatedAt: input.createdAt
        };
        Object.freeze(record);

        this.records.set(policyId, record);
        appendToIndex(this.byHolder, record.holder, policyId);
        appendToIndex(this.byFlight, record.flightNumber, policyId);
        return record;
    }

    get(policyId: PolicyId): Policy | null {
        return this.records.get(policyId) ?? null;
    }

    require(policyId: PolicyId): Policy {
        const record = this.records.get(policyId);
        if (!record) {
            throw new StateError('POLICY_NOT_FOUND', `Policy ${policyId} does not exist`, policyId);
        }
        return record;
    }

    update(policyId: PolicyId, patch: PolicyPatch, updatedAt: number): Policy {
        const current = this.require(policyId);

        for (const field of Object.keys(patch)) {
            if (!PATCHABLE_FIELDS.has(field)) {
                throw new Error(`PolicyStore: field ${field} is immutable`);
            }
        }
        if (current.payoutProcessed && patch.payoutProcessed === false) {
            throw new Error(`PolicyStore: payoutProcessed cannot be reset on policy ${policyId}`);
        }
        if (patch.status !== undefined && patch.status !== current.status && !canTransition(current.status, patch.status)) {
            throw new StateError(
                'POLICY_NOT_ACTIVE',
                `Policy ${policyId} cannot move from ${current.status} to ${patch.status}`,
                policyId
            );
        }

        const next: Policy = { ...current, ...patch, updatedAt };
        Object.freeze(next);
        this.records.set(policyId, next);
        return next;
    }

    restore(snapshot: Policy): void {
        const current = this.require(snapshot.policyId);
        if (current.holder !== snapshot.holder || current.premium !== snapshot.premium) {
            throw new Error(`PolicyStore: snapshot does not belong to policy ${snapshot.policyId}`);
        }
        this.records.set(snapshot.policyId, snapshot);
    }

    listByHolder(holder: string): readonly PolicyId[] {
        return Object.freeze([...(this.byHolder.get(holder) ?? [])]);
    }

    listByFlight(flightNumber: string): readonly PolicyId[] {
        return Object.freeze([...(this.byFlight.get(flightNumber) ?? [])]);
    }

    nextId(): PolicyId {
        return this.ids.current() + 1;
    }

    size(): number {
        return this.records.size;
    }
}
