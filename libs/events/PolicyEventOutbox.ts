/**
 * Policy Event Outbox
 *
 * Event subscriber that appends every published ledger event to a
 * PostgreSQL outbox table, where external indexers pick them up.
 * Bus sequence numbers restart with the process, so rows are keyed by
 * (run_id, sequence): a replayed event from the same run is ignored,
 * and a new run never collides with an earlier one.
 */

import crypto from 'crypto';

import { Queryable } from '../db/pool.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { getComponentLogger } from '../logging/logger.js';
import { policyIdOf, PublishedEvent } from './events.js';
import { EventListener } from './eventBus.js';

const logger = getComponentLogger('PolicyEventOutbox');

export const INSERT_OUTBOX_EVENT_SQL = `
    INSERT INTO policy_event_outbox (
        run_id,
        sequence,
        event_type,
        policy_id,
        payload,
        occurred_at
    ) VALUES ($1, $2, $3, $4, $5, to_timestamp($6))
    ON CONFLICT (run_id, sequence) DO NOTHING`;

/**
 * JSON form of an event; bigint amounts become decimal strings.
 */
export function serializeEventPayload(event: PublishedEvent): string {
    return JSON.stringify(event, (_key, value: unknown) =>
        typeof value === 'bigint' ? value.toString() : value
    );
}

export class PolicyEventOutbox {
    constructor(
        private readonly client: Queryable,
        /** Identifies this process's sequence range; one per outbox. */
        readonly runId: string = crypto.randomUUID()
    ) { }

    async append(event: PublishedEvent): Promise<boolean> {
        try {
            const result = await this.client.query(INSERT_OUTBOX_EVENT_SQL, [
                this.runId,
                event.sequence,
                event.type,
                policyIdOf(event),
                serializeEventPayload(event),
                event.occurredAt
            ]);

            const inserted = (result.rowCount ?? 0) > 0;
            if (!inserted) {
                logger.info({ runId: this.runId, sequence: event.sequence, eventType: event.type }, 'Duplicate outbox event ignored');
            }
            return inserted;
        } catch (err: unknown) {
            throw ErrorSanitizer.sanitize(err, 'PolicyEventOutbox:Append');
        }
    }

    /**
     * Listener form for DomainEventBus.subscribe().
     */
    listener(): EventListener {
        return async (event: PublishedEvent) => {
            await this.append(event);
        };
    }
}
