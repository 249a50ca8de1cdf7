import { getComponentLogger } from '../logging/logger.js';
import { LedgerEvent, PublishedEvent } from './events.js';

const logger = getComponentLogger('DomainEventBus');

export type EventListener = (event: PublishedEvent) => void | Promise<void>;

/**
 * Observer registry for ledger events.
 *
 * Events are published only after the operation that produced them has
 * committed. A failing listener is logged and does not fail the publisher:
 * the committed state stands and the listener owns its own recovery.
 */
export class DomainEventBus {
    private readonly listeners = new Set<EventListener>();
    private sequence = 0;

    subscribe(listener: EventListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    listenerCount(): number {
        return this.listeners.size;
    }

    async publish(event: LedgerEvent, occurredAt: number): Promise<PublishedEvent> {
        this.sequence += 1;
        const published: PublishedEvent = Object.freeze({ ...event, sequence: this.sequence, occurredAt });

        const results = await Promise.allSettled(
            [...this.listeners].map(async listener => listener(published))
        );

        for (const result of results) {
            if (result.status === 'rejected') {
                logger.error({
                    eventType: published.type,
                    sequence: published.sequence,
                    error: result.reason instanceof Error ? result.reason.message : String(result.reason)
                }, 'Event listener failed');
            }
        }

        return published;
    }
}
