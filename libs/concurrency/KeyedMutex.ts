/**
 * Per-key FIFO mutex.
 *
 * Calls holding the same key run one at a time in arrival order; calls on
 * different keys never wait for each other.
 */
export class KeyedMutex<K> {
    private readonly tails = new Map<K, Promise<void>>();

    async acquire(key: K): Promise<() => void> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let releaseCurrent: () => void = () => undefined;
        const current = new Promise<void>(resolve => {
            releaseCurrent = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;

        let released = false;
        return () => {
            if (released) return;
            released = true;
            releaseCurrent();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        };
    }

    async runExclusive<T>(key: K, fn: () => Promise<T> | T): Promise<T> {
        const release = await this.acquire(key);
        try {
            return await fn();
        } finally {
            release();
        }
    }

    isLocked(key: K): boolean {
        return this.tails.has(key);
    }
}
