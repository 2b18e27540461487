/**
 * In-process mutual exclusion keyed by string.
 * Tasks on the same key run one after another in arrival order.
 */
export class KeyedMutex {
    private readonly tails = new Map<string, Promise<void>>();

    async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        let release: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        try {
            return await task();
        } finally {
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    /**
     * Holds every key for the duration of the task. Keys are taken in sorted
     * order so two callers with overlapping key sets cannot deadlock.
     */
    async runExclusiveAll<T>(keys: readonly string[], task: () => Promise<T>): Promise<T> {
        const ordered = [...new Set(keys)].sort();
        const acquire = (index: number): Promise<T> => {
            if (index >= ordered.length) return task();
            return this.runExclusive(ordered[index], () => acquire(index + 1));
        };
        return acquire(0);
    }

    isLocked(key: string): boolean {
        return this.tails.has(key);
    }
}
