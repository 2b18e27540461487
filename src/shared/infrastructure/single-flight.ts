/**
 * Coalesces concurrent calls sharing a key onto one in-flight promise.
 */
export class SingleFlight<T> {
    private readonly inFlight = new Map<string, Promise<T>>();

    run(key: string, fn: () => Promise<T>): Promise<T> {
        const existing = this.inFlight.get(key);
        if (existing) return existing;
        const p = fn().finally(() => this.inFlight.delete(key));
        this.inFlight.set(key, p);
        return p;
    }

    isRunning(key: string): boolean {
        return this.inFlight.has(key);
    }
}
