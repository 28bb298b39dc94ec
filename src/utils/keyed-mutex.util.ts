/**
 * Keyed Mutex
 *
 * Serializes async critical sections per key. Callers with the same key run
 * one at a time in arrival order; different keys never wait on each other.
 */
export class KeyedMutex {
    private tails = new Map<string, Promise<void>>();

    async runExclusive<T>(key: string, task: () => T | Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let release: () => void = () => undefined;
        const current = new Promise<void>(resolve => {
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

    isLocked(key: string): boolean {
        return this.tails.has(key);
    }
}
