/**
 * Fixed-capacity FIFO
 *
 * `push` refuses items once full instead of growing; the producer decides
 * what to do about it (the audio recorder pauses its source).
 */
export class BoundedQueue<T> {
    private items: T[] = [];

    constructor(public readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
        }
    }

    push(item: T): boolean {
        if (this.items.length >= this.capacity) {
            return false;
        }
        this.items.push(item);
        return true;
    }

    get size(): number {
        return this.items.length;
    }

    get isFull(): boolean {
        return this.items.length >= this.capacity;
    }

    drain(): T[] {
        const drained = this.items;
        this.items = [];
        return drained;
    }
}
