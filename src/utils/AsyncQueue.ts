import { RingBuffer } from './RingBuffer';

/**
 * Single-consumer async FIFO that doubles as its own async iterator.
 *
 * Producers `push()` synchronously; the consumer awaits `next()` or uses
 * `for await`. After `close()` the remaining items are still yielded, then
 * the iterator finishes for good.
 */
export class AsyncQueue<T extends NonNullable<unknown>> implements AsyncIterableIterator<T> {
    private readonly items = new RingBuffer<T>();
    private waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
    private closed = false;

    /**
     * @returns false if the queue is already closed and the item was dropped
     */
    public push(item: T): boolean {
        if (this.closed) return false;
        const waiter = this.waiters.shift();
        if (waiter) {
            waiter({ value: item, done: false });
        } else {
            this.items.push(item);
        }
        return true;
    }

    public close(): void {
        if (this.closed) return;
        this.closed = true;
        const waiters = this.waiters;
        this.waiters = [];
        for (const waiter of waiters) {
            waiter({ value: undefined, done: true });
        }
    }

    public get isClosed(): boolean {
        return this.closed;
    }

    public get length(): number {
        return this.items.length;
    }

    public next(): Promise<IteratorResult<T, undefined>> {
        const item = this.items.shift();
        if (item !== undefined) {
            return Promise.resolve({ value: item, done: false });
        }
        if (this.closed) {
            return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise(resolve => this.waiters.push(resolve));
    }

    /**
     * Called when a `for await` loop exits early. The queue is not restartable.
     */
    public return(): Promise<IteratorResult<T, undefined>> {
        this.close();
        this.items.clear();
        return Promise.resolve({ value: undefined, done: true });
    }

    public [Symbol.asyncIterator](): AsyncIterableIterator<T> {
        return this;
    }
}
