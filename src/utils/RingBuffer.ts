/**
 * A growable Ring Buffer (Circular Buffer) used as a FIFO queue.
 *
 * O(1) push, peek and shift. When full, the backing array doubles and the
 * live items are unwrapped into it; nothing is ever overwritten.
 */
export class RingBuffer<T extends NonNullable<unknown>> {
    private buffer: (T | undefined)[];
    private capacity: number;
    private readPtr: number = 0;
    private writePtr: number = 0;
    private count: number = 0;

    constructor(initialCapacity: number = 16) {
        if (initialCapacity <= 0) throw new Error('RingBuffer capacity must be > 0');
        this.capacity = initialCapacity;
        this.buffer = new Array(initialCapacity);
    }

    public push(item: T): void {
        if (this.count === this.capacity) {
            this.grow();
        }
        this.buffer[this.writePtr] = item;
        this.writePtr = (this.writePtr + 1) % this.capacity;
        this.count++;
    }

    /**
     * Removes and returns the oldest item, or undefined if empty.
     */
    public shift(): T | undefined {
        if (this.count === 0) return undefined;

        const item = this.buffer[this.readPtr];
        this.buffer[this.readPtr] = undefined; // GC help
        this.readPtr = (this.readPtr + 1) % this.capacity;
        this.count--;

        return item;
    }

    public peek(): T | undefined {
        return this.count === 0 ? undefined : this.buffer[this.readPtr];
    }

    public get length(): number {
        return this.count;
    }

    public get isEmpty(): boolean {
        return this.count === 0;
    }

    public clear(): void {
        this.readPtr = 0;
        this.writePtr = 0;
        this.count = 0;
        this.buffer.fill(undefined);
    }

    public toArray(): T[] {
        const res: T[] = [];
        let ptr = this.readPtr;
        for (let i = 0; i < this.count; i++) {
            const item = this.buffer[ptr];
            if (item !== undefined) res.push(item);
            ptr = (ptr + 1) % this.capacity;
        }
        return res;
    }

    private grow(): void {
        const items = this.toArray();
        this.capacity *= 2;
        this.buffer = new Array(this.capacity);
        items.forEach((item, i) => { this.buffer[i] = item; });
        this.readPtr = 0;
        this.writePtr = items.length;
    }
}
