/**
 * @file TimerQueue.ts
 * @brief Min-heap of per-key deadlines.
 *
 * Every in-flight packet owns one deadline here instead of one runtime timer.
 * The owner arms a single alarm for `peekDeadline()` and, when it fires,
 * collects everything due with `popExpired(now)`.
 *
 * schedule / cancel / pop are O(log n); peek is O(1). Rescheduling a key
 * replaces its previous deadline.
 */

interface HeapEntry<K> {
    key: K;
    deadline: number;
    /** Insertion order, breaks ties so equal deadlines pop FIFO. */
    seq: number;
}

export class TimerQueue<K> {
    private heap: HeapEntry<K>[] = [];
    private readonly index = new Map<K, number>();
    private seq = 0;

    public get size(): number {
        return this.heap.length;
    }

    public has(key: K): boolean {
        return this.index.has(key);
    }

    public deadlineOf(key: K): number | undefined {
        const pos = this.index.get(key);
        return pos === undefined ? undefined : this.heap[pos].deadline;
    }

    public schedule(key: K, deadline: number): void {
        this.cancel(key);
        const entry: HeapEntry<K> = { key, deadline, seq: this.seq++ };
        this.heap.push(entry);
        this.index.set(key, this.heap.length - 1);
        this.siftUp(this.heap.length - 1);
    }

    /**
     * @returns true if the key had a pending deadline
     */
    public cancel(key: K): boolean {
        const pos = this.index.get(key);
        if (pos === undefined) return false;

        this.index.delete(key);
        const last = this.heap.pop();
        if (last !== undefined && pos < this.heap.length) {
            this.heap[pos] = last;
            this.index.set(last.key, pos);
            this.siftDown(pos);
            this.siftUp(pos);
        }
        return true;
    }

    public peekDeadline(): number | undefined {
        return this.heap.length > 0 ? this.heap[0].deadline : undefined;
    }

    /**
     * Removes and returns every key whose deadline is at or before `now`,
     * earliest first.
     */
    public popExpired(now: number): K[] {
        const due: K[] = [];
        while (this.heap.length > 0 && this.heap[0].deadline <= now) {
            const top = this.heap[0];
            this.cancel(top.key);
            due.push(top.key);
        }
        return due;
    }

    public clear(): void {
        this.heap = [];
        this.index.clear();
    }

    private less(a: HeapEntry<K>, b: HeapEntry<K>): boolean {
        return a.deadline < b.deadline || (a.deadline === b.deadline && a.seq < b.seq);
    }

    private swap(i: number, j: number): void {
        const a = this.heap[i];
        const b = this.heap[j];
        this.heap[i] = b;
        this.heap[j] = a;
        this.index.set(b.key, i);
        this.index.set(a.key, j);
    }

    private siftUp(pos: number): void {
        while (pos > 0) {
            const parent = (pos - 1) >> 1;
            if (!this.less(this.heap[pos], this.heap[parent])) break;
            this.swap(pos, parent);
            pos = parent;
        }
    }

    private siftDown(pos: number): void {
        const n = this.heap.length;
        for (;;) {
            const left = pos * 2 + 1;
            const right = left + 1;
            let smallest = pos;
            if (left < n && this.less(this.heap[left], this.heap[smallest])) smallest = left;
            if (right < n && this.less(this.heap[right], this.heap[smallest])) smallest = right;
            if (smallest === pos) return;
            this.swap(pos, smallest);
            pos = smallest;
        }
    }
}
