import { describe, it, expect } from 'vitest';
import { AsyncQueue } from './AsyncQueue';

describe('AsyncQueue', () => {
    it('yields items pushed before iteration', async () => {
        const queue = new AsyncQueue<string>();
        queue.push('a');
        queue.push('b');
        queue.close();

        const seen: string[] = [];
        for await (const item of queue) seen.push(item);
        expect(seen).toEqual(['a', 'b']);
    });

    it('resolves a pending next() when an item arrives', async () => {
        const queue = new AsyncQueue<number>();
        const pending = queue.next();
        queue.push(42);
        await expect(pending).resolves.toEqual({ value: 42, done: false });
        expect(queue.length).toBe(0);
    });

    it('finishes pending consumers on close', async () => {
        const queue = new AsyncQueue<number>();
        const pending = queue.next();
        queue.close();
        await expect(pending).resolves.toEqual({ value: undefined, done: true });
    });

    it('drops pushes after close and stays finished', async () => {
        const queue = new AsyncQueue<number>();
        queue.push(1);
        queue.close();
        expect(queue.push(2)).toBe(false);
        expect(queue.isClosed).toBe(true);

        await expect(queue.next()).resolves.toEqual({ value: 1, done: false });
        await expect(queue.next()).resolves.toEqual({ value: undefined, done: true });
        await expect(queue.next()).resolves.toEqual({ value: undefined, done: true });
    });

    it('closes and discards buffered items when the loop breaks early', async () => {
        const queue = new AsyncQueue<number>();
        queue.push(1);
        queue.push(2);

        for await (const item of queue) {
            expect(item).toBe(1);
            break;
        }

        expect(queue.isClosed).toBe(true);
        expect(queue.length).toBe(0);
    });
});
