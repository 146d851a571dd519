import { describe, it, expect } from 'vitest';
import { Receiver } from './Receiver';
import { dataPacket, decodePacket } from '../codec';
import { resolveConfig, type SessionConfigInput } from '../config';
import type { PeerAddress } from '../types';
import { Logger, LogLevel } from '../utils/Logger';

const PEER: PeerAddress = { address: '10.0.0.2', port: 4000 };

function createReceiver(config: SessionConfigInput = {}) {
    const acks: Array<{ id: number; to: PeerAddress }> = [];
    const log = new Logger('test');
    log.setLogLevel(LogLevel.NONE);
    const receiver = new Receiver({
        config: resolveConfig(config),
        transmit: (bytes, to) => acks.push({ id: decodePacket(bytes).id, to }),
        logger: log,
    });
    const delivered: string[] = [];
    receiver.on('deliver', ({ payload }) => delivered.push(new TextDecoder().decode(payload)));
    const feed = (id: number, text: string) =>
        receiver.handleData(dataPacket(id, new TextEncoder().encode(text)), PEER);
    return { receiver, acks, delivered, feed };
}

describe('Receiver', () => {
    it('delivers in order and acks each packet to its source', () => {
        const { receiver, acks, delivered, feed } = createReceiver();
        expect(feed(0, 'a')).toBe('delivered');
        expect(feed(1, 'b')).toBe('delivered');

        expect(delivered).toEqual(['a', 'b']);
        expect(acks).toEqual([{ id: 0, to: PEER }, { id: 1, to: PEER }]);
        expect(receiver.nextExpectedId).toBe(2);
    });

    it('re-acks duplicates without delivering them again', () => {
        const { receiver, acks, delivered, feed } = createReceiver();
        const duplicates: number[] = [];
        receiver.on('duplicate', ({ id }) => duplicates.push(id));
        feed(0, 'a');
        expect(feed(0, 'a')).toBe('duplicate');

        expect(delivered).toEqual(['a']);
        expect(acks.map(a => a.id)).toEqual([0, 0]);
        expect(duplicates).toEqual([0]);
    });

    it('discards packets ahead of the cursor without acking by default', () => {
        const { receiver, acks, delivered, feed } = createReceiver();
        const discards: Array<{ id: number; reason: string }> = [];
        receiver.on('discard', event => discards.push(event));

        expect(feed(1, 'b')).toBe('discarded');
        expect(acks).toEqual([]);
        expect(delivered).toEqual([]);
        expect(discards).toEqual([{ id: 1, reason: 'ahead-of-window' }]);
        expect(receiver.nextExpectedId).toBe(0);
    });

    it('starts at initialId', () => {
        const { delivered, feed } = createReceiver({ initialId: 7 });
        expect(feed(0, 'old')).toBe('duplicate');
        expect(feed(7, 'first')).toBe('delivered');
        expect(delivered).toEqual(['first']);
    });

    describe('with a reorder window', () => {
        it('buffers and acks early packets, then delivers them in order', () => {
            const { receiver, acks, delivered, feed } = createReceiver({ reorderWindow: 2 });
            expect(feed(2, 'c')).toBe('buffered');
            expect(feed(1, 'b')).toBe('buffered');
            expect(delivered).toEqual([]);

            expect(feed(0, 'a')).toBe('delivered');
            expect(delivered).toEqual(['a', 'b', 'c']);
            expect(acks.map(a => a.id)).toEqual([2, 1, 0]);
            expect(receiver.nextExpectedId).toBe(3);
        });

        it('re-acks a buffered duplicate but stores it once', () => {
            const { receiver, acks, feed } = createReceiver({ reorderWindow: 1 });
            feed(1, 'b');
            feed(1, 'b');
            expect(acks.map(a => a.id)).toEqual([1, 1]);
            expect(receiver.stats.buffered).toBe(1);
        });

        it('discards packets beyond the window', () => {
            const { acks, feed } = createReceiver({ reorderWindow: 2 });
            expect(feed(3, 'd')).toBe('discarded');
            expect(acks).toEqual([]);
        });
    });

    describe('messages()', () => {
        it('yields delivered payloads and ends after close', async () => {
            const { receiver, feed } = createReceiver();
            feed(0, 'x');
            feed(1, 'y');
            receiver.close();

            const received: string[] = [];
            for await (const payload of receiver.messages()) {
                received.push(new TextDecoder().decode(payload));
            }
            expect(received).toEqual(['x', 'y']);
        });

        it('resolves a pending read when data arrives', async () => {
            const { receiver, feed } = createReceiver();
            const pending = receiver.messages().next();
            feed(0, 'late');
            const result = await pending;
            expect(result.done).toBe(false);
            expect(new TextDecoder().decode(result.value ?? new Uint8Array())).toBe('late');
        });
    });

    it('stops processing after close', () => {
        const { receiver, acks, feed } = createReceiver();
        receiver.close();
        receiver.close();
        expect(feed(0, 'a')).toBe('discarded');
        expect(acks).toEqual([]);
        expect(receiver.isClosed).toBe(true);
    });
});
