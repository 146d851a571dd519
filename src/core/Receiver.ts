/**
 * @file Receiver.ts
 * @brief In-order, duplicate-free delivery of DATA packets.
 *
 * Delivers strictly by id starting at `initialId`. Everything behind the
 * cursor is a duplicate and gets re-acked, since the sender may have missed
 * the earlier ack. Packets ahead of the cursor are discarded without an ack
 * unless `reorderWindow` allows buffering them.
 */

import { ackPacket, encodePacket } from '../codec';
import type { SessionConfig } from '../config';
import type { DataPacket, PeerAddress } from '../types';
import { AsyncQueue } from '../utils/AsyncQueue';
import { EventEmitter } from '../utils/EventEmitter';
import { Logger, logger as defaultLogger } from '../utils/Logger';

export type ReceiveOutcome = 'delivered' | 'duplicate' | 'buffered' | 'discarded';
export type DiscardReason = 'ahead-of-window' | 'closed';

export interface ReceiverEvents {
    deliver: [event: { id: number; payload: Uint8Array }];
    duplicate: [event: { id: number }];
    buffered: [event: { id: number }];
    discard: [event: { id: number; reason: DiscardReason }];
    [key: string]: unknown[];
}

export interface ReceiverStats {
    delivered: number;
    duplicates: number;
    buffered: number;
    discarded: number;
}

export interface ReceiverOptions {
    config: SessionConfig;
    /** Sends an ACK datagram back to wherever the DATA came from. */
    transmit: (bytes: Uint8Array, to: PeerAddress) => void;
    logger?: Logger;
}

export class Receiver extends EventEmitter<ReceiverEvents> {
    private readonly reorderWindow: number;
    private readonly transmit: (bytes: Uint8Array, to: PeerAddress) => void;
    private readonly logger: Logger;

    private nextExpected: number;
    private readonly reorder = new Map<number, Uint8Array>();
    private readonly deliveries = new AsyncQueue<Uint8Array>();
    private closed = false;
    private readonly stats_: ReceiverStats = { delivered: 0, duplicates: 0, buffered: 0, discarded: 0 };

    constructor(options: ReceiverOptions) {
        super();
        this.reorderWindow = options.config.reorderWindow;
        this.nextExpected = options.config.initialId;
        this.transmit = options.transmit;
        this.logger = options.logger ?? defaultLogger.child('receiver');
    }

    public get nextExpectedId(): number {
        return this.nextExpected;
    }

    public get isClosed(): boolean {
        return this.closed;
    }

    public get stats(): ReceiverStats {
        return { ...this.stats_ };
    }

    public handleData(packet: DataPacket, from: PeerAddress): ReceiveOutcome {
        const { id } = packet;
        if (this.closed) {
            this.discard(id, 'closed');
            return 'discarded';
        }

        if (id === this.nextExpected) {
            this.deliver(id, packet.payload);
            this.ack(id, from);
            this.drainReorderBuffer();
            return 'delivered';
        }

        if (id < this.nextExpected) {
            this.stats_.duplicates++;
            this.logger.wire(`DATA #${id} duplicate, re-acking`);
            this.emit('duplicate', { id });
            this.ack(id, from);
            return 'duplicate';
        }

        if (id - this.nextExpected <= this.reorderWindow) {
            if (!this.reorder.has(id)) {
                this.reorder.set(id, packet.payload);
                this.stats_.buffered++;
                this.logger.wire(`DATA #${id} buffered (waiting for #${this.nextExpected})`);
                this.emit('buffered', { id });
            }
            this.ack(id, from);
            return 'buffered';
        }

        this.discard(id, 'ahead-of-window');
        return 'discarded';
    }

    /**
     * Delivered payloads in id order. Ends after `close()` once the payloads
     * already delivered have been consumed. There is one stream per receiver.
     */
    public messages(): AsyncIterableIterator<Uint8Array> {
        return this.deliveries;
    }

    public close(): void {
        if (this.closed) return;
        this.closed = true;
        this.reorder.clear();
        this.deliveries.close();
    }

    private deliver(id: number, payload: Uint8Array): void {
        this.nextExpected = id + 1;
        this.stats_.delivered++;
        this.logger.wire(`DATA #${id} delivered (${payload.length} bytes)`);
        this.deliveries.push(payload);
        this.emit('deliver', { id, payload });
    }

    private drainReorderBuffer(): void {
        let payload = this.reorder.get(this.nextExpected);
        while (payload !== undefined) {
            this.reorder.delete(this.nextExpected);
            this.deliver(this.nextExpected, payload);
            payload = this.reorder.get(this.nextExpected);
        }
    }

    private discard(id: number, reason: DiscardReason): void {
        this.stats_.discarded++;
        this.logger.wire(`DATA #${id} discarded (${reason})`);
        this.emit('discard', { id, reason });
    }

    private ack(id: number, to: PeerAddress): void {
        try {
            this.transmit(encodePacket(ackPacket(id)), to);
        } catch (err) {
            // A lost ack; the sender's retransmission asks again.
            this.logger.warn(`Failed to send ACK #${id}:`, err);
        }
    }
}
