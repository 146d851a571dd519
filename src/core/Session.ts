/**
 * @file Session.ts
 * @brief One reliable, ordered byte-message link to one peer.
 *
 * A session owns a Sender and a Receiver and multiplexes them over a single
 * Channel. Each datagram is decoded once: ACKs go to the sender, DATA to the
 * receiver, and anything that fails the codec's checks is dropped. Datagram
 * arrivals, submissions and the sender's deadline alarm are all callbacks on
 * the Node event loop, so they never interleave.
 *
 * @example
 * ```typescript
 * const channel = await UdpChannel.bind();
 * const session = new Session({ channel, peer: { address: '127.0.0.1', port: 9000 } });
 * const handle = session.submit(new TextEncoder().encode('hello'));
 * const outcome = await handle.result;
 * await session.end();
 * ```
 */

import { decodePacket } from '../codec';
import { resolveConfig, type SessionConfig, type SessionConfigInput } from '../config';
import { debugPacket } from '../debug';
import { ConfigurationError, CorruptPacketError } from '../errors';
import type { Channel } from '../transport/Channel';
import { formatPeer, type Clock, type Packet, type PeerAddress } from '../types';
import { EventEmitter } from '../utils/EventEmitter';
import { Logger, LogLevel, logger as defaultLogger } from '../utils/Logger';
import type { DeliveryHandle } from './DeliveryHandle';
import { Receiver, type ReceiverStats } from './Receiver';
import { Sender, type SenderState, type SenderStats } from './Sender';

export type SessionState = SenderState;

export interface SessionOptions {
    channel: Channel;
    /** Remote endpoint. When omitted, the source of the first valid datagram. */
    peer?: PeerAddress;
    config?: SessionConfigInput;
    logger?: Logger;
    clock?: Clock;
}

export interface SessionEvents {
    [key: string]: unknown[];
    peer: [peer: PeerAddress];
    corrupt: [event: { from: PeerAddress; error: CorruptPacketError }];
    state: [state: SessionState];
}

export interface SessionStats {
    sender: SenderStats;
    receiver: ReceiverStats;
    corrupt: number;
}

export class Session extends EventEmitter<SessionEvents> {
    public readonly config: SessionConfig;
    public readonly sender: Sender;
    public readonly receiver: Receiver;

    private readonly channel: Channel;
    private readonly logger: Logger;
    private peer_: PeerAddress | null;
    private unsubscribe: (() => void) | null;
    private corrupt = 0;

    /**
     * @throws {ConfigurationError} if `config` is invalid
     */
    constructor(options: SessionOptions) {
        super();
        this.config = resolveConfig(options.config);
        this.channel = options.channel;
        this.peer_ = options.peer ?? null;
        const base = options.logger ?? defaultLogger;
        this.logger = base.child('session');

        this.sender = new Sender({
            config: this.config,
            clock: options.clock,
            logger: base.child('sender'),
            transmit: bytes => this.sendToPeer(bytes),
        });
        this.receiver = new Receiver({
            config: this.config,
            logger: base.child('receiver'),
            transmit: (bytes, to) => this.channel.send(to, bytes),
        });

        this.sender.on('state', state => this.emit('state', state));
        this.unsubscribe = this.channel.on('datagram', (data, from) => this.handleDatagram(data, from));
    }

    public get state(): SessionState {
        return this.sender.state;
    }

    public get peer(): PeerAddress | null {
        return this.peer_;
    }

    public get stats(): SessionStats {
        return { sender: this.sender.stats, receiver: this.receiver.stats, corrupt: this.corrupt };
    }

    /**
     * @throws {ConfigurationError} while no peer is known
     * @throws {SessionClosedError} after `end()` or `close()`
     * @throws {QueueOverflowError} if the send backlog is full
     */
    public submit(data: Uint8Array): DeliveryHandle {
        if (!this.peer_) {
            throw new ConfigurationError('No peer address: pass `peer` or wait for the first datagram');
        }
        return this.sender.submit(data);
    }

    /** In-order, duplicate-free payloads from the peer. */
    public messages(): AsyncIterableIterator<Uint8Array> {
        return this.receiver.messages();
    }

    /**
     * Waits until everything submitted is acknowledged or failed, then closes
     * the whole session, receiving side included. Data the peer sends after
     * that is neither acked nor delivered, so in full duplex both sides
     * should finish sending before either calls `end()`.
     */
    public async end(): Promise<void> {
        await this.sender.end();
        this.close();
    }

    /**
     * Closes immediately. Unacknowledged submissions fail. The channel stays
     * open; it belongs to the caller.
     */
    public close(): void {
        this.sender.close();
        this.receiver.close();
        this.detach();
    }

    private handleDatagram(data: Uint8Array, from: PeerAddress): void {
        const packet = this.decode(data, from);
        if (!packet) return;

        if (!this.peer_) {
            this.peer_ = { ...from };
            this.logger.info(`Peer is ${formatPeer(from)}`);
            this.emit('peer', this.peer_);
        }

        if (packet.kind === 'ACK') {
            this.sender.handleAck(packet.id);
        } else {
            this.receiver.handleData(packet, from);
        }
    }

    private decode(data: Uint8Array, from: PeerAddress): Packet | null {
        try {
            return decodePacket(data, { maxPayload: this.config.maxSegmentSize });
        } catch (err) {
            if (!(err instanceof CorruptPacketError)) throw err;
            this.corrupt++;
            if (this.logger.getLogLevel() <= LogLevel.DEBUG) {
                this.logger.debug(`Dropped datagram from ${formatPeer(from)}: ${err.message}\n${debugPacket(data)}`);
            }
            this.emit('corrupt', { from, error: err });
            return null;
        }
    }

    private sendToPeer(bytes: Uint8Array): void {
        if (!this.peer_) {
            throw new ConfigurationError('No peer address to send to');
        }
        this.channel.send(this.peer_, bytes);
    }

    private detach(): void {
        if (this.unsubscribe) {
            this.unsubscribe();
            this.unsubscribe = null;
        }
    }
}
