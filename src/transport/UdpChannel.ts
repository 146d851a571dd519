import { createSocket, type Socket, type SocketType } from 'dgram';
import { EventEmitter } from '../utils/EventEmitter';
import { Logger, logger as defaultLogger } from '../utils/Logger';
import { formatPeer, type PeerAddress } from '../types';
import type { Channel, ChannelEvents } from './Channel';

export interface UdpChannelOptions {
    /** 0 (default) picks an ephemeral port. */
    port?: number;
    address?: string;
    type?: SocketType;
    logger?: Logger;
}

/**
 * Channel over a UDP socket.
 *
 * @example
 * ```typescript
 * const channel = await UdpChannel.bind({ port: 9000 });
 * const session = new Session({ channel });
 * ```
 */
export class UdpChannel extends EventEmitter<ChannelEvents> implements Channel {
    private closed = false;

    /**
     * Creates a socket and resolves once it is bound.
     */
    public static bind(options: UdpChannelOptions = {}): Promise<UdpChannel> {
        const socket = createSocket(options.type ?? 'udp4');
        return new Promise((resolve, reject) => {
            const onError = (err: Error) => {
                socket.close();
                reject(err);
            };
            socket.once('error', onError);
            socket.bind(options.port ?? 0, options.address, () => {
                socket.off('error', onError);
                resolve(new UdpChannel(socket, options.logger));
            });
        });
    }

    constructor(
        private readonly socket: Socket,
        private readonly logger: Logger = defaultLogger.child('udp')
    ) {
        super();
        socket.on('message', (msg, rinfo) => {
            const data = new Uint8Array(msg.buffer, msg.byteOffset, msg.byteLength);
            this.emit('datagram', data, { address: rinfo.address, port: rinfo.port });
        });
        socket.on('error', err => {
            this.logger.error('Socket error:', err);
            this.emit('error', err);
        });
        socket.on('close', () => {
            this.closed = true;
            this.emit('close');
        });
    }

    /** Local address the socket is bound to. */
    public address(): PeerAddress {
        const { address, port } = this.socket.address();
        return { address, port };
    }

    public get isClosed(): boolean {
        return this.closed;
    }

    public send(to: PeerAddress, data: Uint8Array): void {
        if (this.closed) {
            this.logger.warn(`Dropping datagram to ${formatPeer(to)}: channel closed`);
            return;
        }
        this.socket.send(data, to.port, to.address, err => {
            if (err) {
                this.logger.warn(`Send to ${formatPeer(to)} failed:`, err);
                this.emit('error', err);
            }
        });
    }

    public close(): void {
        if (this.closed) return;
        this.closed = true;
        this.socket.close();
    }
}
