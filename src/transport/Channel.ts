import type { PeerAddress } from '../types';

/**
 * Datagram channel a session runs over.
 * Decouples the 'How' (UDP, an in-process simulation) from the 'What' (ARQ).
 * No ordering or delivery guarantee: datagrams may be lost, duplicated,
 * reordered or damaged.
 */
export interface ChannelEvents {
    [key: string]: unknown[];
    datagram: [data: Uint8Array, from: PeerAddress];
    error: [error: Error];
    close: [];
}

export interface Channel {
    /** Best effort. Failures surface as `error` events, never as throws. */
    send(to: PeerAddress, data: Uint8Array): void;

    /** Releases the underlying resource. Idempotent. */
    close(): void;

    on<K extends keyof ChannelEvents>(
        event: K,
        handler: (...args: ChannelEvents[K]) => void
    ): () => void;
}
