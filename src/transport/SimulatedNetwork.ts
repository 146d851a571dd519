/**
 * @file SimulatedNetwork.ts
 * @brief In-process lossy datagram network.
 *
 * Endpoints exchange datagrams through timers, so delivery is always
 * asynchronous and plays along with fake timers in tests. Impairments are
 * drawn from a seeded generator: the same seed and traffic give the same run.
 *
 * @example
 * ```typescript
 * const net = new SimulatedNetwork({ seed: 7, conditions: { lossRate: 0.1, minDelay: 5, maxDelay: 40 } });
 * const a = net.endpoint('alice');
 * const b = net.endpoint('bob');
 * ```
 */

import { EventEmitter } from '../utils/EventEmitter';
import { Logger, logger as defaultLogger } from '../utils/Logger';
import { formatPeer, type PeerAddress } from '../types';
import type { Channel, ChannelEvents } from './Channel';

export interface LinkConditions {
    /** Probability in [0, 1] that a datagram is dropped. */
    lossRate?: number;
    /** Probability that a delivered datagram arrives twice. */
    duplicateRate?: number;
    /** Probability that a single bit of the datagram is flipped. */
    corruptRate?: number;
    /** One-way delay bounds in ms; a spread reorders datagrams. */
    minDelay?: number;
    maxDelay?: number;
    /** Targeted loss: return true to drop this datagram. */
    dropIf?: (data: Uint8Array, from: PeerAddress, to: PeerAddress) => boolean;
}

export interface NetworkStats {
    sent: number;
    delivered: number;
    dropped: number;
    duplicated: number;
    corrupted: number;
}

export interface SimulatedNetworkOptions {
    seed?: number;
    conditions?: LinkConditions;
    logger?: Logger;
}

/** mulberry32 */
function createRandom(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

function keyOf(peer: PeerAddress): string {
    return formatPeer(peer);
}

export class SimulatedNetwork {
    private readonly endpoints = new Map<string, SimulatedChannel>();
    private readonly random: () => number;
    private readonly logger: Logger;
    private conditions: LinkConditions;
    private readonly pending = new Set<ReturnType<typeof setTimeout>>();
    private readonly stats_: NetworkStats = { sent: 0, delivered: 0, dropped: 0, duplicated: 0, corrupted: 0 };
    private nextPort = 40000;

    constructor(options: SimulatedNetworkOptions = {}) {
        this.random = createRandom(options.seed ?? 1);
        this.conditions = options.conditions ?? {};
        this.logger = options.logger ?? defaultLogger.child('simnet');
    }

    public get stats(): NetworkStats {
        return { ...this.stats_ };
    }

    public setConditions(conditions: LinkConditions): void {
        this.conditions = conditions;
    }

    /**
     * Attaches a new endpoint. A bare name becomes `{ address: name, port }`
     * with a fresh port.
     */
    public endpoint(address: PeerAddress | string): SimulatedChannel {
        const local = typeof address === 'string' ? { address, port: this.nextPort++ } : address;
        const key = keyOf(local);
        if (this.endpoints.has(key)) {
            throw new Error(`Address ${key} is already in use`);
        }
        const channel = new SimulatedChannel(this, local);
        this.endpoints.set(key, channel);
        return channel;
    }

    /** Cancels every datagram still in the air. */
    public reset(): void {
        this.pending.forEach(timer => clearTimeout(timer));
        this.pending.clear();
    }

    /** @internal */
    public detach(channel: SimulatedChannel): void {
        this.endpoints.delete(keyOf(channel.address()));
    }

    /** @internal */
    public transmit(from: PeerAddress, to: PeerAddress, data: Uint8Array): void {
        this.stats_.sent++;
        const { lossRate = 0, duplicateRate = 0, corruptRate = 0, dropIf } = this.conditions;

        if (dropIf?.(data, from, to) || this.random() < lossRate) {
            this.stats_.dropped++;
            this.logger.wire(`drop ${formatPeer(from)} → ${formatPeer(to)} (${data.length} bytes)`);
            return;
        }

        const copy = data.slice();
        if (copy.length > 0 && this.random() < corruptRate) {
            const bit = Math.floor(this.random() * copy.length * 8);
            copy[bit >> 3] ^= 1 << (bit & 7);
            this.stats_.corrupted++;
        }

        this.schedule(from, to, copy);
        if (this.random() < duplicateRate) {
            this.stats_.duplicated++;
            this.schedule(from, to, copy.slice());
        }
    }

    private schedule(from: PeerAddress, to: PeerAddress, data: Uint8Array): void {
        const { minDelay = 0, maxDelay = minDelay } = this.conditions;
        const delay = minDelay + Math.floor(this.random() * (Math.max(minDelay, maxDelay) - minDelay + 1));
        const timer = setTimeout(() => {
            this.pending.delete(timer);
            const target = this.endpoints.get(keyOf(to));
            if (!target) {
                this.stats_.dropped++;
                return;
            }
            this.stats_.delivered++;
            target.receive(data, from);
        }, delay);
        this.pending.add(timer);
    }
}

/**
 * One endpoint of a SimulatedNetwork.
 */
export class SimulatedChannel extends EventEmitter<ChannelEvents> implements Channel {
    private closed = false;

    constructor(
        private readonly network: SimulatedNetwork,
        private readonly local: PeerAddress
    ) {
        super();
    }

    public address(): PeerAddress {
        return { ...this.local };
    }

    public get isClosed(): boolean {
        return this.closed;
    }

    public send(to: PeerAddress, data: Uint8Array): void {
        if (this.closed) return;
        this.network.transmit(this.local, to, data);
    }

    /** @internal */
    public receive(data: Uint8Array, from: PeerAddress): void {
        if (this.closed) return;
        this.emit('datagram', data, from);
    }

    public close(): void {
        if (this.closed) return;
        this.closed = true;
        this.network.detach(this);
        this.emit('close');
    }
}
