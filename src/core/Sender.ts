/**
 * @file Sender.ts
 * @brief Sliding-window sender with per-packet adaptive retransmission.
 *
 * Submissions are split into segments, each given the next packet id and
 * encoded once. At most `windowCapacity` packets are in flight; the rest wait
 * in a FIFO backlog. Every in-flight packet has one deadline in a TimerQueue
 * and a single runtime timer is armed for the earliest of them.
 *
 * Packet lifecycle:
 *
 *     SENT ──ack──▶ ACKED (retired)
 *      │
 *      └─deadline─▶ RETRANSMITTING ──▶ SENT (timeout doubled) … ──▶ exhausted
 */

import { dataPacket, encodePacket } from '../codec';
import type { SessionConfig } from '../config';
import { DeliveryFailedError, QueueOverflowError, SessionClosedError } from '../errors';
import type { Clock } from '../types';
import { EventEmitter } from '../utils/EventEmitter';
import { Logger, logger as defaultLogger } from '../utils/Logger';
import { RingBuffer } from '../utils/RingBuffer';
import { DeliveryHandle } from './DeliveryHandle';
import { RtoEstimator } from './RtoEstimator';
import { TimerQueue } from './TimerQueue';

export type SenderState = 'ACTIVE' | 'DRAINING' | 'CLOSED';
export type PacketState = 'SENT' | 'RETRANSMITTING';

export interface SendEvent {
    id: number;
    bytes: number;
}

export interface RetransmitEvent {
    id: number;
    /** 1 for the first retransmission. */
    attempt: number;
    /** Timeout armed for this attempt, ms. */
    timeout: number;
}

export interface AckEvent {
    id: number;
    /** Present only when the packet was transmitted once. */
    rtt?: number;
}

export interface ExhaustedEvent {
    id: number;
    attempts: number;
}

export interface SenderEvents {
    send: [event: SendEvent];
    retransmit: [event: RetransmitEvent];
    ack: [event: AckEvent];
    exhausted: [event: ExhaustedEvent];
    state: [state: SenderState];
    [key: string]: unknown[];
}

export interface SenderStats {
    submitted: number;
    sent: number;
    retransmitted: number;
    acked: number;
    exhausted: number;
}

/** Read-only view of an in-flight packet. */
export interface InFlightInfo {
    id: number;
    state: PacketState;
    firstSentAt: number;
    lastSentAt: number;
    retransmits: number;
    timeout: number;
    deadline: number | undefined;
}

export interface SenderOptions {
    config: SessionConfig;
    /** Puts bytes on the wire towards the peer. May drop them. */
    transmit: (bytes: Uint8Array) => void;
    clock?: Clock;
    logger?: Logger;
}

interface Segment {
    id: number;
    bytes: Uint8Array;
    handle: DeliveryHandle;
}

interface InFlightRecord extends Segment {
    firstSentAt: number;
    lastSentAt: number;
    retransmits: number;
    timeout: number;
}

export class Sender extends EventEmitter<SenderEvents> {
    public readonly estimator: RtoEstimator;

    private readonly config: SessionConfig;
    private readonly transmit: (bytes: Uint8Array) => void;
    private readonly clock: Clock;
    private readonly logger: Logger;

    private state_: SenderState = 'ACTIVE';
    private nextId: number;
    private readonly inFlight = new Map<number, InFlightRecord>();
    private readonly backlog = new RingBuffer<Segment>();
    private readonly deadlines = new TimerQueue<number>();
    private alarm: ReturnType<typeof setTimeout> | null = null;
    private alarmAt: number | undefined;
    private drainWaiters: Array<() => void> = [];
    private readonly stats_: SenderStats = { submitted: 0, sent: 0, retransmitted: 0, acked: 0, exhausted: 0 };

    constructor(options: SenderOptions) {
        super();
        this.config = options.config;
        this.transmit = options.transmit;
        this.clock = options.clock ?? (() => Date.now());
        this.logger = options.logger ?? defaultLogger.child('sender');
        this.nextId = this.config.initialId;
        this.estimator = new RtoEstimator({
            initialRto: this.config.initialRto,
            minRto: this.config.minRto,
            maxRto: this.config.maxRto,
            alpha: this.config.rtoAlpha,
            beta: this.config.rtoBeta,
            k: this.config.rtoK,
            granularity: this.config.rtoGranularity,
        });
    }

    public get state(): SenderState {
        return this.state_;
    }

    public get inFlightCount(): number {
        return this.inFlight.size;
    }

    public get queuedCount(): number {
        return this.backlog.length;
    }

    public get stats(): SenderStats {
        return { ...this.stats_ };
    }

    public inspect(id: number): InFlightInfo | undefined {
        const record = this.inFlight.get(id);
        if (!record) return undefined;
        return {
            id: record.id,
            state: record.retransmits === 0 ? 'SENT' : 'RETRANSMITTING',
            firstSentAt: record.firstSentAt,
            lastSentAt: record.lastSentAt,
            retransmits: record.retransmits,
            timeout: record.timeout,
            deadline: this.deadlines.deadlineOf(id),
        };
    }

    /**
     * Queues `data` for reliable delivery.
     *
     * @throws {SessionClosedError} once `end()` or `close()` was called
     * @throws {QueueOverflowError} if the backlog would exceed `maxQueuedPackets`
     */
    public submit(data: Uint8Array): DeliveryHandle {
        if (this.state_ !== 'ACTIVE') {
            throw new SessionClosedError(`Cannot submit while ${this.state_}`);
        }

        const mss = this.config.maxSegmentSize;
        const count = Math.max(1, Math.ceil(data.length / mss));
        const freeSlots = Math.max(0, this.config.windowCapacity - this.inFlight.size);
        const projected = this.backlog.length + count - freeSlots;
        if (projected > this.config.maxQueuedPackets) {
            throw new QueueOverflowError(this.config.maxQueuedPackets);
        }

        const ids: number[] = [];
        for (let i = 0; i < count; i++) ids.push(this.nextId + i);
        this.nextId += count;

        const handle = new DeliveryHandle(ids);
        ids.forEach((id, i) => {
            const bytes = encodePacket(dataPacket(id, data.subarray(i * mss, (i + 1) * mss)));
            this.backlog.push({ id, bytes, handle });
        });
        this.stats_.submitted++;

        this.pump();
        this.rearm();
        return handle;
    }

    /**
     * Processes an acknowledgement.
     * @returns false for ids that are not in flight (duplicate, stale, unknown)
     */
    public handleAck(id: number): boolean {
        const record = this.inFlight.get(id);
        if (!record) {
            this.logger.wire(`ACK #${id} ignored (not in flight)`);
            return false;
        }

        this.retire(record);
        this.stats_.acked++;

        let rtt: number | undefined;
        if (record.retransmits === 0) {
            rtt = this.clock() - record.firstSentAt;
            this.estimator.onSample(rtt);
        }
        this.logger.wire(`ACK #${id}${rtt === undefined ? '' : ` rtt=${rtt}ms`}`);
        this.emit('ack', { id, rtt });
        record.handle.markAcked(id);

        this.afterChange();
        return true;
    }

    /**
     * Handles an expired deadline for `id`. Called by the internal alarm;
     * exposed so a driver with its own timer can call it directly.
     */
    public handleTimerFire(id: number): void {
        this.deadlines.cancel(id);
        this.expire(id, this.clock());
        this.afterChange();
    }

    /**
     * Stops accepting submissions and resolves once everything already
     * submitted is acknowledged or has failed.
     */
    public end(): Promise<void> {
        if (this.state_ === 'CLOSED') return Promise.resolve();
        if (this.state_ === 'ACTIVE') this.setState('DRAINING');

        const drained = new Promise<void>(resolve => this.drainWaiters.push(resolve));
        this.checkDrained();
        return drained;
    }

    /**
     * Tears down immediately. Unsettled submissions fail with
     * SessionClosedError; their `pendingIds()` are the unacked subset.
     */
    public close(): void {
        if (this.state_ === 'CLOSED') return;

        this.disarm();
        this.deadlines.clear();

        const unsettled = new Set<DeliveryHandle>();
        for (const record of this.inFlight.values()) unsettled.add(record.handle);
        for (const segment of this.backlog.toArray()) unsettled.add(segment.handle);
        this.inFlight.clear();
        this.backlog.clear();

        const error = new SessionClosedError('Session closed before delivery completed');
        let failed = 0;
        for (const handle of unsettled) {
            if (handle.fail(error)) failed++;
        }
        if (failed > 0) {
            this.logger.warn(`Closed with ${failed} unacknowledged submission(s)`);
        }

        this.setState('CLOSED');
        const waiters = this.drainWaiters;
        this.drainWaiters = [];
        waiters.forEach(resolve => resolve());
    }

    private pump(): void {
        while (this.inFlight.size < this.config.windowCapacity) {
            const segment = this.backlog.shift();
            if (!segment) break;

            const now = this.clock();
            const timeout = this.estimator.currentTimeout();
            const record: InFlightRecord = {
                ...segment,
                firstSentAt: now,
                lastSentAt: now,
                retransmits: 0,
                timeout,
            };
            this.inFlight.set(record.id, record);
            this.deadlines.schedule(record.id, now + timeout);
            this.put(record.bytes);
            this.stats_.sent++;
            this.logger.wire(`DATA #${record.id} sent (${record.bytes.length} bytes, rto=${timeout}ms)`);
            this.emit('send', { id: record.id, bytes: record.bytes.length });
        }
    }

    private expire(id: number, now: number): void {
        const record = this.inFlight.get(id);
        if (!record) return;

        if (record.retransmits >= this.config.maxRetriesPerPacket) {
            this.exhaust(record);
            return;
        }

        record.retransmits++;
        record.timeout = this.estimator.backoff(record.timeout);
        record.lastSentAt = now;
        this.deadlines.schedule(id, now + record.timeout);
        this.put(record.bytes);
        this.stats_.retransmitted++;
        this.logger.debug(`Retransmitting #${id} (attempt ${record.retransmits}, rto=${record.timeout}ms)`);
        this.emit('retransmit', { id, attempt: record.retransmits, timeout: record.timeout });
    }

    private exhaust(record: InFlightRecord): void {
        const attempts = record.retransmits + 1;
        this.retire(record);
        this.stats_.exhausted++;
        this.logger.warn(`Packet #${record.id} not acknowledged after ${attempts} transmission(s), giving up`);
        this.emit('exhausted', { id: record.id, attempts });

        // The rest of the submission cannot be delivered whole any more.
        for (const id of record.handle.pendingIds()) {
            const sibling = this.inFlight.get(id);
            if (sibling) this.retire(sibling);
        }
        this.dropQueued(record.handle);
        record.handle.fail(new DeliveryFailedError(record.id, attempts));
    }

    private dropQueued(handle: DeliveryHandle): void {
        const kept = this.backlog.toArray().filter(segment => segment.handle !== handle);
        if (kept.length === this.backlog.length) return;
        this.backlog.clear();
        kept.forEach(segment => this.backlog.push(segment));
    }

    private retire(record: InFlightRecord): void {
        this.inFlight.delete(record.id);
        this.deadlines.cancel(record.id);
    }

    private put(bytes: Uint8Array): void {
        try {
            this.transmit(bytes);
        } catch (err) {
            // Same as a lost datagram; the deadline covers it.
            this.logger.warn('Transmit failed:', err);
        }
    }

    private afterChange(): void {
        this.pump();
        this.rearm();
        this.checkDrained();
    }

    private checkDrained(): void {
        if (this.state_ === 'DRAINING' && this.inFlight.size === 0 && this.backlog.isEmpty) {
            this.close();
        }
    }

    private rearm(): void {
        const next = this.deadlines.peekDeadline();
        if (next === undefined) {
            this.disarm();
            return;
        }
        if (this.alarm !== null && this.alarmAt === next) return;

        this.disarm();
        this.alarmAt = next;
        this.alarm = setTimeout(() => this.onAlarm(), Math.max(0, Math.ceil(next - this.clock())));
    }

    private disarm(): void {
        if (this.alarm !== null) {
            clearTimeout(this.alarm);
            this.alarm = null;
        }
        this.alarmAt = undefined;
    }

    private onAlarm(): void {
        this.alarm = null;
        this.alarmAt = undefined;
        const now = this.clock();
        for (const id of this.deadlines.popExpired(now)) {
            this.expire(id, now);
        }
        this.afterChange();
    }

    private setState(state: SenderState): void {
        this.state_ = state;
        this.logger.debug(`State → ${state}`);
        this.emit('state', state);
    }
}

