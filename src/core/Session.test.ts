import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Session } from './Session';
import { encodePacket } from '../codec';
import { ConfigurationError, SessionClosedError } from '../errors';
import { SimulatedNetwork } from '../transport/SimulatedNetwork';
import { collectText, createLinkedSessions, silentLogger, text } from '../testing';
import type { PeerAddress } from '../types';

describe('Session', () => {
    beforeEach(() => {
        vi.useFakeTimers({ now: 0 });
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('rejects invalid configuration', () => {
        const net = new SimulatedNetwork({ logger: silentLogger() });
        const create = () => new Session({
            channel: net.endpoint('a'),
            config: { windowCapacity: 0 },
            logger: silentLogger(),
        });
        expect(create).toThrow(ConfigurationError);
    });

    it('delivers a submission end to end', async () => {
        const { alice, bob } = createLinkedSessions({ conditions: { minDelay: 5, maxDelay: 5 } });
        const received = collectText(bob);

        const handle = alice.submit(text('hello'));
        await vi.advanceTimersByTimeAsync(10);

        expect(received).toEqual(['hello']);
        expect(await handle.result).toEqual({ status: 'delivered', ids: [0] });
        expect(alice.sender.inFlightCount).toBe(0);
    });

    it('refuses to submit before a peer is known, then learns it from traffic', async () => {
        const net = new SimulatedNetwork({ logger: silentLogger() });
        const server = new Session({ channel: net.endpoint('server'), logger: silentLogger() });
        expect(() => server.submit(text('too early'))).toThrow(ConfigurationError);

        const clientChannel = net.endpoint('client');
        const client = new Session({
            channel: clientChannel,
            peer: { address: 'server', port: 40000 },
            logger: silentLogger(),
        });
        const peers: PeerAddress[] = [];
        server.on('peer', peer => peers.push(peer));
        const replies = collectText(client);

        client.submit(text('ping'));
        await vi.advanceTimersByTimeAsync(0);
        expect(peers).toEqual([clientChannel.address()]);
        expect(server.peer).toEqual(clientChannel.address());

        server.submit(text('pong'));
        await vi.advanceTimersByTimeAsync(0);
        expect(replies).toEqual(['pong']);
    });

    it('drops corrupt datagrams without learning their source', async () => {
        const net = new SimulatedNetwork({ logger: silentLogger() });
        const channel = net.endpoint('server');
        const session = new Session({ channel, logger: silentLogger() });
        const other = net.endpoint('noise');
        const reasons: string[] = [];
        session.on('corrupt', ({ error }) => reasons.push(error.reason));

        other.send(channel.address(), new Uint8Array([0xc1]));
        const ack = encodePacket({ id: 0, kind: 'ACK' });
        ack[ack.length - 1] ^= 0x01;
        other.send(channel.address(), ack);
        await vi.advanceTimersByTimeAsync(0);

        expect(reasons).toEqual(['structure', 'checksum']);
        expect(session.stats.corrupt).toBe(2);
        expect(session.peer).toBeNull();
    });

    it('rejects oversized payloads as corrupt', async () => {
        const { alice, bob, aliceChannel, bobChannel } = createLinkedSessions({
            receiverConfig: { maxSegmentSize: 4 },
        });
        const received = collectText(bob);

        aliceChannel.send(bobChannel.address(), encodePacket({ id: 0, kind: 'DATA', payload: text('too long') }));
        await vi.advanceTimersByTimeAsync(0);

        expect(received).toEqual([]);
        expect(bob.stats.corrupt).toBe(1);
        alice.close();
    });

    it('carries traffic both ways at once', async () => {
        const { alice, bob } = createLinkedSessions({ conditions: { minDelay: 1, maxDelay: 3 } });
        const atAlice = collectText(alice);
        const atBob = collectText(bob);

        alice.submit(text('a1'));
        bob.submit(text('b1'));
        alice.submit(text('a2'));
        bob.submit(text('b2'));
        await vi.runAllTimersAsync();

        expect(atBob).toEqual(['a1', 'a2']);
        expect(atAlice).toEqual(['b1', 'b2']);
    });

    it('drains on end() and then stops listening to the channel', async () => {
        const { alice, bob, aliceChannel } = createLinkedSessions({ conditions: { minDelay: 5, maxDelay: 5 } });
        collectText(bob);
        const states: string[] = [];
        alice.on('state', state => states.push(state));

        const handle = alice.submit(text('last words'));
        const ended = alice.end();
        expect(() => alice.submit(text('more'))).toThrow(SessionClosedError);

        await vi.advanceTimersByTimeAsync(10);
        await ended;

        expect(handle.status).toBe('delivered');
        expect(states).toEqual(['DRAINING', 'CLOSED']);
        expect(alice.state).toBe('CLOSED');
        expect(aliceChannel.listenerCount('datagram')).toBe(0);
        expect(aliceChannel.isClosed).toBe(false);
    });

    it('stops acking the peer once end() has drained', async () => {
        const { alice, bob } = createLinkedSessions({ conditions: { minDelay: 5, maxDelay: 5 } });
        const atAlice = collectText(alice);

        alice.submit(text('a'));
        const ended = alice.end();
        await vi.advanceTimersByTimeAsync(8);
        const late = bob.submit(text('b'));
        await vi.advanceTimersByTimeAsync(12);
        await ended;

        expect(alice.state).toBe('CLOSED');
        expect(atAlice).toEqual([]);
        expect(alice.stats.receiver.delivered).toBe(0);
        expect(late.status).toBe('pending');
        expect(bob.sender.inFlightCount).toBe(1);
        bob.close();
    });

    it('fails outstanding submissions on close', async () => {
        const { alice } = createLinkedSessions({ conditions: { lossRate: 1 } });
        const handle = alice.submit(text('never'));

        alice.close();

        const outcome = await handle.result;
        expect(outcome.status).toBe('failed');
        expect(outcome.status === 'failed' && outcome.error).toBeInstanceOf(SessionClosedError);
        expect(vi.getTimerCount()).toBe(0);
    });

    it('ends the message stream on close', async () => {
        const { alice, bob } = createLinkedSessions();
        alice.submit(text('one'));
        alice.submit(text('two'));
        await vi.advanceTimersByTimeAsync(0);
        bob.close();

        const received: string[] = [];
        for await (const payload of bob.messages()) {
            received.push(new TextDecoder().decode(payload));
        }
        expect(received).toEqual(['one', 'two']);
        alice.close();
    });
});
