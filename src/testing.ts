/**
 * arqlink testing utilities.
 *
 * Ship these as first-class exports so applications can test code built on
 * sessions without sockets: two sessions wired together through a
 * SimulatedNetwork, with whatever impairments the test needs.
 */

import { Session } from './core/Session';
import type { SessionConfigInput } from './config';
import { SimulatedNetwork, type LinkConditions, type SimulatedChannel } from './transport/SimulatedNetwork';
import { Logger, LogLevel } from './utils/Logger';

/** A logger that prints nothing. */
export function silentLogger(tag: string = 'test'): Logger {
    const log = new Logger(tag);
    log.setLogLevel(LogLevel.NONE);
    return log;
}

export interface LinkedSessionsOptions {
    seed?: number;
    conditions?: LinkConditions;
    /** Applied to both ends. */
    config?: SessionConfigInput;
    /** Overrides for the second session only. */
    receiverConfig?: SessionConfigInput;
    logger?: Logger;
}

export interface LinkedSessions {
    network: SimulatedNetwork;
    /** Usually the sending side. */
    alice: Session;
    bob: Session;
    aliceChannel: SimulatedChannel;
    bobChannel: SimulatedChannel;
    /** Closes both sessions and drops datagrams still in the air. */
    teardown(): void;
}

/** Two sessions that know each other's address. */
export function createLinkedSessions(options: LinkedSessionsOptions = {}): LinkedSessions {
    const logger = options.logger ?? silentLogger();
    const network = new SimulatedNetwork({ seed: options.seed, conditions: options.conditions, logger });
    const aliceChannel = network.endpoint('alice');
    const bobChannel = network.endpoint('bob');

    const alice = new Session({
        channel: aliceChannel,
        peer: bobChannel.address(),
        config: options.config,
        logger,
    });
    const bob = new Session({
        channel: bobChannel,
        peer: aliceChannel.address(),
        config: { ...options.config, ...options.receiverConfig },
        logger,
    });

    return {
        network,
        alice,
        bob,
        aliceChannel,
        bobChannel,
        teardown() {
            alice.close();
            bob.close();
            network.reset();
        },
    };
}

/** Payloads the session delivers from now on, decoded as UTF-8. */
export function collectText(session: Session): string[] {
    const decoder = new TextDecoder();
    const received: string[] = [];
    session.receiver.on('deliver', ({ payload }) => received.push(decoder.decode(payload)));
    return received;
}

export function text(value: string): Uint8Array {
    return new TextEncoder().encode(value);
}
