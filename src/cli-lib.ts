/**
 * arqlink command line: `recv` writes everything a peer delivers to stdout,
 * `send` delivers stdin to a peer. Everything process-specific goes through
 * `CliIo` so the commands run against a simulated network in tests.
 */

import cac from 'cac';
import { Console } from 'console';
import { z } from 'zod';
import { version } from '../package.json';
import { Session } from './core/Session';
import type { DeliveryHandle } from './core/DeliveryHandle';
import type { Channel } from './transport/Channel';
import { UdpChannel } from './transport/UdpChannel';
import { formatPeer, type PeerAddress } from './types';
import { Logger, LogLevel } from './utils/Logger';

export interface BoundChannel extends Channel {
    address(): PeerAddress;
}

export interface CliIo {
    stdin: AsyncIterable<Uint8Array>;
    stdout: { write(chunk: Uint8Array): unknown };
    logger: Logger;
    openChannel(port: number): Promise<BoundChannel>;
    onInterrupt(handler: () => void): void;
    setExitCode(code: number): void;
}

/** Flags and positionals may arrive as strings or already as numbers. */
const NumericArg = z.union([z.number(), z.string()]);
const PortSchema = NumericArg.pipe(z.coerce.number().int().min(0).max(65535));

const RecvOptionsSchema = z.object({
    port: PortSchema.default(0),
    mss: NumericArg.pipe(z.coerce.number()).optional(),
    debug: z.boolean().default(false),
});

const SendArgsSchema = z.object({
    host: z.string().min(1),
    port: PortSchema.refine(port => port > 0, 'port must be between 1 and 65535'),
    window: NumericArg.pipe(z.coerce.number()).optional(),
    mss: NumericArg.pipe(z.coerce.number()).optional(),
    debug: z.boolean().default(false),
});

export type RecvOptions = z.input<typeof RecvOptionsSchema>;
export type SendArgs = z.input<typeof SendArgsSchema>;

export interface SendSummary {
    submitted: number;
    failed: number;
}

/**
 * Writes payloads to `out` until the session closes.
 * @returns how many payloads were written
 */
export async function pipeMessages(session: Session, out: CliIo['stdout']): Promise<number> {
    let count = 0;
    for await (const payload of session.messages()) {
        out.write(payload);
        count++;
    }
    return count;
}

/**
 * Submits every chunk of `input`, then drains the session.
 * Waits for earlier submissions while the backlog is deep.
 */
export async function sendStream(
    session: Session,
    input: AsyncIterable<Uint8Array>,
    logger: Logger
): Promise<SendSummary> {
    const handles: DeliveryHandle[] = [];
    const highWater = session.config.windowCapacity * 8;

    for await (const chunk of input) {
        const previous = handles[handles.length - 1];
        if (previous && session.sender.queuedCount >= highWater) {
            await previous.result;
        }
        handles.push(session.submit(chunk));
    }

    await session.end();

    let failed = 0;
    for (const handle of handles) {
        const outcome = await handle.result;
        if (outcome.status === 'failed') {
            failed++;
            logger.error(`Submission ${outcome.ids[0]}..${outcome.ids[outcome.ids.length - 1]} failed: ${outcome.error.message}`);
        }
    }
    return { submitted: handles.length, failed };
}

export async function runRecv(options: RecvOptions, io: CliIo): Promise<number> {
    const { port, mss, debug } = RecvOptionsSchema.parse(options);
    if (debug) io.logger.setLogLevel(LogLevel.DEBUG);

    const channel = await io.openChannel(port);
    let session: Session;
    try {
        session = new Session({ channel, config: { maxSegmentSize: mss }, logger: io.logger });
    } catch (err) {
        channel.close();
        throw err;
    }
    io.logger.info(`Listening on port ${channel.address().port}`);
    io.onInterrupt(() => session.close());

    const count = await pipeMessages(session, io.stdout);
    channel.close();
    io.logger.info(`Received ${count} message(s)`);
    return 0;
}

export async function runSend(args: SendArgs, io: CliIo): Promise<number> {
    const { host, port, window, mss, debug } = SendArgsSchema.parse(args);
    if (debug) io.logger.setLogLevel(LogLevel.DEBUG);

    const peer = { address: host, port };
    const channel = await io.openChannel(0);
    let session: Session;
    try {
        session = new Session({
            channel,
            peer,
            config: { windowCapacity: window, maxSegmentSize: mss },
            logger: io.logger,
        });
    } catch (err) {
        channel.close();
        throw err;
    }
    io.onInterrupt(() => session.close());

    io.logger.info(`Sending to ${formatPeer(peer)}`);
    const summary = await sendStream(session, io.stdin, io.logger);
    channel.close();
    io.logger.info(`Sent ${summary.submitted - summary.failed}/${summary.submitted} submission(s)`);
    return summary.failed > 0 ? 1 : 0;
}

async function* readStdin(): AsyncIterable<Uint8Array> {
    for await (const chunk of process.stdin) {
        yield chunk instanceof Uint8Array ? chunk : Buffer.from(String(chunk));
    }
}

/** Process-backed io: UDP sockets, stdin/stdout, logs on stderr. */
export function nodeIo(): CliIo {
    const logger = new Logger('arqlink');
    logger.setOutput(new Console({ stdout: process.stderr, stderr: process.stderr }));
    return {
        stdin: readStdin(),
        stdout: process.stdout,
        logger,
        openChannel: port => UdpChannel.bind({ port, logger: logger.child('udp') }),
        onInterrupt: handler => {
            process.once('SIGINT', handler);
        },
        setExitCode: code => {
            process.exitCode = code;
        },
    };
}

export function createCLI(io: CliIo = nodeIo()) {
    const cli = cac('arqlink');

    const finish = (run: Promise<number>) => {
        run.then(
            code => io.setExitCode(code),
            (err: unknown) => {
                io.logger.error(err instanceof Error ? err.message : String(err));
                io.setExitCode(1);
            }
        );
    };

    cli
        .command('recv', 'Receive messages and write them to stdout')
        .option('--port <port>', 'UDP port to listen on (0 picks one)', { default: 0 })
        .option('--mss <bytes>', 'Largest payload accepted per packet; match the sender')
        .option('--debug', 'Log every datagram')
        .action((options: { port: number | string; mss?: number | string; debug?: boolean }) => {
            finish(runRecv({ port: options.port, mss: options.mss, debug: options.debug }, io));
        });

    cli
        .command('send <host> <port>', 'Deliver stdin to a receiver')
        .option('--window <packets>', 'Packets in flight at once')
        .option('--mss <bytes>', 'Largest payload per packet; the receiver needs the same --mss')
        .option('--debug', 'Log every datagram')
        .action((host: string, port: number | string, options: { window?: number | string; mss?: number | string; debug?: boolean }) => {
            finish(runSend({ host, port, window: options.window, mss: options.mss, debug: options.debug }, io));
        });

    cli.help();
    cli.version(version);
    return cli;
}
