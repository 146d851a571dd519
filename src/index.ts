/**
 * arqlink - reliable, in-order message delivery over unreliable datagram channels
 *
 * Sliding-window ARQ with per-packet adaptive retransmission timeouts.
 *
 * @example
 * ```typescript
 * import { Session, UdpChannel } from 'arqlink';
 *
 * const channel = await UdpChannel.bind();
 * const session = new Session({ channel, peer: { address: '127.0.0.1', port: 9000 } });
 *
 * const handle = session.submit(new TextEncoder().encode('Hello, world!'));
 * const outcome = await handle.result;
 * await session.end();
 * channel.close();
 * ```
 *
 * @packageDocumentation
 */

export { Session } from './core/Session';
export type { SessionOptions, SessionEvents, SessionState, SessionStats } from './core/Session';

export { Sender } from './core/Sender';
export type {
    SenderOptions,
    SenderEvents,
    SenderState,
    SenderStats,
    PacketState,
    InFlightInfo,
    SendEvent,
    RetransmitEvent,
    AckEvent,
    ExhaustedEvent,
} from './core/Sender';

export { Receiver } from './core/Receiver';
export type { ReceiverOptions, ReceiverEvents, ReceiverStats, ReceiveOutcome, DiscardReason } from './core/Receiver';

export { DeliveryHandle } from './core/DeliveryHandle';
export type { DeliveryOutcome, DeliveryStatus } from './core/DeliveryHandle';

export { RtoEstimator, defaultRtoParameters } from './core/RtoEstimator';
export type { RtoParameters } from './core/RtoEstimator';
export { TimerQueue } from './core/TimerQueue';

// Wire format
export { encodePacket, decodePacket, computeChecksum, dataPacket, ackPacket, WirePacketSchema } from './codec';
export type { DecodeOptions } from './codec';
export { debugPacket, hexDump, formatBytes } from './debug';

// Configuration
export { SessionConfigSchema, resolveConfig } from './config';
export type { SessionConfig, SessionConfigInput } from './config';

// Errors
export {
    ArqError,
    ConfigurationError,
    CorruptPacketError,
    DeliveryFailedError,
    SessionClosedError,
    QueueOverflowError,
} from './errors';
export type { CorruptionReason } from './errors';

// Channels
export type { Channel, ChannelEvents } from './transport/Channel';
export { UdpChannel } from './transport/UdpChannel';
export type { UdpChannelOptions } from './transport/UdpChannel';
export { SimulatedNetwork, SimulatedChannel } from './transport/SimulatedNetwork';
export type { LinkConditions, NetworkStats, SimulatedNetworkOptions } from './transport/SimulatedNetwork';

// Types
export type { Packet, PacketInput, PacketKind, DataPacket, AckPacket, PeerAddress, Clock } from './types';
export { formatPeer, samePeer } from './types';

// Utilities
export { Logger, LogLevel, logger } from './utils/Logger';
export type { LogOutput } from './utils/Logger';
export { EventEmitter } from './utils/EventEmitter';

// Testing
export { createLinkedSessions, silentLogger, collectText, text } from './testing';
export type { LinkedSessions, LinkedSessionsOptions } from './testing';
