/**
 * Error types for arqlink.
 *
 * Every error raised by the library carries a stable string `code` so callers
 * can branch on the failure mode without matching on messages.
 */

/**
 * Base class for all arqlink errors.
 */
export class ArqError extends Error {
    constructor(message: string, public readonly code: string) {
        super(message);
        this.name = 'ArqError';
        // Maintains proper stack trace for where error was thrown (V8 only)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, ArqError);
        }
    }
}

/**
 * Thrown when session configuration is invalid, before any packet is sent.
 */
export class ConfigurationError extends ArqError {
    constructor(message: string, public readonly issues: string[] = []) {
        super(message, 'CONFIGURATION_ERROR');
        this.name = 'ConfigurationError';
    }
}

export type CorruptionReason = 'structure' | 'checksum';

/**
 * Raised by the codec when a datagram fails structural or checksum validation.
 * Sessions catch it and drop the datagram; it never reaches the application.
 */
export class CorruptPacketError extends ArqError {
    constructor(
        message: string,
        public readonly reason: CorruptionReason
    ) {
        super(message, 'CORRUPT_PACKET');
        this.name = 'CorruptPacketError';
    }
}

/**
 * A packet exhausted its retry ceiling. Fails the submission that owned it.
 */
export class DeliveryFailedError extends ArqError {
    constructor(
        public readonly packetId: number,
        public readonly attempts: number
    ) {
        super(
            `Packet ${packetId} was not acknowledged after ${attempts} transmission(s)`,
            'DELIVERY_FAILED'
        );
        this.name = 'DeliveryFailedError';
    }
}

/**
 * Thrown on submit after the sender left ACTIVE, and used to fail submissions
 * still unacknowledged when a session is torn down.
 */
export class SessionClosedError extends ArqError {
    constructor(message: string = 'Session is closed') {
        super(message, 'SESSION_CLOSED');
        this.name = 'SessionClosedError';
    }
}

/**
 * Thrown when the send backlog would exceed its capacity.
 */
export class QueueOverflowError extends ArqError {
    constructor(maxSize: number) {
        super(
            `Send backlog exceeded maximum capacity of ${maxSize} packets. ` +
            'Consider increasing maxQueuedPackets or awaiting earlier submissions.',
            'QUEUE_OVERFLOW'
        );
        this.name = 'QueueOverflowError';
    }
}
