/**
 * @file codec.ts
 * @brief Packet framing and integrity checking.
 *
 * A packet travels as a MessagePack map with a fixed key order:
 *
 *     { id, kind, payload?, checksum }
 *
 * `checksum` is the first four bytes (big-endian) of the SHA-256 of the
 * MessagePack encoding of `[id, kind, payload?]`. Encoding is deterministic,
 * so a retransmission is byte-identical to the first transmission.
 *
 * @example
 * ```typescript
 * const bytes = encodePacket({ id: 0, kind: 'DATA', payload: new Uint8Array([104, 105]) });
 * const packet = decodePacket(bytes); // throws CorruptPacketError on damage
 * ```
 */

import { createHash } from 'crypto';
import { encode, decode } from '@msgpack/msgpack';
import { z } from 'zod';
import { CorruptPacketError } from './errors';
import type { AckPacket, DataPacket, Packet, PacketInput, PacketKind } from './types';

const MAX_CHECKSUM = 0xffffffff;

const PacketIdSchema = z.number().int().min(0).max(Number.MAX_SAFE_INTEGER);
const ChecksumSchema = z.number().int().min(0).max(MAX_CHECKSUM);

const DataPacketSchema = z.object({
    id: PacketIdSchema,
    kind: z.literal('DATA'),
    payload: z.instanceof(Uint8Array),
    checksum: ChecksumSchema,
}).strict();

const AckPacketSchema = z.object({
    id: PacketIdSchema,
    kind: z.literal('ACK'),
    checksum: ChecksumSchema,
}).strict();

export const WirePacketSchema = z.discriminatedUnion('kind', [DataPacketSchema, AckPacketSchema]);

export interface DecodeOptions {
    /** Reject DATA packets whose payload exceeds this many bytes. */
    maxPayload?: number;
}

/**
 * Digest over the packet's fields, excluding the checksum itself.
 */
export function computeChecksum(id: number, kind: PacketKind, payload?: Uint8Array): number {
    const fields = payload === undefined ? [id, kind] : [id, kind, payload];
    return createHash('sha256').update(encode(fields)).digest().readUInt32BE(0);
}

/**
 * Frames a packet for the wire. Same input, same bytes.
 *
 * @throws {RangeError} if the id is not a non-negative safe integer
 */
export function encodePacket(packet: PacketInput): Uint8Array {
    if (!PacketIdSchema.safeParse(packet.id).success) {
        throw new RangeError(`Packet id must be a non-negative safe integer, got ${packet.id}`);
    }

    if (packet.kind === 'DATA') {
        return encode({
            id: packet.id,
            kind: packet.kind,
            payload: packet.payload,
            checksum: computeChecksum(packet.id, packet.kind, packet.payload),
        });
    }

    return encode({
        id: packet.id,
        kind: packet.kind,
        checksum: computeChecksum(packet.id, packet.kind),
    });
}

/**
 * Parses and verifies a datagram.
 *
 * Two independent checks, both must pass: the bytes must parse into the
 * packet structure for the declared kind, and the recomputed checksum must
 * equal the transmitted one.
 *
 * @throws {CorruptPacketError} with `reason` `'structure'` or `'checksum'`
 */
export function decodePacket(bytes: Uint8Array, options: DecodeOptions = {}): Packet {
    let raw: unknown;
    try {
        raw = decode(bytes);
    } catch (error) {
        throw new CorruptPacketError(
            `Undecodable datagram: ${error instanceof Error ? error.message : 'Unknown error'}`,
            'structure'
        );
    }

    const result = WirePacketSchema.safeParse(raw);
    if (!result.success) {
        const errorMessages = result.error.issues
            .map(e => `${e.path.join('.') || '(root)'}: ${e.message}`)
            .join(', ');
        throw new CorruptPacketError(`Malformed packet: ${errorMessages}`, 'structure');
    }

    const wire = result.data;
    if (wire.kind === 'DATA') {
        if (options.maxPayload !== undefined && wire.payload.length > options.maxPayload) {
            throw new CorruptPacketError(
                `Payload of ${wire.payload.length} bytes exceeds segment size ${options.maxPayload}`,
                'structure'
            );
        }
        verifyChecksum(wire.checksum, computeChecksum(wire.id, wire.kind, wire.payload), wire.id);
        // Detach from the datagram buffer the decoder may still be viewing.
        return { id: wire.id, kind: 'DATA', payload: new Uint8Array(wire.payload), checksum: wire.checksum };
    }

    verifyChecksum(wire.checksum, computeChecksum(wire.id, wire.kind), wire.id);
    return { id: wire.id, kind: 'ACK', checksum: wire.checksum };
}

function verifyChecksum(transmitted: number, computed: number, id: number): void {
    if (transmitted !== computed) {
        throw new CorruptPacketError(
            `Checksum mismatch for packet ${id}: got ${hex32(transmitted)}, expected ${hex32(computed)}`,
            'checksum'
        );
    }
}

function hex32(value: number): string {
    return `0x${value.toString(16).padStart(8, '0')}`;
}

export function dataPacket(id: number, payload: Uint8Array): DataPacket {
    return { id, kind: 'DATA', payload };
}

export function ackPacket(id: number): AckPacket {
    return { id, kind: 'ACK' };
}
