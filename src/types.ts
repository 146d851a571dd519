/**
 * arqlink - Type Definitions
 *
 * Wire packets, addresses and the small shared vocabulary used by the
 * sender, receiver and session. Component-specific event maps live beside
 * their components.
 */

// =============================================================================
// Wire Packets
// =============================================================================

export type PacketKind = 'DATA' | 'ACK';

/** A data-carrying packet. */
export interface DataPacket {
    id: number;
    kind: 'DATA';
    payload: Uint8Array;
}

/** Acknowledges the DATA packet with the same id. */
export interface AckPacket {
    id: number;
    kind: 'ACK';
}

/** Packet fields before framing (no checksum yet). */
export type PacketInput = DataPacket | AckPacket;

/** A decoded packet, with the checksum it was verified against. */
export type Packet = PacketInput & { checksum: number };

// =============================================================================
// Addressing & Time
// =============================================================================

/** Where a datagram came from or is going. */
export interface PeerAddress {
    address: string;
    port: number;
}

/** Milliseconds on a monotonic-enough clock. Defaults to `Date.now`. */
export type Clock = () => number;

export function formatPeer(peer: PeerAddress): string {
    return peer.address.includes(':') ? `[${peer.address}]:${peer.port}` : `${peer.address}:${peer.port}`;
}

export function samePeer(a: PeerAddress, b: PeerAddress): boolean {
    return a.address === b.address && a.port === b.port;
}
