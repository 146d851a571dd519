/**
 * @file debug.ts
 * @brief Debug helpers for inspecting datagrams.
 *
 * Used when tracing or when a datagram is dropped as corrupt; not on the
 * normal send/receive path.
 *
 * @example
 * ```typescript
 * import { debugPacket } from 'arqlink';
 *
 * channel.on('datagram', (data) => console.log(debugPacket(data)));
 * ```
 */

import { decodePacket } from './codec';
import { CorruptPacketError } from './errors';

/**
 * One-line summary of a valid packet, or a short report with a hex header
 * for a datagram that fails decoding.
 */
export function debugPacket(data: Uint8Array): string {
    if (data.length === 0) {
        return '[Empty Datagram]';
    }

    try {
        const packet = decodePacket(data);
        const checksum = packet.checksum.toString(16).padStart(8, '0');
        if (packet.kind === 'DATA') {
            return `[DATA #${packet.id}: ${formatBytes(packet.payload.length)} payload, checksum ${checksum}]`;
        }
        return `[ACK #${packet.id}: checksum ${checksum}]`;
    } catch (err) {
        const reason = err instanceof CorruptPacketError ? err.reason : 'unknown';
        return [
            `[Corrupt Datagram: ${data.length} bytes, ${reason}]`,
            `  Header: ${hexDump(data.subarray(0, Math.min(16, data.length)))}`,
        ].join('\n');
    }
}

/**
 * Creates a hex dump of binary data (like xxd/hexdump).
 */
export function hexDump(data: Uint8Array, bytesPerLine: number = 16): string {
    if (data.length === 0) return '(empty)';

    const lines: string[] = [];
    for (let i = 0; i < data.length; i += bytesPerLine) {
        const slice = data.subarray(i, Math.min(i + bytesPerLine, data.length));
        const hex = Array.from(slice).map(b => b.toString(16).padStart(2, '0')).join(' ');
        const ascii = bytesToAscii(slice);
        const offset = i.toString(16).padStart(8, '0');
        lines.push(`${offset}  ${hex.padEnd(bytesPerLine * 3 - 1)}  |${ascii}|`);
    }

    return lines.join('\n');
}

/**
 * Converts bytes to ASCII, replacing non-printable characters with dots.
 */
function bytesToAscii(bytes: Uint8Array): string {
    return Array.from(bytes)
        .map(b => (b >= 32 && b <= 126) ? String.fromCharCode(b) : '.')
        .join('');
}

export function formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes} B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(2)} KB`;
    return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}
