import { describe, it, expect } from 'vitest';
import { formatPeer, samePeer } from './types';

describe('peer addresses', () => {
    it('formats IPv4 and IPv6 peers', () => {
        expect(formatPeer({ address: '127.0.0.1', port: 9000 })).toBe('127.0.0.1:9000');
        expect(formatPeer({ address: '::1', port: 9000 })).toBe('[::1]:9000');
    });

    it('compares address and port', () => {
        const a = { address: '10.0.0.1', port: 1 };
        expect(samePeer(a, { address: '10.0.0.1', port: 1 })).toBe(true);
        expect(samePeer(a, { address: '10.0.0.1', port: 2 })).toBe(false);
        expect(samePeer(a, { address: '10.0.0.2', port: 1 })).toBe(false);
    });
});
