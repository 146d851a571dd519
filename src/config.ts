import { z } from 'zod';
import { ConfigurationError } from './errors';

/**
 * Session configuration, validated once at setup.
 * A session never sends a packet under a configuration that failed here.
 */
export const SessionConfigSchema = z
    .object({
        /** Largest payload carried by a single DATA packet, in bytes. */
        maxSegmentSize: z.number().int().min(1).max(65000).default(1400),
        /** Maximum number of packets in flight (sent, not yet acked). */
        windowCapacity: z.number().int().min(1).default(16),
        /** Retransmission timeout used before the first RTT sample, in ms. */
        initialRto: z.number().positive().default(1000),
        minRto: z.number().positive().default(200),
        maxRto: z.number().positive().default(60000),
        /** Retransmissions allowed per packet before its submission fails. */
        maxRetriesPerPacket: z.number().int().min(0).default(8),
        rtoAlpha: z.number().gt(0).max(1).default(0.125),
        rtoBeta: z.number().gt(0).max(1).default(0.25),
        rtoK: z.number().positive().default(4),
        /** Timer granularity floor `G` added to the variance term, in ms. */
        rtoGranularity: z.number().min(0).default(10),
        /** First packet id of the session, shared by both ends. */
        initialId: z.number().int().min(0).max(Number.MAX_SAFE_INTEGER).default(0),
        /** Ids ahead of the expected one the receiver may hold back. 0 disables buffering. */
        reorderWindow: z.number().int().min(0).default(0),
        /** Upper bound on packets waiting for window space. */
        maxQueuedPackets: z.number().int().min(1).default(65536),
    })
    .strict()
    .refine(cfg => cfg.minRto <= cfg.maxRto, {
        message: 'minRto must not exceed maxRto',
        path: ['minRto'],
    });

export type SessionConfigInput = z.input<typeof SessionConfigSchema>;
export type SessionConfig = z.output<typeof SessionConfigSchema>;

/**
 * Applies defaults and validates.
 *
 * @throws {ConfigurationError} listing every offending field
 */
export function resolveConfig(input: SessionConfigInput = {}): SessionConfig {
    const result = SessionConfigSchema.safeParse(input);

    if (!result.success) {
        const issues = result.error.issues.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`);
        throw new ConfigurationError(`Invalid session configuration: ${issues.join(', ')}`, issues);
    }

    return result.data;
}
