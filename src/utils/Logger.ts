/**
 * Internal logging utility for arqlink.
 * Structured logging with levels and tags, so per-packet tracing can be
 * switched on for one session without flooding the others.
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4
}

type ConsoleMethod = 'debug' | 'info' | 'warn' | 'error';

/** Where log lines go. Defaults to the global console. */
export type LogOutput = Pick<Console, ConsoleMethod>;

export class Logger {
    private level: LogLevel = LogLevel.INFO;
    private tag: string;
    private useJson: boolean = false;
    private output: LogOutput = console;

    constructor(tag: string = 'arqlink', debug: boolean = false) {
        this.tag = tag;
        if (debug) {
            this.level = LogLevel.DEBUG;
        }
    }

    public setLogLevel(level: LogLevel): void {
        this.level = level;
    }

    public getLogLevel(): LogLevel {
        return this.level;
    }

    public setJson(enabled: boolean): void {
        this.useJson = enabled;
    }

    /**
     * Redirects output, e.g. to stderr when stdout carries data.
     */
    public setOutput(output: LogOutput): void {
        this.output = output;
    }

    private log(method: ConsoleMethod, levelName: string, message: string, ...args: unknown[]): void {
        if (this.useJson) {
            const entry = {
                timestamp: new Date().toISOString(),
                tag: this.tag,
                level: levelName,
                message,
                data: args.length > 0 ? args.map(arg => Logger.toViewable(arg)) : undefined
            };
            this.output[method](JSON.stringify(entry));
        } else {
            const prefix = `[${this.tag}]${levelName === 'DEBUG' ? ' (DEBUG)' : ''}${levelName === 'WARN' ? ' ⚠️' : ''}${levelName === 'ERROR' ? ' ❌' : ''}`;
            this.output[method](`${prefix} ${message}`, ...args);
        }
    }

    public debug(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.DEBUG) {
            this.log('debug', 'DEBUG', message, ...args);
        }
    }

    public info(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.INFO) {
            this.log('info', 'INFO', message, ...args);
        }
    }

    /**
     * Per-datagram trace (sends, acks, retransmissions). DEBUG level, no prefix noise.
     */
    public wire(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.DEBUG) {
            this.log('debug', 'WIRE', message, ...args);
        }
    }

    public warn(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.WARN) {
            this.log('warn', 'WARN', message, ...args);
        }
    }

    public error(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.ERROR) {
            this.log('error', 'ERROR', message, ...args);
        }
    }

    /**
     * Creates a child logger with an extended tag.
     */
    public child(subTag: string): Logger {
        const child = new Logger(`${this.tag}:${subTag}`);
        child.setLogLevel(this.level);
        child.setJson(this.useJson);
        child.setOutput(this.output);
        return child;
    }

    /**
     * Support for JSON.stringify(logger)
     */
    public toJSON() {
        return {
            tag: this.tag,
            level: this.level,
            useJson: this.useJson
        };
    }

    /**
     * Converts a value to a JSON-safe shape. Byte arrays become a short
     * `<N bytes: hex…>` summary instead of an index-keyed object.
     */
    public static toViewable(obj: unknown): unknown {
        if (obj === null || obj === undefined) return obj;
        if (obj instanceof Uint8Array) return Logger.summarizeBytes(obj);
        if (Array.isArray(obj)) return obj.map(item => Logger.toViewable(item));
        if (typeof obj === 'object') {
            const result: Record<string, unknown> = {};
            for (const [key, value] of Object.entries(obj)) {
                result[key] = Logger.toViewable(value);
            }
            return result;
        }
        return obj;
    }

    private static summarizeBytes(bytes: Uint8Array, max: number = 8): string {
        const hex = Array.from(bytes.subarray(0, max))
            .map(b => b.toString(16).padStart(2, '0'))
            .join('');
        return `<${bytes.length} bytes: ${hex}${bytes.length > max ? '…' : ''}>`;
    }
}

// Global default logger
export const logger = new Logger('arqlink');
