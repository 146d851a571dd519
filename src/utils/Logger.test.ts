import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { Logger, LogLevel, logger } from './Logger';

function spyConsole() {
    return {
        info: vi.spyOn(console, 'info').mockImplementation(() => { }),
        debug: vi.spyOn(console, 'debug').mockImplementation(() => { }),
        warn: vi.spyOn(console, 'warn').mockImplementation(() => { }),
        error: vi.spyOn(console, 'error').mockImplementation(() => { }),
    };
}

describe('Logger', () => {
    let spies: ReturnType<typeof spyConsole>;

    beforeEach(() => {
        spies = spyConsole();
        logger.setLogLevel(LogLevel.INFO);
        logger.setJson(false);
        logger.setOutput(console);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should log info messages by default', () => {
        logger.info('hello world');
        expect(spies.info).toHaveBeenCalledWith('[arqlink] hello world');
    });

    it('constructor with debug=true sets DEBUG level', () => {
        const debugLogger = new Logger('TestDebug', true);
        expect(debugLogger.getLogLevel()).toBe(LogLevel.DEBUG);
        debugLogger.debug('debug message');
        expect(spies.debug).toHaveBeenCalledWith('[TestDebug] (DEBUG) debug message');
    });

    it('error() logs with error prefix', () => {
        logger.error('something failed');
        expect(spies.error).toHaveBeenCalledWith('[arqlink] ❌ something failed');
    });

    it('warn() logs with warning prefix', () => {
        logger.warn('a warning');
        expect(spies.warn).toHaveBeenCalledWith('[arqlink] ⚠️ a warning');
    });

    it('should not log debug or wire messages by default', () => {
        logger.debug('should not see this');
        logger.wire('nor this');
        expect(spies.debug).not.toHaveBeenCalled();
    });

    it('wire() logs at DEBUG level without a level marker', () => {
        logger.setLogLevel(LogLevel.DEBUG);
        logger.wire('-> DATA #3');
        expect(spies.debug).toHaveBeenCalledWith('[arqlink] -> DATA #3');
    });

    it('respects log levels', () => {
        logger.setLogLevel(LogLevel.ERROR);
        logger.debug('test');
        logger.info('test');
        logger.warn('test');
        expect(spies.info).not.toHaveBeenCalled();
        expect(spies.warn).not.toHaveBeenCalled();
        expect(spies.debug).not.toHaveBeenCalled();

        logger.setLogLevel(LogLevel.NONE);
        logger.error('test');
        expect(spies.error).not.toHaveBeenCalled();
    });

    it('creates child loggers with inherited settings', () => {
        const child = logger.child('sender');
        child.info('started');
        expect(spies.info).toHaveBeenCalledWith('[arqlink:sender] started');
    });

    it('writes to a redirected output, shared with children', () => {
        const lines: string[] = [];
        const sink = {
            debug: (line: string) => lines.push(line),
            info: (line: string) => lines.push(line),
            warn: (line: string) => lines.push(line),
            error: (line: string) => lines.push(line),
        };
        logger.setOutput(sink);
        logger.info('one');
        logger.child('udp').warn('two');

        expect(lines).toEqual(['[arqlink] one', '[arqlink:udp] ⚠️ two']);
        expect(spies.info).not.toHaveBeenCalled();
    });

    it('logs in JSON mode and summarizes byte arrays', () => {
        logger.setJson(true);
        logger.info('test-json', { payload: new Uint8Array([0xde, 0xad]) });
        const parsed = JSON.parse(String(spies.info.mock.calls[0][0]));
        expect(parsed.message).toBe('test-json');
        expect(parsed.tag).toBe('arqlink');
        expect(parsed.level).toBe('INFO');
        expect(parsed.data).toEqual([{ payload: '<2 bytes: dead>' }]);
    });

    it('supports JSON output mode without data', () => {
        logger.setJson(true);
        logger.info('json-msg-no-data');
        const parsed = JSON.parse(String(spies.info.mock.calls[0][0]));
        expect(parsed.data).toBeUndefined();
    });

    it('serializes to JSON correctly via toJSON', () => {
        expect(logger.toJSON()).toEqual({
            tag: 'arqlink',
            level: LogLevel.INFO,
            useJson: false
        });
    });

    describe('toViewable', () => {
        it('truncates long byte arrays', () => {
            const bytes = new Uint8Array(10).fill(1);
            expect(Logger.toViewable(bytes)).toBe('<10 bytes: 0101010101010101…>');
        });

        it('recursively handles objects and arrays', () => {
            const input = { a: [new Uint8Array([1])], b: { c: 3 } };
            expect(Logger.toViewable(input)).toEqual({ a: ['<1 bytes: 01>'], b: { c: 3 } });
        });

        it('handles null and undefined', () => {
            expect(Logger.toViewable(null)).toBeNull();
            expect(Logger.toViewable(undefined)).toBeUndefined();
        });

        it('preserves other types', () => {
            expect(Logger.toViewable('text')).toBe('text');
            expect(Logger.toViewable(123)).toBe(123);
            expect(Logger.toViewable(true)).toBe(true);
        });
    });
});
