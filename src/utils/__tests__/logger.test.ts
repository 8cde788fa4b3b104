/**
 * Unit tests for the structured logger
 *
 * Severity filtering, the line format, message sanitization and
 * credential redaction.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { logger, isLogLevel } from '../logger.js';

describe('Logger', () => {
    let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

    const lines = (): string[] => consoleErrorSpy.mock.calls.map((call) => String(call[0]));

    beforeEach(() => {
        vi.useFakeTimers();
        vi.setSystemTime(new Date('2025-01-02T03:04:05.000Z'));
        consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => { });
        logger.setLevel('debug');
    });

    afterEach(() => {
        consoleErrorSpy.mockRestore();
        vi.useRealTimers();
        logger.setLevel('info');
    });

    describe('Severity levels', () => {
        it('should log at all 8 severity levels', () => {
            logger.debug('debug message');
            logger.info('info message');
            logger.notice('notice message');
            logger.warn('warning message');
            logger.error('error message');
            logger.critical('critical message');
            logger.alert('alert message');
            logger.emergency('emergency message');

            expect(consoleErrorSpy).toHaveBeenCalledTimes(8);
        });

        it('should drop entries below the minimum level', () => {
            logger.setLevel('warning');

            logger.debug('debug');
            logger.info('info');
            logger.notice('notice');
            logger.warning('warning');
            logger.error('error');

            expect(lines()).toHaveLength(2);
        });

        it('should report the configured level', () => {
            logger.setLevel('critical');
            expect(logger.getLevel()).toBe('critical');
        });
    });

    describe('Line format', () => {
        it('should write timestamp, level, module, code, message and context', () => {
            logger.error('Failed to connect', { module: 'POOL', code: 'PG_CONNECT_FAILED', host: 'localhost' });

            expect(lines()).toEqual([
                '[2025-01-02T03:04:05.000Z] [ERROR] [POOL] [PG_CONNECT_FAILED] Failed to connect {"host":"localhost"}'
            ]);
        });

        it('should fall back to the default module and omit empty context', () => {
            logger.info('hello');
            expect(lines()).toEqual(['[2025-01-02T03:04:05.000Z] [INFO] [QUERY] hello']);
        });

        it('should tag entries from a module logger', () => {
            logger.forModule('CLI').warn('careful', { operation: 'ping' });
            expect(lines()).toEqual([
                '[2025-01-02T03:04:05.000Z] [WARNING] [CLI] careful {"operation":"ping"}'
            ]);
        });
    });

    describe('Message sanitization', () => {
        it('should strip control characters but keep tabs and newlines', () => {
            logger.info('a\x00b\x1B[2Kc\x7Fd\x9Fe\tf\ng', { module: 'CRUD' });
            expect(lines()).toEqual(['[2025-01-02T03:04:05.000Z] [INFO] [CRUD] ab[2Kcde\tf\ng']);
        });
    });

    describe('Credential redaction', () => {
        it('should redact sensitive keys at any depth', () => {
            logger.info('connecting', {
                module: 'POOL',
                password: 'test-secret',
                nested: { apiKey: 'test-key', rows: 2 }
            });

            expect(lines()).toEqual([
                '[2025-01-02T03:04:05.000Z] [INFO] [POOL] connecting {"password":"[REDACTED]","nested":{"apiKey":"[REDACTED]","rows":2}}'
            ]);
        });

        it('should match sensitive keys by substring', () => {
            logger.info('x', { module: 'CONFIG', dbPassword: 'test-secret', connectionString: 'postgres://x' });
            expect(lines()).toEqual([
                '[2025-01-02T03:04:05.000Z] [INFO] [CONFIG] x {"dbPassword":"[REDACTED]","connectionString":"[REDACTED]"}'
            ]);
        });

        it('should keep dates intact', () => {
            logger.info('x', { module: 'CRUD', at: new Date(0) });
            expect(lines()).toEqual([
                '[2025-01-02T03:04:05.000Z] [INFO] [CRUD] x {"at":"1970-01-01T00:00:00.000Z"}'
            ]);
        });
    });

    describe('isLogLevel', () => {
        it('should accept RFC 5424 level names only', () => {
            expect(isLogLevel('notice')).toBe(true);
            expect(isLogLevel('warn')).toBe(false);
            expect(isLogLevel('loud')).toBe(false);
        });
    });
});
