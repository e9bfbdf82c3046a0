// tests/unit/errors_logging.test.ts

import { ConfigurationError, CryptoError, ErrorFactory, SecureLinkError, TransportError } from '../../src/core/errors';
import { Logger, LogLevel } from '../../src/core/logging/Logger';

describe('Error taxonomy', () => {
    it.each([
        [new ConfigurationError('bad'), 'CONFIGURATION_ERROR', false],
        [new TransportError('reset'), 'TRANSPORT_ERROR', true],
        [new CryptoError('tag'), 'CRYPTO_ERROR', false],
    ])('%s carries its code and retry hint', (error, code, retryable) => {
        expect(error).toBeInstanceOf(SecureLinkError);
        expect(error.code).toBe(code);
        expect(error.context.retryable).toBe(retryable);
        expect(error.retryable).toBe(retryable);
    });

    it('lets callers override context fields', () => {
        expect(new TransportError('x', { retryable: false }).context.retryable).toBe(false);
    });

    it('formats a message with a tip', () => {
        const error = new ConfigurationError('Missing port', { suggestion: 'Set settings.port' });
        expect(error.toUserFriendly()).toBe('[CONFIGURATION_ERROR] Missing port\nTip: Set settings.port');
    });

    it('summarises itself for log lines', () => {
        const error = new CryptoError('AES-GCM authentication failed', { operation: 'decrypt', details: 'bad tag' });
        expect(error.retryable).toBe(false);
        expect(error.toLogContext()).toEqual({
            code: 'CRYPTO_ERROR',
            operation: 'decrypt',
            retryable: false,
            details: 'bad tag',
        });
    });

    it('wraps socket errors with their errno code', () => {
        const cause = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:1'), { code: 'ECONNREFUSED' });
        const error = ErrorFactory.fromSocketError('connect', cause);

        expect(error).toBeInstanceOf(TransportError);
        expect(error.message).toBe('connect failed: connect ECONNREFUSED 127.0.0.1:1');
        expect(error.context.details).toEqual({ code: 'ECONNREFUSED' });
        expect(error.context.operation).toBe('connect');
    });
});

describe('Logger', () => {
    const originalLevel = Logger.getLevel();

    afterEach(() => {
        Logger.setLevel(originalLevel);
        jest.restoreAllMocks();
    });

    it('redacts cipher material in context objects', () => {
        const line = Logger.formatMessage('INFO', 'Test', 'loaded', { type: 'aes-gcm', params: { key: 'abc', nonce: 'def' } });
        expect(line.endsWith('[INFO] [Test] loaded {"type":"aes-gcm","params":{"key":"[REDACTED]","nonce":"[REDACTED]"}}')).toBe(true);
    });

    it('redacts long base64 runs in messages', () => {
        const line = Logger.formatMessage('WARN', 'Test', 'key=MDEyMzQ1Njc4OWFiY2RlZg==');
        expect(line.endsWith('[WARN] [Test] key=[REDACTED]')).toBe(true);
    });

    it('drops messages below the current level', () => {
        const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        Logger.setLevel(LogLevel.WARN);

        Logger.info('Test', 'hidden');
        Logger.warn('Test', 'shown');

        expect(spy).toHaveBeenCalledTimes(1);
        expect(String(spy.mock.calls[0][0])).toContain('[WARN] [Test] shown');
    });
});
