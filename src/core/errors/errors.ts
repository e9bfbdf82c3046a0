// src/core/errors/errors.ts

import { SecureLinkError } from './SecureLinkError';
import { ErrorContext } from './ErrorContext';

/**
 * Thrown when settings are missing or invalid. Fatal at construction time.
 */
export class ConfigurationError extends SecureLinkError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'CONFIGURATION_ERROR',
            component: 'CONFIG',
            retryable: false,
            ...context
        });
        this.name = 'ConfigurationError';
    }
}

/**
 * Thrown for socket-level failures: bind, connect, reset, timeout, early close.
 * The offending socket has already been closed when this surfaces.
 */
export class TransportError extends SecureLinkError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'TRANSPORT_ERROR',
            component: 'NETWORK',
            retryable: true,
            ...context
        });
        this.name = 'TransportError';
    }
}

/**
 * Thrown when a frame fails to decrypt (bad padding, failed authentication).
 */
export class CryptoError extends SecureLinkError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'CRYPTO_ERROR',
            component: 'CRYPTO',
            retryable: false,
            ...context
        });
        this.name = 'CryptoError';
    }
}
