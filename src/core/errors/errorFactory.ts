// src/core/errors/errorFactory.ts

import * as Errors from './errors';

/**
 * Maps raw Node errors onto the securelink taxonomy.
 */
export class ErrorFactory {
    /**
     * Wraps a raw socket error (ECONNRESET, EADDRINUSE, ...) as a TransportError.
     */
    static fromSocketError(operation: string, error: unknown) {
        const reason = error instanceof Error ? error.message : String(error);
        const code = error instanceof Error && 'code' in error ? String(error.code) : undefined;
        return new Errors.TransportError(`${operation} failed: ${reason}`, {
            operation,
            details: code ? { code } : undefined,
        });
    }
}
