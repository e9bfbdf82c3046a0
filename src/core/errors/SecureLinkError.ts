// src/core/errors/SecureLinkError.ts

import { ErrorContext } from './ErrorContext';

/**
 * Base error for every failure raised by securelink.
 * Subclasses fix the code, component and retry hint; callers may override them.
 */
export class SecureLinkError extends Error {
    public readonly context: ErrorContext;
    public readonly timestamp: number;

    constructor(message: string, context: ErrorContext = {}) {
        super(message);
        this.name = 'SecureLinkError';
        this.context = context;
        this.timestamp = Date.now();

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    public get code(): string {
        return this.context.code || 'ERROR';
    }

    /**
     * Whether a fresh connection or endpoint may succeed where this one failed.
     */
    public get retryable(): boolean {
        return this.context.retryable ?? false;
    }

    /**
     * Fields attached to a log line when the error is reported rather than thrown.
     */
    public toLogContext(): Record<string, unknown> {
        return {
            code: this.code,
            operation: this.context.operation,
            retryable: this.retryable,
            details: this.context.details,
        };
    }

    /**
     * Formats a message suitable for operators.
     */
    public toUserFriendly(): string {
        let msg = `[${this.code}] ${this.message}`;
        if (this.context.suggestion) {
            msg += `\nTip: ${this.context.suggestion}`;
        }
        return msg;
    }
}
