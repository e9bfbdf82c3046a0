// src/core/logging/Logger.ts

/**
 * Structured Logger Service
 *
 * Centralizes logging to ensure:
 * 1. Structured output (timestamps, levels, modules)
 * 2. Key material redaction (cipher keys, IVs, nonces never reach the log)
 * 3. Configurable verbosity
 */

import { ENV } from '../../config/env';

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
};

function initialLevel(): LogLevel {
    if (ENV.LOG_LEVEL) {
        return LEVEL_NAMES[ENV.LOG_LEVEL];
    }
    return ENV.NODE_ENV === 'production' ? LogLevel.INFO : LogLevel.DEBUG;
}

export class Logger {
    private static currentLevel: LogLevel = initialLevel();

    /**
     * Object keys whose values are cipher material.
     */
    private static SECRET_KEYS = new Set(['key', 'iv', 'nonce', 'byte']);

    /**
     * Long base64 runs in free text (an inlined key or IV). A digit and an
     * uppercase letter are required so file paths survive.
     */
    private static SECRET_REGEX = /(?=[A-Za-z0-9+/]*[0-9])(?=[A-Za-z0-9+/]*[A-Z])[A-Za-z0-9+/]{16,}={0,2}/g;

    public static setLevel(level: LogLevel): void {
        this.currentLevel = level;
    }

    public static getLevel(): LogLevel {
        return this.currentLevel;
    }

    /**
     * Redacts secrets from string or object
     */
    private static redact(message: unknown): unknown {
        if (typeof message === 'string') {
            return message.replace(this.SECRET_REGEX, '[REDACTED]');
        }
        if (typeof message === 'object' && message !== null) {
            try {
                return JSON.parse(JSON.stringify(message, (key: string, value: unknown) =>
                    this.SECRET_KEYS.has(key) ? '[REDACTED]' : value
                ));
            } catch {
                return '[Unserializable]';
            }
        }
        return message;
    }

    public static formatMessage(level: string, module: string, message: unknown, context?: unknown): string {
        const timestamp = new Date().toISOString();
        const safeMessage = this.redact(message);

        let log = `[${timestamp}] [${level}] [${module}] ${typeof safeMessage === 'string' ? safeMessage : JSON.stringify(safeMessage)}`;

        if (context !== undefined) {
            log += ` ${JSON.stringify(this.redact(context))}`;
        }

        return log;
    }

    public static debug(module: string, message: unknown, context?: unknown): void {
        if (this.currentLevel <= LogLevel.DEBUG) {
            console.error(this.formatMessage('DEBUG', module, message, context));
        }
    }

    public static info(module: string, message: unknown, context?: unknown): void {
        if (this.currentLevel <= LogLevel.INFO) {
            console.error(this.formatMessage('INFO', module, message, context));
        }
    }

    public static warn(module: string, message: unknown, context?: unknown): void {
        if (this.currentLevel <= LogLevel.WARN) {
            console.error(this.formatMessage('WARN', module, message, context));
        }
    }

    public static error(module: string, message: unknown, error?: unknown): void {
        if (this.currentLevel <= LogLevel.ERROR) {
            let errorDetails = '';
            if (error instanceof Error) {
                errorDetails = ` Stack: ${error.stack}`;
            } else if (error !== undefined) {
                errorDetails = ` Details: ${JSON.stringify(this.redact(error))}`;
            }

            console.error(this.formatMessage('ERROR', module, message) + errorDetails);
        }
    }
}
