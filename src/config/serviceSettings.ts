// src/config/serviceSettings.ts

import { z } from 'zod';
import { CONFIG } from './config';
import { ConfigSource } from './ConfigSource';
import { ConfigurationError } from '../core/errors';
import { Logger } from '../core/logging/Logger';
import type { SecurityPolicy } from '../core/security/types';
import type { CipherConfig } from '../core/crypto/types';

const positiveInt = z.number().int().positive();

const securitySchema = z.object({
    max_connections_per_window: positiveInt.default(CONFIG.SECURITY.MAX_CONNECTIONS_PER_WINDOW),
    max_bytes_per_window: positiveInt.default(CONFIG.SECURITY.MAX_BYTES_PER_WINDOW),
    socket_timeout_seconds: positiveInt.default(CONFIG.SECURITY.SOCKET_TIMEOUT_SECONDS),
    window_seconds: positiveInt.default(CONFIG.SECURITY.WINDOW_SECONDS),
}).default({}).transform((s): SecurityPolicy => ({
    maxConnectionsPerWindow: s.max_connections_per_window,
    maxBytesPerWindow: s.max_bytes_per_window,
    socketTimeoutSeconds: s.socket_timeout_seconds,
    windowSeconds: s.window_seconds,
}));

const cipherSchema = z.object({
    type: z.string().min(1),
    params: z.record(z.unknown()).default({}),
});

/**
 * Shape of one `network` settings record.
 */
export const serviceSettingsSchema = z.object({
    role: z.enum(['client', 'server']),
    host: z.string().min(1),
    port: z.number().int().min(0).max(65535),
    security: securitySchema,
    crypto: cipherSchema.optional(),
});

export type EndpointRole = 'client' | 'server';

export interface ServiceSettings {
    role: EndpointRole;
    host: string;
    port: number;
    security: SecurityPolicy;
    crypto?: CipherConfig;
}

/**
 * Parses and validates a settings JSON document.
 * @throws ConfigurationError on malformed JSON or invalid values
 */
export function parseServiceSettings(json: string, serviceName: string): ServiceSettings {
    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch (error) {
        throw new ConfigurationError(`Malformed settings JSON for ${serviceName}`, {
            operation: 'parseServiceSettings',
            details: error instanceof Error ? error.message : String(error),
        });
    }

    const result = serviceSettingsSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join('.') || 'settings'}: ${i.message}`);
        throw new ConfigurationError(`Invalid settings for ${serviceName}: ${issues.join('; ')}`, {
            operation: 'parseServiceSettings',
            details: { serviceName, issues },
        });
    }
    return result.data;
}

/**
 * Fetches and validates the `network` settings of a service.
 */
export async function loadServiceSettings(
    source: ConfigSource,
    serviceName: string,
    version: string = CONFIG.NETWORK.DEFAULT_VERSION
): Promise<ServiceSettings> {
    const json = await source.getConfiguration(CONFIG.NETWORK.CONFIG_DOMAIN, serviceName, version);
    if (json === null) {
        Logger.error('Settings', `Configuration not found for ${serviceName}:${version}`);
        throw new ConfigurationError(`Configuration not found for ${serviceName}:${version}`, {
            operation: 'loadServiceSettings',
            suggestion: 'Import the service settings into the config store first',
        });
    }
    return parseServiceSettings(json, serviceName);
}
