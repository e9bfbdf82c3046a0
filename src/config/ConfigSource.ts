// src/config/ConfigSource.ts

/**
 * Lookup of JSON settings by (domain, service name, version).
 * Returns null when no record exists.
 */
export interface ConfigSource {
    getConfiguration(domain: string, serviceName: string, version: string): Promise<string | null>;
}

export interface ConfigRecord {
    serviceType: string;
    serviceName: string;
    version: string;
    settings: Record<string, unknown>;
}
