import fs from 'fs';
import { z } from 'zod';
import { and, asc, eq } from 'drizzle-orm';
import { ConfigRecord, ConfigSource } from '../../config/ConfigSource';
import { ConfigurationError } from '../../core/errors';
import { Logger } from '../../core/logging/Logger';
import { DatabaseHandle, openDatabase } from './index';
import { ConfigurationRow, configurations } from './schema';

const recordSchema = z.object({
    service_type: z.string().min(1),
    service_name: z.string().min(1),
    version: z.string().min(1),
    settings: z.record(z.unknown()),
});

const recordFileSchema = z.array(recordSchema);

/**
 * ConfigStore
 * SQLite-backed ConfigSource. Settings are stored as JSON text and handed
 * back untouched; validation belongs to whoever consumes them.
 */
export class ConfigStore implements ConfigSource {
    private handle: DatabaseHandle | null;

    constructor(dbPath: string) {
        this.handle = openDatabase(dbPath);
    }

    public async getConfiguration(domain: string, serviceName: string, version: string): Promise<string | null> {
        const row = this.requireHandle().db
            .select({ settings: configurations.settings })
            .from(configurations)
            .where(and(
                eq(configurations.serviceType, domain),
                eq(configurations.serviceName, serviceName),
                eq(configurations.version, version),
            ))
            .get();

        if (!row) {
            Logger.debug('ConfigStore', `No configuration for ${domain}/${serviceName}:${version}`);
            return null;
        }
        return row.settings;
    }

    /**
     * Inserts or replaces the record for (serviceType, serviceName, version).
     */
    public put(record: ConfigRecord): void {
        const settings = JSON.stringify(record.settings);
        this.requireHandle().db
            .insert(configurations)
            .values({
                serviceType: record.serviceType,
                serviceName: record.serviceName,
                version: record.version,
                settings,
            })
            .onConflictDoUpdate({
                target: [configurations.serviceType, configurations.serviceName, configurations.version],
                set: { settings, createdAt: new Date() },
            })
            .run();
        Logger.debug('ConfigStore', `Stored ${record.serviceType}/${record.serviceName}:${record.version}`);
    }

    /**
     * Loads a JSON array of `{ service_type, service_name, version, settings }`
     * records and stores them in one transaction.
     * @returns number of records stored
     */
    public importFile(filePath: string): number {
        let parsed: unknown;
        try {
            parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
        } catch (error) {
            throw new ConfigurationError(`Cannot read configuration file ${filePath}`, {
                operation: 'importFile',
                details: error instanceof Error ? error.message : String(error),
            });
        }

        const result = recordFileSchema.safeParse(parsed);
        if (!result.success) {
            const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
            throw new ConfigurationError(`Invalid configuration file ${filePath}: ${issues.join('; ')}`, {
                operation: 'importFile',
                details: { issues },
            });
        }

        const records = result.data.map((r): ConfigRecord => ({
            serviceType: r.service_type,
            serviceName: r.service_name,
            version: r.version,
            settings: r.settings,
        }));

        this.requireHandle().sqlite.transaction(() => {
            for (const record of records) {
                this.put(record);
            }
        })();

        Logger.info('ConfigStore', `Imported ${records.length} configurations from ${filePath}`);
        return records.length;
    }

    public list(): ConfigRecord[] {
        return this.requireHandle().db
            .select()
            .from(configurations)
            .orderBy(asc(configurations.serviceType), asc(configurations.serviceName), asc(configurations.version))
            .all()
            .map(toRecord);
    }

    public close(): void {
        if (this.handle) {
            this.handle.sqlite.close();
            this.handle = null;
            Logger.info('DB', 'Config database connection closed');
        }
    }

    private requireHandle(): DatabaseHandle {
        if (!this.handle) {
            throw new ConfigurationError('Config store is closed', { operation: 'configStore' });
        }
        return this.handle;
    }
}

function toRecord(row: ConfigurationRow): ConfigRecord {
    const settings = z.record(z.unknown()).safeParse(JSON.parse(row.settings));
    return {
        serviceType: row.serviceType,
        serviceName: row.serviceName,
        version: row.version,
        settings: settings.success ? settings.data : {},
    };
}
