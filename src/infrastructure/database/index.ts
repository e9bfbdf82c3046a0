import Database from 'better-sqlite3';
import { drizzle, BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema';
import path from 'path';
import fs from 'fs';
import { Logger } from '../../core/logging/Logger';

export type ConfigDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
    db: ConfigDatabase;
    sqlite: Database.Database;
}

export const IN_MEMORY = ':memory:';

/**
 * Opens (creating if needed) a configuration database.
 */
export function openDatabase(dbPath: string): DatabaseHandle {
    if (dbPath !== IN_MEMORY) {
        const dir = path.dirname(dbPath);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }
    }

    const sqlite = new Database(dbPath);
    sqlite.pragma('journal_mode = WAL'); // Readers do not block the importer

    sqlite.exec(`
        CREATE TABLE IF NOT EXISTS configurations (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            service_type TEXT NOT NULL,
            service_name TEXT NOT NULL,
            version TEXT NOT NULL,
            settings TEXT NOT NULL,
            created_at INTEGER NOT NULL DEFAULT (unixepoch())
        );

        CREATE UNIQUE INDEX IF NOT EXISTS uid_configurations_service ON configurations(service_type, service_name, version);
        CREATE INDEX IF NOT EXISTS idx_configurations_name ON configurations(service_name);
    `);

    Logger.info('DB', `SQLite config database initialized at: ${dbPath}`);
    return { db: drizzle(sqlite, { schema }), sqlite };
}

export { schema };
export { configurations } from './schema';
