import path from 'path';
import { CONFIG } from '../config/config';
import { ConfigStore } from '../infrastructure/database/ConfigStore';
import { Logger } from '../core/logging/Logger';
import { SecureLinkError } from '../core/errors';

/**
 * Usage: importConfig <records.json> [dbPath]
 */
function runImport(): void {
    const [file, dbPath = CONFIG.PATHS.CONFIG_DB] = process.argv.slice(2);
    if (!file) {
        Logger.error('ImportConfig', 'Usage: importConfig <records.json> [dbPath]');
        process.exitCode = 1;
        return;
    }

    const store = new ConfigStore(dbPath);
    try {
        const count = store.importFile(path.resolve(file));
        Logger.info('ImportConfig', `Imported ${count} records into ${dbPath}`);
    } catch (err) {
        Logger.error('ImportConfig', err instanceof SecureLinkError ? err.toUserFriendly() : 'Import failed', err);
        process.exitCode = 1;
    } finally {
        store.close();
    }
}

runImport();
