// src/config/config.ts

import path from 'path';
import { ENV } from './env';

/**
 * Helper to get the project root directory.
 * Derives the root from the file location so the data directory does not
 * depend on the working directory the process was started from.
 */
const PROJECT_ROOT = path.resolve(__dirname, '../..');
const DATA_DIR = path.join(PROJECT_ROOT, 'data');

interface ServerConfig {
    NAME: string;
    VERSION: string;
}

interface PathsConfig {
    PROJECT_ROOT: string;
    DATA_DIR: string;
    CONFIG_DB: string;
}

interface NetworkConfig {
    CONFIG_DOMAIN: string;
    DEFAULT_VERSION: string;
    LISTEN_BACKLOG: number;
    FRAME_HEADER_BYTES: number;
    MAX_FRAME_LENGTH: number;
}

interface SecurityDefaults {
    MAX_CONNECTIONS_PER_WINDOW: number;
    MAX_BYTES_PER_WINDOW: number;
    SOCKET_TIMEOUT_SECONDS: number;
    WINDOW_SECONDS: number;
}

interface Config {
    SERVER: ServerConfig;
    PATHS: PathsConfig;
    NETWORK: NetworkConfig;
    SECURITY: SecurityDefaults;
}

/**
 * Centralized configuration for securelink.
 */
export const CONFIG: Config = {
    SERVER: {
        NAME: 'securelink',
        VERSION: '1.0.0',
    },

    PATHS: {
        PROJECT_ROOT,
        DATA_DIR,
        CONFIG_DB: ENV.CONFIG_DB_PATH ?? path.join(DATA_DIR, 'network_configs.db'),
    },

    NETWORK: {
        CONFIG_DOMAIN: 'network',
        DEFAULT_VERSION: '1.0',
        LISTEN_BACKLOG: 5,
        FRAME_HEADER_BYTES: 4,
        MAX_FRAME_LENGTH: 0xffff_ffff, // u32 length prefix
    },

    SECURITY: {
        MAX_CONNECTIONS_PER_WINDOW: 10,
        MAX_BYTES_PER_WINDOW: 1024 * 1024, // 1 MiB
        SOCKET_TIMEOUT_SECONDS: 10,
        WINDOW_SECONDS: 60,
    },
};
