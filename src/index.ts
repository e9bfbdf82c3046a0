// securelink: rate-limited, length-prefixed, encrypted TCP transport

export { CONFIG } from './config/config';
export type { ConfigRecord, ConfigSource } from './config/ConfigSource';
export { loadServiceSettings, parseServiceSettings, serviceSettingsSchema } from './config/serviceSettings';
export type { EndpointRole, ServiceSettings } from './config/serviceSettings';

export * from './core/errors';
export * from './core/crypto';
export * from './core/security';
export * from './core/network';
export { Logger, LogLevel } from './core/logging/Logger';

export { ConfigStore } from './infrastructure/database/ConfigStore';
