// src/core/crypto/CipherRegistry.ts

import { BuiltinCipherType, CipherConfig, CipherFactory, CipherPlugin } from './types';
import { XorCipher } from './XorCipher';
import { AesCbcCipher } from './AesCbcCipher';
import { AesGcmCipher } from './AesGcmCipher';
import { ConfigurationError } from '../errors';
import { Logger } from '../logging/Logger';
import { ConfigSource } from '../../config/ConfigSource';
import { loadServiceSettings } from '../../config/serviceSettings';
import { CONFIG } from '../../config/config';

const BUILTIN_CIPHERS: Record<BuiltinCipherType, CipherFactory> = {
    'xor': params => new XorCipher(params),
    'aes-cbc': params => new AesCbcCipher(params),
    'aes-gcm': params => new AesGcmCipher(params),
};

/**
 * Maps a configuration type tag to the cipher it builds.
 * The built-in variants are registered on the default registry; callers
 * extend it explicitly through `register`.
 */
export class CipherRegistry {
    private static defaultInstance: CipherRegistry;
    private factories: Map<string, CipherFactory> = new Map();

    public static getDefault(): CipherRegistry {
        if (!CipherRegistry.defaultInstance) {
            const registry = new CipherRegistry();
            for (const [type, factory] of Object.entries(BUILTIN_CIPHERS)) {
                registry.register(type, factory);
            }
            CipherRegistry.defaultInstance = registry;
        }
        return CipherRegistry.defaultInstance;
    }

    public register(type: string, factory: CipherFactory): this {
        if (this.factories.has(type)) {
            Logger.warn('CipherRegistry', `Replacing cipher factory for type ${type}`);
        }
        this.factories.set(type, factory);
        return this;
    }

    public has(type: string): boolean {
        return this.factories.has(type);
    }

    public types(): string[] {
        return Array.from(this.factories.keys());
    }

    /**
     * Builds the cipher named by `config.type`.
     * @throws ConfigurationError for an unknown type or invalid params
     */
    public create(config: CipherConfig): CipherPlugin {
        const factory = this.factories.get(config.type);
        if (!factory) {
            throw new ConfigurationError(`Unsupported cipher type: ${config.type}`, {
                operation: 'createCipher',
                suggestion: `Use one of: ${this.types().join(', ')}`,
            });
        }

        const cipher = factory(config.params);
        Logger.debug('CipherRegistry', `Initialized ${cipher.type} cipher`);
        return cipher;
    }
}

/**
 * Builds the cipher named by the `crypto` section of a service's settings.
 * @throws ConfigurationError when the record or its crypto section is missing
 */
export async function createCipherFromSource(
    source: ConfigSource,
    serviceName: string,
    version: string = CONFIG.NETWORK.DEFAULT_VERSION,
    registry: CipherRegistry = CipherRegistry.getDefault()
): Promise<CipherPlugin> {
    const settings = await loadServiceSettings(source, serviceName, version);
    if (!settings.crypto) {
        throw new ConfigurationError(`No crypto section configured for ${serviceName}:${version}`, {
            operation: 'createCipher',
            suggestion: 'Add a crypto section with a type and its params',
        });
    }
    return registry.create(settings.crypto);
}
