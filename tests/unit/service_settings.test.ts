// tests/unit/service_settings.test.ts

import { loadServiceSettings, parseServiceSettings } from '../../src/config/serviceSettings';
import { ConfigSource } from '../../src/config/ConfigSource';
import { Endpoint, EndpointState } from '../../src/core/network/Endpoint';
import { ConfigurationError } from '../../src/core/errors';
import { CipherRegistry, createCipherFromSource } from '../../src/core/crypto/CipherRegistry';

const settings = (value: Record<string, unknown>) => JSON.stringify(value);

describe('parseServiceSettings', () => {
    it('fills in the default security policy', () => {
        const parsed = parseServiceSettings(settings({ role: 'server', host: 'localhost', port: 5000 }), 'server');

        expect(parsed).toEqual({
            role: 'server',
            host: 'localhost',
            port: 5000,
            security: {
                maxConnectionsPerWindow: 10,
                maxBytesPerWindow: 1048576,
                socketTimeoutSeconds: 10,
                windowSeconds: 60,
            },
        });
    });

    it('defaults only the security fields that are missing', () => {
        const parsed = parseServiceSettings(
            settings({ role: 'client', host: 'localhost', port: 5000, security: { window_seconds: 5 } }),
            'client'
        );
        expect(parsed.security.windowSeconds).toBe(5);
        expect(parsed.security.maxConnectionsPerWindow).toBe(10);
    });

    it('keeps the crypto section', () => {
        const parsed = parseServiceSettings(
            settings({ role: 'client', host: 'localhost', port: 1, crypto: { type: 'xor', params: { byte: 42 } } }),
            'client'
        );
        expect(parsed.crypto).toEqual({ type: 'xor', params: { byte: 42 } });
    });

    it.each([
        ['an unknown role', settings({ role: 'peer', host: 'localhost', port: 5000 })],
        ['a port above 65535', settings({ role: 'server', host: 'localhost', port: 70000 })],
        ['a negative port', settings({ role: 'server', host: 'localhost', port: -1 })],
        ['a string port', settings({ role: 'server', host: 'localhost', port: '5000' })],
        ['an empty host', settings({ role: 'server', host: '', port: 5000 })],
        ['a zero window', settings({ role: 'server', host: 'localhost', port: 5000, security: { window_seconds: 0 } })],
        ['malformed JSON', '{"role": "server",'],
    ])('rejects %s', (_label, json) => {
        expect(() => parseServiceSettings(json, 'svc')).toThrow(ConfigurationError);
    });
});

describe('loadServiceSettings', () => {
    it('looks the service up under the network domain', async () => {
        const calls: string[][] = [];
        const source: ConfigSource = {
            getConfiguration: async (domain, serviceName, version) => {
                calls.push([domain, serviceName, version]);
                return settings({ role: 'client', host: 'localhost', port: 5000 });
            },
        };

        await loadServiceSettings(source, 'client');

        expect(calls).toEqual([['network', 'client', '1.0']]);
    });

    it('treats a missing record as a configuration error', async () => {
        const source: ConfigSource = { getConfiguration: async () => null };
        await expect(loadServiceSettings(source, 'ghost', '2.0')).rejects.toThrow('Configuration not found for ghost:2.0');
    });
});

describe('Endpoint construction', () => {
    const security = { maxConnectionsPerWindow: 1, maxBytesPerWindow: 1, socketTimeoutSeconds: 1, windowSeconds: 1 };

    it('starts unbound with a frozen config', () => {
        const endpoint = new Endpoint({ role: 'client', host: 'localhost', port: 5000, security });
        expect(endpoint.state).toBe(EndpointState.UNBOUND);
        expect(Object.isFrozen(endpoint.config)).toBe(true);
        expect(Object.isFrozen(endpoint.config.security)).toBe(true);
    });

    it.each([-1, 65536, 1.5])('rejects port %p', (port) => {
        expect(() => new Endpoint({ role: 'server', host: 'localhost', port, security })).toThrow(ConfigurationError);
    });

    it('rejects an empty host', () => {
        expect(() => new Endpoint({ role: 'server', host: '', port: 1, security })).toThrow('Host must be a non-empty string');
    });

    it('refuses to listen as a client', async () => {
        const endpoint = new Endpoint({ role: 'client', host: 'localhost', port: 5000, security });
        await expect(endpoint.open()).rejects.toThrow('Only a server endpoint can listen');
    });
});

describe('createCipherFromSource', () => {
    const sourceOf = (value: Record<string, unknown>): ConfigSource => ({
        getConfiguration: async () => settings(value),
    });

    it('builds the configured cipher', async () => {
        const source = sourceOf({ role: 'client', host: 'localhost', port: 5000, crypto: { type: 'xor', params: { byte: 42 } } });

        const cipher = await createCipherFromSource(source, 'client');

        expect(cipher.type).toBe('xor');
        expect([...cipher.encrypt(Buffer.from([0, 1]))]).toEqual([42, 43]);
    });

    it('requires a crypto section', async () => {
        const source = sourceOf({ role: 'client', host: 'localhost', port: 5000 });
        await expect(createCipherFromSource(source, 'client')).rejects.toThrow('No crypto section configured for client:1.0');
    });

    it('resolves the type through the registry it is given', async () => {
        const source = sourceOf({ role: 'client', host: 'localhost', port: 5000, crypto: { type: 'identity' } });
        const registry = new CipherRegistry().register('identity', () => ({
            type: 'identity',
            encrypt: (data) => Buffer.from(data),
            decrypt: (data) => Buffer.from(data),
        }));

        const cipher = await createCipherFromSource(source, 'client', '1.0', registry);

        expect(cipher.type).toBe('identity');
        await expect(createCipherFromSource(source, 'client')).rejects.toThrow('Unsupported cipher type: identity');
    });
});
