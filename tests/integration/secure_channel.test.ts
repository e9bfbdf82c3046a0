// tests/integration/secure_channel.test.ts

import * as net from 'net';
import type { Socket } from 'net';
import { ConfigStore } from '../../src/infrastructure/database/ConfigStore';
import { IN_MEMORY } from '../../src/infrastructure/database';
import { SecureChannel, PayloadHandler } from '../../src/core/network/SecureChannel';
import { ConfigurationError, TransportError } from '../../src/core/errors';
import { encodeFrame } from '../../src/core/network/framing';
import { XorCipher } from '../../src/core/crypto/XorCipher';

const HOST = '127.0.0.1';
const b64 = (text: string) => Buffer.from(text).toString('base64');

const XOR = { type: 'xor', params: { byte: 42 } };
const AES_CBC = { type: 'aes-cbc', params: { key: b64('0123456789abcdef0123456789abcdef'), iv: b64('fedcba9876543210') } };
const AES_GCM = { type: 'aes-gcm', params: { key: b64('0123456789abcdef0123456789abcdef'), nonce: b64('abcdefghijkl') } };

type Settings = Record<string, unknown>;

describe('SecureChannel over TCP', () => {
    let store: ConfigStore;
    let channels: SecureChannel[];
    let sockets: Socket[];

    beforeEach(() => {
        store = new ConfigStore(IN_MEMORY);
        channels = [];
        sockets = [];
    });

    afterEach(() => {
        sockets.forEach(s => s.destroy());
        channels.forEach(c => c.endpoint.close());
        store.close();
    });

    /**
     * Stores both records, opens the server on an ephemeral port and points
     * the client at it.
     */
    async function openPair(serverExtra: Settings, clientExtra: Settings = serverExtra) {
        store.put({
            serviceType: 'network',
            serviceName: 'server',
            version: '1.0',
            settings: { role: 'server', host: HOST, port: 0, ...serverExtra },
        });
        const server = await SecureChannel.fromConfig(store, 'server');
        channels.push(server);
        const { port } = await server.endpoint.open();

        store.put({
            serviceType: 'network',
            serviceName: 'client',
            version: '1.0',
            settings: { role: 'client', host: HOST, port, ...clientExtra },
        });
        const client = await SecureChannel.fromConfig(store, 'client');
        channels.push(client);

        return { server, client };
    }

    async function connect(server: SecureChannel, client: SecureChannel, handler?: PayloadHandler) {
        const accepted = server.connect();
        const clientSocket = await client.connect();
        const serverSocket = await accepted;
        sockets.push(clientSocket, serverSocket);
        return { clientSocket, serverSocket, serving: server.serve(serverSocket, handler) };
    }

    it.each([
        ['xor', XOR],
        ['aes-cbc', AES_CBC],
        ['aes-gcm', AES_GCM],
    ])('echoes a message with the %s cipher', async (_type, crypto) => {
        const { server, client } = await openPair({ crypto });
        const { clientSocket, serving } = await connect(server, client);

        const response = await client.sendAndReceive(clientSocket, Buffer.from('Hello, Server!'));

        expect(response.toString()).toBe('Hello, Server!');
        clientSocket.end();
        await expect(serving).resolves.toBeUndefined();
    });

    it('answers several requests on one connection', async () => {
        const { server, client } = await openPair({ crypto: AES_GCM });
        const { clientSocket, serving } = await connect(server, client);

        for (const message of ['first', 'second', 'third']) {
            const response = await client.sendAndReceive(clientSocket, Buffer.from(message));
            expect(response.toString()).toBe(message);
        }

        clientSocket.end();
        await serving;
    });

    it('answers a client that shut down its write side after sending', async () => {
        const { server } = await openPair({ crypto: XOR });
        const { port } = await server.endpoint.open();
        const cipher = new XorCipher({ byte: 42 });

        const accepted = server.connect();
        const raw = net.connect({ host: HOST, port });
        sockets.push(raw);
        const received: Buffer[] = [];
        raw.on('data', (chunk: Buffer) => received.push(chunk));
        const ended = new Promise<void>((resolve) => raw.once('end', () => resolve()));

        const serverSocket = await accepted;
        sockets.push(serverSocket);
        const serving = server.serve(serverSocket);

        raw.end(encodeFrame(cipher.encrypt(Buffer.from('half-closed'))));
        await ended;
        await serving;

        expect(Buffer.concat(received).equals(encodeFrame(cipher.encrypt(Buffer.from('half-closed'))))).toBe(true);
    });

    it('passes each request through a custom handler', async () => {
        const { server, client } = await openPair({ crypto: AES_CBC });
        const seen: string[] = [];
        const { clientSocket, serving } = await connect(server, client, (plaintext, sourceIp) => {
            seen.push(sourceIp);
            return Buffer.from(plaintext.toString().toUpperCase());
        });

        const response = await client.sendAndReceive(clientSocket, Buffer.from('quiet please'));

        expect(response.toString()).toBe('QUIET PLEASE');
        expect(seen).toEqual([HOST]);
        clientSocket.end();
        await serving;
    });

    it('closes the connection when a frame fails authentication', async () => {
        const otherKey = { ...AES_GCM, params: { ...AES_GCM.params, key: b64('ffffffffffffffffffffffffffffffff') } };
        const { server, client } = await openPair({ crypto: AES_GCM }, { crypto: otherKey });
        const { clientSocket, serverSocket, serving } = await connect(server, client);

        const response = await client.sendAndReceive(clientSocket, Buffer.from('Hello, Server!'));

        expect(response.length).toBe(0);
        await expect(serving).resolves.toBeUndefined();
        expect(serverSocket.destroyed).toBe(true);
    });

    it('drops a frame larger than the byte budget', async () => {
        const { server, client } = await openPair(
            { crypto: XOR, security: { max_bytes_per_window: 32 } },
            { crypto: XOR }
        );
        const { clientSocket, serving } = await connect(server, client);

        const response = await client.sendAndReceive(clientSocket, Buffer.alloc(64, 0x41));

        expect(response.length).toBe(0);
        await serving;
    });

    it('drops an empty frame', async () => {
        const { server, client } = await openPair({ crypto: XOR });
        const { clientSocket, serving } = await connect(server, client);

        const response = await client.sendAndReceive(clientSocket, Buffer.alloc(0));

        expect(response.length).toBe(0);
        await serving;
    });

    it('ends the serve loop when the client stays silent past the timeout', async () => {
        const { server, client } = await openPair(
            { crypto: XOR, security: { socket_timeout_seconds: 1 } },
            { crypto: XOR }
        );
        const { serverSocket, serving } = await connect(server, client);

        await expect(serving).resolves.toBeUndefined();
        expect(serverSocket.destroyed).toBe(true);
    });

    it('serves every admitted connection while listening', async () => {
        const { server, client } = await openPair(
            { crypto: XOR, security: { max_connections_per_window: 1 } },
            { crypto: XOR }
        );
        let calls = 0;
        const listener = await server.endpoint.listen(async (socket) => {
            calls += 1;
            await server.serve(socket);
        });

        const first = await client.connect();
        sockets.push(first);
        const reply = await client.sendAndReceive(first, Buffer.from('one'));
        expect(reply.toString()).toBe('one');

        const second = await client.connect();
        sockets.push(second);
        const outcome = await client.sendAndReceive(second, Buffer.from('two')).then(
            (response) => response.length,
            (error: unknown) => (error instanceof TransportError ? 'transport' : 'other')
        );

        expect([0, 'transport']).toContain(outcome);
        expect(calls).toBe(1);
        listener.close();
    });

    it('requires a crypto section', async () => {
        store.put({ serviceType: 'network', serviceName: 'plain', version: '1.0', settings: { role: 'client', host: HOST, port: 1 } });
        await expect(SecureChannel.fromConfig(store, 'plain')).rejects.toThrow('No crypto section configured for plain:1.0');
    });

    it('rejects an unknown cipher type', async () => {
        store.put({
            serviceType: 'network',
            serviceName: 'rot13',
            version: '1.0',
            settings: { role: 'client', host: HOST, port: 1, crypto: { type: 'rot13' } },
        });
        await expect(SecureChannel.fromConfig(store, 'rot13')).rejects.toThrow(ConfigurationError);
    });
});
