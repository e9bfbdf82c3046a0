// src/core/network/SecureChannel.ts

import type { Socket } from 'net';
import { CONFIG } from '../../config/config';
import { ConfigSource } from '../../config/ConfigSource';
import { CipherRegistry, createCipherFromSource } from '../crypto/CipherRegistry';
import { CipherPlugin } from '../crypto/types';
import { CryptoError, TransportError } from '../errors';
import { Logger } from '../logging/Logger';
import { Endpoint, EndpointOptions, sourceIpOf } from './Endpoint';
import { FrameInspector, readFrame, writeFrame } from './framing';
import { SocketReader } from './SocketReader';

/**
 * Turns one decrypted request into the plaintext sent back.
 */
export type PayloadHandler = (plaintext: Buffer, sourceIp: string) => Buffer | Promise<Buffer>;

export const echoHandler: PayloadHandler = (plaintext) => plaintext;

export interface ChannelOptions extends EndpointOptions {
    registry?: CipherRegistry;
}

const EMPTY = Buffer.alloc(0);

/**
 * SecureChannel
 * Encrypted, length-prefixed request/response over sockets produced by an Endpoint.
 *
 * Guard violations never raise: the socket is closed and the client side
 * sees the same empty response it would get from a peer that hung up.
 */
export class SecureChannel {
    private readers = new WeakMap<Socket, SocketReader>();

    constructor(public readonly endpoint: Endpoint, public readonly cipher: CipherPlugin) {
        Logger.debug('SecureChannel', `Initialized ${endpoint.role} channel with ${cipher.type} cipher`);
    }

    /**
     * Builds the endpoint and the cipher from the same settings record.
     */
    public static async fromConfig(
        source: ConfigSource,
        serviceName: string,
        version: string = CONFIG.NETWORK.DEFAULT_VERSION,
        options: ChannelOptions = {}
    ): Promise<SecureChannel> {
        const cipher = await createCipherFromSource(source, serviceName, version, options.registry);
        const endpoint = await Endpoint.fromConfig(source, serviceName, version, options);
        return new SecureChannel(endpoint, cipher);
    }

    /**
     * Opens a socket through the endpoint.
     */
    public connect(): Promise<Socket> {
        return this.endpoint.connect();
    }

    /**
     * Sends one request frame and waits for its response.
     *
     * @returns the decrypted response, or an empty buffer when the peer
     * closed without replying (or the reply was refused by the guard)
     * @throws TransportError on socket failure, CryptoError on decrypt failure;
     * the socket is closed in both cases
     */
    public async sendAndReceive(socket: Socket, plaintext: Uint8Array): Promise<Buffer> {
        const sourceIp = sourceIpOf(socket);
        const reader = this.readerFor(socket);
        const ciphertext = this.cipher.encrypt(plaintext);

        try {
            await writeFrame(socket, ciphertext);
            Logger.debug('SecureChannel', `Sent ${ciphertext.length} encrypted bytes`);

            const result = await readFrame(reader, this.inspector(sourceIp));
            if (result.kind === 'closed') {
                Logger.debug('SecureChannel', 'No response received');
                return EMPTY;
            }
            if (result.kind === 'rejected') {
                Logger.warn('SecureChannel', `Dropped ${result.length}-byte response from ${sourceIp}`);
                socket.destroy();
                return EMPTY;
            }

            const response = this.cipher.decrypt(result.payload);
            Logger.debug('SecureChannel', `Received ${response.length} decrypted bytes`);
            return response;
        } catch (error) {
            socket.destroy();
            if (error instanceof TransportError || error instanceof CryptoError) {
                Logger.error('SecureChannel', `Exchange with ${sourceIp} failed: ${error.message}`, error.toLogContext());
            }
            throw error;
        }
    }

    /**
     * Answers frames on `socket` until the peer hangs up, the connection fails,
     * a frame is refused, or a frame fails to decrypt. A peer that shut down its
     * write side still gets its pending responses before the socket is ended;
     * in every other case the socket is destroyed. Errors from `handler` are
     * rethrown after that.
     */
    public async serve(socket: Socket, handler: PayloadHandler = echoHandler): Promise<void> {
        const sourceIp = sourceIpOf(socket);
        const reader = this.readerFor(socket);
        const inspect = this.inspector(sourceIp);
        let peerFinished = false;

        try {
            while (true) {
                const result = await readFrame(reader, inspect);
                if (result.kind === 'closed') {
                    Logger.debug('SecureChannel', `Client ${sourceIp} disconnected`);
                    peerFinished = true;
                    break;
                }
                if (result.kind === 'rejected') {
                    Logger.warn('SecureChannel', `Closing connection from ${sourceIp} after refused ${result.length}-byte frame`);
                    break;
                }

                const request = this.cipher.decrypt(result.payload);
                Logger.debug('SecureChannel', `Received ${request.length} decrypted bytes from ${sourceIp}`);

                const response = this.cipher.encrypt(await handler(request, sourceIp));
                await writeFrame(socket, response);
                Logger.debug('SecureChannel', `Sent ${response.length} encrypted response bytes`);
            }
        } catch (error) {
            if (error instanceof TransportError) {
                Logger.warn('SecureChannel', `Transport error from ${sourceIp}: ${error.message}`, error.toLogContext());
            } else if (error instanceof CryptoError) {
                Logger.warn('SecureChannel', `Undecryptable frame from ${sourceIp}: ${error.message}`, error.toLogContext());
            } else {
                throw error;
            }
        } finally {
            if (peerFinished && socket.writable) {
                socket.end();
            } else {
                socket.destroy();
            }
            Logger.debug('SecureChannel', `Closed connection from ${sourceIp}`);
        }
    }

    /**
     * Checks a declared frame length before its body is read.
     */
    private inspector(sourceIp: string): FrameInspector {
        const guard = this.endpoint.guard;
        return async (length) => {
            if (!guard.validateLength(length)) {
                return false;
            }
            return guard.admitData(sourceIp, length);
        };
    }

    private readerFor(socket: Socket): SocketReader {
        let reader = this.readers.get(socket);
        if (!reader) {
            reader = new SocketReader(socket);
            this.readers.set(socket, reader);
        }
        return reader;
    }
}
