// src/core/network/Endpoint.ts

import * as net from 'net';
import { CONFIG } from '../../config/config';
import { ConfigSource } from '../../config/ConfigSource';
import { EndpointRole, loadServiceSettings, ServiceSettings } from '../../config/serviceSettings';
import { ConfigurationError, ErrorFactory, TransportError } from '../errors';
import { Logger } from '../logging/Logger';
import { SecurityGuard } from '../security/SecurityGuard';
import { AdmissionGuard, Clock, SecurityPolicy } from '../security/types';

export enum EndpointState {
    UNBOUND,
    LISTENING,
    CONNECTING,
    CONNECTED,
    CLOSED,
    FAILED,
}

export interface EndpointConfig {
    readonly role: EndpointRole;
    readonly host: string;
    readonly port: number;
    readonly security: Readonly<SecurityPolicy>;
}

export interface EndpointOptions {
    /** Replaces the guard built from `config.security`. */
    guard?: AdmissionGuard;
    /** Time source for the default guard. */
    clock?: Clock;
}

export interface BoundAddress {
    host: string;
    port: number;
}

export type ConnectionHandler = (socket: net.Socket, sourceIp: string) => Promise<void>;

/**
 * Persistent listener returned by `Endpoint.listen`.
 */
export interface ConnectionListener {
    readonly address: BoundAddress;
    close(): void;
}

/**
 * Source IP used as the rate-limiting key. IPv4-mapped IPv6 addresses are
 * folded onto their IPv4 form so one peer maps to one key.
 */
export function sourceIpOf(socket: net.Socket): string {
    const address = socket.remoteAddress ?? 'unknown';
    return address.startsWith('::ffff:') ? address.slice('::ffff:'.length) : address;
}

/**
 * Endpoint
 * Produces connected sockets for one configured role.
 *
 * Server: UNBOUND -> LISTENING -> (accept, admit) -> CONNECTED, closing the
 * listening socket after the first admitted peer. Client: UNBOUND ->
 * CONNECTING -> CONNECTED. Any bind/listen/connect failure is terminal (FAILED).
 */
export class Endpoint {
    public readonly config: EndpointConfig;
    public readonly guard: AdmissionGuard;
    private currentState: EndpointState = EndpointState.UNBOUND;
    private server: net.Server | null = null;
    private boundAddress: BoundAddress | null = null;
    private abortAccept: ((error: TransportError) => void) | null = null;

    constructor(config: EndpointConfig, options: EndpointOptions = {}) {
        Endpoint.assertValid(config);
        this.config = Object.freeze({ ...config, security: Object.freeze({ ...config.security }) });
        this.guard = options.guard ?? new SecurityGuard(this.config.security, options.clock);
        Logger.debug('Endpoint', `Initialized ${config.role} endpoint for ${config.host}:${config.port}`);
    }

    /**
     * Builds an endpoint from the `network` settings of `serviceName`.
     */
    public static async fromConfig(
        source: ConfigSource,
        serviceName: string,
        version: string = CONFIG.NETWORK.DEFAULT_VERSION,
        options: EndpointOptions = {}
    ): Promise<Endpoint> {
        const settings = await loadServiceSettings(source, serviceName, version);
        return Endpoint.fromSettings(settings, options);
    }

    public static fromSettings(settings: ServiceSettings, options: EndpointOptions = {}): Endpoint {
        return new Endpoint({
            role: settings.role,
            host: settings.host,
            port: settings.port,
            security: settings.security,
        }, options);
    }

    public get state(): EndpointState {
        return this.currentState;
    }

    public get role(): EndpointRole {
        return this.config.role;
    }

    /**
     * Address the server is listening on; null until `open` has resolved.
     */
    public get address(): BoundAddress | null {
        return this.boundAddress;
    }

    /**
     * Returns one connected socket: the admitted peer for a server, the
     * outbound connection for a client. Server-side sockets are handed over
     * paused; reading starts when the consumer resumes them.
     */
    public async connect(): Promise<net.Socket> {
        this.assertUsable();
        return this.config.role === 'server' ? this.acceptOne() : this.connectOut();
    }

    /**
     * Binds and listens (server role only). Idempotent while listening.
     */
    public async open(): Promise<BoundAddress> {
        this.assertUsable();
        if (this.config.role !== 'server') {
            throw new ConfigurationError('Only a server endpoint can listen', { operation: 'open' });
        }
        if (this.server && this.boundAddress) {
            return this.boundAddress;
        }

        // Half-open peers (request sent, write side shut) still get their response
        const server = net.createServer({ pauseOnConnect: true, allowHalfOpen: true });
        try {
            await new Promise<void>((resolve, reject) => {
                server.once('error', reject);
                server.listen({ host: this.config.host, port: this.config.port, backlog: CONFIG.NETWORK.LISTEN_BACKLOG }, () => {
                    server.off('error', reject);
                    resolve();
                });
            });
        } catch (error) {
            this.currentState = EndpointState.FAILED;
            Logger.error('Endpoint', `Failed to listen on ${this.config.host}:${this.config.port}`, error);
            throw ErrorFactory.fromSocketError('listen', error);
        }

        server.on('error', (err) => {
            Logger.error('Endpoint', 'Listening socket error', err);
        });

        const bound = server.address();
        const port = typeof bound === 'object' && bound !== null ? bound.port : this.config.port;
        this.server = server;
        this.boundAddress = { host: this.config.host, port };
        this.currentState = EndpointState.LISTENING;
        Logger.debug('Endpoint', `Server listening on ${this.config.host}:${port}`);
        return this.boundAddress;
    }

    /**
     * Keeps the listening socket open and hands every admitted peer to
     * `handler`, each on its own promise chain.
     */
    public async listen(handler: ConnectionHandler): Promise<ConnectionListener> {
        const address = await this.open();
        const server = this.requireServer();

        const onConnection = (socket: net.Socket) => {
            void this.admit(socket)
                .then(async (sourceIp) => {
                    if (sourceIp !== null) {
                        await handler(socket, sourceIp);
                    }
                })
                .catch((error: unknown) => {
                    Logger.error('Endpoint', `Connection from ${sourceIpOf(socket)} failed`, error);
                    socket.destroy();
                });
        };
        server.on('connection', onConnection);

        return {
            address,
            close: () => this.closeServer(onConnection),
        };
    }

    /**
     * Stops listening, if listening. Established peer sockets are unaffected.
     */
    public close(): void {
        this.closeServer();
        if (this.currentState !== EndpointState.FAILED) {
            this.currentState = EndpointState.CLOSED;
        }
    }

    /**
     * Waits for the first admitted peer. Rejects with a TransportError when the
     * listening socket fails (the endpoint becomes FAILED) or when `close` is
     * called before a peer arrives.
     */
    private async acceptOne(): Promise<net.Socket> {
        await this.open();
        const server = this.requireServer();

        const peer = await new Promise<net.Socket>((resolve, reject) => {
            let settled = false;
            const finish = () => {
                settled = true;
                server.off('connection', onConnection);
                server.off('error', onError);
                this.abortAccept = null;
            };
            const fail = (error: TransportError) => {
                if (settled) return;
                finish();
                reject(error);
            };
            const onError = (err: Error) => {
                this.currentState = EndpointState.FAILED;
                fail(ErrorFactory.fromSocketError('accept', err));
                this.closeServer();
            };
            const onConnection = (socket: net.Socket) => {
                if (settled) {
                    socket.destroy();
                    return;
                }
                void this.admit(socket)
                    .then((sourceIp) => {
                        if (sourceIp === null) return;
                        if (settled) {
                            socket.destroy();
                            return;
                        }
                        finish();
                        resolve(socket);
                    })
                    .catch((error: unknown) => {
                        socket.destroy();
                        onError(error instanceof Error ? error : new Error(String(error)));
                    });
            };

            this.abortAccept = fail;
            server.on('connection', onConnection);
            server.once('error', onError);
        });

        this.closeServer();
        this.currentState = EndpointState.CONNECTED;
        Logger.debug('Endpoint', `Accepted connection from ${sourceIpOf(peer)}`);
        return peer;
    }

    /**
     * Resolves to the peer's source IP when admitted; rejected peers are
     * destroyed before any byte is read or written.
     */
    private async admit(socket: net.Socket): Promise<string | null> {
        const sourceIp = sourceIpOf(socket);
        socket.on('error', (err) => {
            Logger.debug('Endpoint', `Peer socket error from ${sourceIp}: ${err.message}`);
        });

        if (!(await this.guard.admitConnection(sourceIp))) {
            Logger.warn('Endpoint', `Rejected connection from ${sourceIp} due to rate limiting`);
            socket.destroy();
            return null;
        }

        this.guard.applyTimeout(socket);
        return sourceIp;
    }

    private async connectOut(): Promise<net.Socket> {
        this.currentState = EndpointState.CONNECTING;
        const { host, port } = this.config;

        const socket = new net.Socket();
        this.guard.applyTimeout(socket);

        try {
            await new Promise<void>((resolve, reject) => {
                const onTimeout = () => {
                    cleanup();
                    socket.destroy();
                    reject(new TransportError(`Connection to ${host}:${port} timed out`, { operation: 'connect' }));
                };
                const onError = (err: Error) => {
                    cleanup();
                    socket.destroy();
                    reject(ErrorFactory.fromSocketError('connect', err));
                };
                const onConnect = () => {
                    cleanup();
                    resolve();
                };
                const cleanup = () => {
                    socket.off('timeout', onTimeout);
                    socket.off('error', onError);
                    socket.off('connect', onConnect);
                };

                socket.once('timeout', onTimeout);
                socket.once('error', onError);
                socket.once('connect', onConnect);
                socket.connect({ host, port });
            });
        } catch (error) {
            this.currentState = EndpointState.FAILED;
            Logger.error('Endpoint', `Failed to connect to ${host}:${port}`, error);
            throw error;
        }

        socket.on('error', (err) => {
            Logger.debug('Endpoint', `Client socket error: ${err.message}`);
        });
        this.currentState = EndpointState.CONNECTED;
        Logger.debug('Endpoint', `Connected to ${host}:${port}`);
        return socket;
    }

    /**
     * Releases the listening port and aborts a pending single-shot accept.
     * net.Server only reports 'close' once every accepted socket has ended,
     * so this does not wait for it.
     */
    private closeServer(listener?: (socket: net.Socket) => void): void {
        const abort = this.abortAccept;
        this.abortAccept = null;
        abort?.(new TransportError('Endpoint closed while accepting', { operation: 'accept', retryable: false }));

        const server = this.server;
        if (!server) return;
        if (listener) server.off('connection', listener);

        this.server = null;
        this.boundAddress = null;
        server.close((err) => {
            if (err) {
                Logger.debug('Endpoint', `Listening socket closed with: ${err.message}`);
            }
        });
        Logger.debug('Endpoint', 'Stopped listening');
    }

    private requireServer(): net.Server {
        if (!this.server) {
            throw new TransportError('Server endpoint is not listening', { operation: 'accept' });
        }
        return this.server;
    }

    private assertUsable(): void {
        if (this.currentState === EndpointState.FAILED) {
            throw new TransportError('Endpoint is in a failed state; create a new endpoint to retry', {
                operation: 'connect',
                retryable: false,
            });
        }
    }

    private static assertValid(config: EndpointConfig): void {
        if (config.role !== 'client' && config.role !== 'server') {
            throw new ConfigurationError(`Invalid role: ${String(config.role)}`, { suggestion: "Role must be 'client' or 'server'" });
        }
        if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
            throw new ConfigurationError(`Invalid port: ${config.port}`, { suggestion: 'Port must be an integer between 0 and 65535' });
        }
        if (typeof config.host !== 'string' || config.host.length === 0) {
            throw new ConfigurationError('Host must be a non-empty string');
        }
    }
}
