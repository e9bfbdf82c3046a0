// src/core/network/SocketReader.ts

import type { Duplex } from 'stream';
import { TransportError } from '../errors';

interface PendingRead {
    size: number;
    resolve: (chunk: Buffer | null) => void;
    reject: (error: Error) => void;
}

/**
 * Buffers a stream's `data` events and serves exact-size reads from them.
 *
 * A read resolves to `null` only when the peer closed before a single byte
 * of that read arrived. Closing part-way through, a socket error, or an idle
 * timeout rejects with a TransportError.
 */
export class SocketReader {
    private buffer: Buffer = Buffer.alloc(0);
    private ended = false;
    private failure: TransportError | null = null;
    private pending: PendingRead | null = null;

    constructor(private readonly stream: Duplex) {
        stream.on('data', (chunk: Buffer) => {
            this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
            this.settle();
        });

        stream.on('end', () => this.markEnded());
        stream.on('close', () => this.markEnded());

        stream.on('error', (err: Error) => {
            this.fail(new TransportError(`Socket error: ${err.message}`, { operation: 'read', details: err.message }));
        });

        // Emitted by net.Socket once the idle timeout set by the guard elapses
        stream.on('timeout', () => {
            this.fail(new TransportError('Socket read timed out', { operation: 'read' }));
            stream.destroy();
        });

        // Server-side sockets arrive paused until admitted
        stream.resume();
    }

    /**
     * Bytes received but not yet consumed.
     */
    public get buffered(): number {
        return this.buffer.length;
    }

    public readExact(size: number): Promise<Buffer | null> {
        if (this.pending) {
            return Promise.reject(new TransportError('A read is already in progress on this socket', { operation: 'read' }));
        }
        return new Promise((resolve, reject) => {
            this.pending = { size, resolve, reject };
            this.settle();
        });
    }

    private markEnded(): void {
        this.ended = true;
        this.settle();
    }

    private fail(error: TransportError): void {
        if (!this.failure) {
            this.failure = error;
        }
        this.settle();
    }

    private settle(): void {
        const read = this.pending;
        if (!read) return;

        if (this.buffer.length >= read.size) {
            const chunk = Buffer.from(this.buffer.subarray(0, read.size));
            this.buffer = this.buffer.subarray(read.size);
            this.pending = null;
            read.resolve(chunk);
            return;
        }

        if (this.failure) {
            this.pending = null;
            read.reject(this.failure);
            return;
        }

        if (this.ended) {
            this.pending = null;
            if (this.buffer.length === 0) {
                read.resolve(null);
            } else {
                read.reject(new TransportError(
                    `Connection closed after ${this.buffer.length} of ${read.size} bytes`,
                    { operation: 'read' }
                ));
            }
        }
    }
}
