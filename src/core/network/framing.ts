// src/core/network/framing.ts
//
// Wire format: [length: u32 big-endian][ciphertext: length bytes], repeated.
// No version byte, no per-frame cipher id.

import type { Writable } from 'stream';
import { SocketReader } from './SocketReader';
import { CONFIG } from '../../config/config';
import { ErrorFactory, TransportError } from '../errors';

const HEADER_BYTES = CONFIG.NETWORK.FRAME_HEADER_BYTES;

/**
 * Called with the declared body length before the body is read.
 * Returning false abandons the frame.
 */
export type FrameInspector = (length: number) => boolean | Promise<boolean>;

export type FrameReadResult =
    | { kind: 'frame'; payload: Buffer }
    | { kind: 'closed' }
    | { kind: 'rejected'; length: number };

export function encodeFrame(payload: Uint8Array): Buffer {
    if (payload.length > CONFIG.NETWORK.MAX_FRAME_LENGTH) {
        throw new TransportError(`Frame of ${payload.length} bytes exceeds the u32 length prefix`, {
            operation: 'encodeFrame',
            retryable: false,
        });
    }
    const framed = Buffer.alloc(HEADER_BYTES + payload.length);
    framed.writeUInt32BE(payload.length, 0);
    framed.set(payload, HEADER_BYTES);
    return framed;
}

/**
 * Reads one frame. `closed` means the peer went away cleanly between frames.
 */
export async function readFrame(reader: SocketReader, inspect?: FrameInspector): Promise<FrameReadResult> {
    const header = await reader.readExact(HEADER_BYTES);
    if (header === null) {
        return { kind: 'closed' };
    }

    const length = header.readUInt32BE(0);
    if (inspect && !(await inspect(length))) {
        return { kind: 'rejected', length };
    }

    const payload = await reader.readExact(length);
    if (payload === null) {
        throw new TransportError(`Connection closed before ${length}-byte frame body`, { operation: 'readFrame' });
    }
    return { kind: 'frame', payload };
}

/**
 * Writes a whole frame; resolves once the stream has accepted every byte.
 */
export function writeFrame(stream: Writable, payload: Uint8Array): Promise<void> {
    const framed = encodeFrame(payload);
    return new Promise<void>((resolve, reject) => {
        if (stream.destroyed || !stream.writable) {
            reject(new TransportError('Cannot write to a closed socket', { operation: 'writeFrame' }));
            return;
        }
        stream.write(framed, (err) => {
            if (err) reject(ErrorFactory.fromSocketError('writeFrame', err));
            else resolve();
        });
    });
}
