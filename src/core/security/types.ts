// src/core/security/types.ts

import type { Socket } from 'net';

/**
 * Flood and slowloris limits, resolved from the `security` settings section.
 */
export interface SecurityPolicy {
    maxConnectionsPerWindow: number;
    maxBytesPerWindow: number;
    socketTimeoutSeconds: number;
    windowSeconds: number;
}

export interface DataEvent {
    at: number;
    bytes: number;
}

/**
 * Sliding-window counters for one source IP.
 */
export interface RateState {
    connectionTimestamps: number[];
    dataEvents: DataEvent[];
}

/**
 * Millisecond time source; swapped for a fake in tests.
 */
export interface Clock {
    now(): number;
}

export const systemClock: Clock = {
    now: () => Date.now(),
};

/**
 * Admission decisions consulted by endpoints and channels.
 * A `false` means the caller must drop the connection without replying.
 */
export interface AdmissionGuard {
    readonly policy: SecurityPolicy;
    admitConnection(sourceIp: string): Promise<boolean>;
    admitData(sourceIp: string, byteCount: number): Promise<boolean>;
    validatePayload(data: Uint8Array): boolean;
    validateLength(length: number): boolean;
    applyTimeout(socket: Socket): void;
}
