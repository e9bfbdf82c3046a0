// src/core/security/SecurityGuard.ts

import type { Socket } from 'net';
import { Mutex } from 'async-mutex';
import { AdmissionGuard, Clock, RateState, SecurityPolicy, systemClock } from './types';
import { Logger } from '../logging/Logger';

interface IpEntry {
    mutex: Mutex;
    state: RateState;
}

/**
 * SecurityGuard
 * Per-source-IP sliding-window limiter for connections and inbound bytes.
 *
 * Each IP gets its own Mutex, so two admissions for the same IP are applied
 * one after the other while different IPs never wait on each other.
 * Entries are created on first sight and live as long as the guard.
 */
export class SecurityGuard implements AdmissionGuard {
    private entries: Map<string, IpEntry> = new Map();
    private readonly windowMs: number;

    constructor(public readonly policy: SecurityPolicy, private readonly clock: Clock = systemClock) {
        this.windowMs = policy.windowSeconds * 1000;
        Logger.debug('SecurityGuard', 'Initialized', {
            maxConnections: policy.maxConnectionsPerWindow,
            maxBytes: policy.maxBytesPerWindow,
            timeoutSeconds: policy.socketTimeoutSeconds,
            windowSeconds: policy.windowSeconds,
        });
    }

    /**
     * Records a new connection from `sourceIp` unless the window is already full.
     */
    public async admitConnection(sourceIp: string): Promise<boolean> {
        const entry = this.entryFor(sourceIp);
        return entry.mutex.runExclusive(() => {
            const now = this.clock.now();
            const timestamps = entry.state.connectionTimestamps;
            this.pruneBefore(timestamps, t => t, now);

            if (timestamps.length >= this.policy.maxConnectionsPerWindow) {
                Logger.warn('SecurityGuard', `Connection rate limit exceeded for ${sourceIp}`, {
                    connections: timestamps.length,
                    windowSeconds: this.policy.windowSeconds,
                });
                return false;
            }

            timestamps.push(now);
            Logger.debug('SecurityGuard', `Allowed connection from ${sourceIp}`, {
                connections: timestamps.length,
                limit: this.policy.maxConnectionsPerWindow,
            });
            return true;
        });
    }

    /**
     * Records `byteCount` inbound bytes unless the window total would exceed the limit.
     */
    public async admitData(sourceIp: string, byteCount: number): Promise<boolean> {
        const entry = this.entryFor(sourceIp);
        return entry.mutex.runExclusive(() => {
            const now = this.clock.now();
            const events = entry.state.dataEvents;
            this.pruneBefore(events, e => e.at, now);

            const total = events.reduce((sum, e) => sum + e.bytes, 0);
            if (total + byteCount > this.policy.maxBytesPerWindow) {
                Logger.warn('SecurityGuard', `Data rate limit exceeded for ${sourceIp}`, {
                    bytes: total + byteCount,
                    limit: this.policy.maxBytesPerWindow,
                    windowSeconds: this.policy.windowSeconds,
                });
                return false;
            }

            events.push({ at: now, bytes: byteCount });
            Logger.debug('SecurityGuard', `Allowed ${byteCount} bytes from ${sourceIp}`, {
                bytes: total + byteCount,
                limit: this.policy.maxBytesPerWindow,
            });
            return true;
        });
    }

    public validatePayload(data: Uint8Array): boolean {
        return this.validateLength(data.length);
    }

    /**
     * Single-message ceiling: a frame may never be empty or larger than the
     * whole per-window byte budget.
     */
    public validateLength(length: number): boolean {
        if (length === 0) {
            Logger.warn('SecurityGuard', 'Empty payload received');
            return false;
        }
        if (length > this.policy.maxBytesPerWindow) {
            Logger.warn('SecurityGuard', `Payload size ${length} exceeds maximum allowed ${this.policy.maxBytesPerWindow}`);
            return false;
        }
        return true;
    }

    public applyTimeout(socket: Socket): void {
        socket.setTimeout(this.policy.socketTimeoutSeconds * 1000);
        Logger.debug('SecurityGuard', `Set socket timeout to ${this.policy.socketTimeoutSeconds} seconds`);
    }

    private entryFor(sourceIp: string): IpEntry {
        let entry = this.entries.get(sourceIp);
        if (!entry) {
            entry = { mutex: new Mutex(), state: { connectionTimestamps: [], dataEvents: [] } };
            this.entries.set(sourceIp, entry);
        }
        return entry;
    }

    /**
     * Drops leading items older than the window. Items are in time order.
     */
    private pruneBefore<T>(items: T[], timeOf: (item: T) => number, now: number): void {
        let expired = 0;
        while (expired < items.length && now - timeOf(items[expired]) > this.windowMs) {
            expired++;
        }
        if (expired > 0) {
            items.splice(0, expired);
        }
    }
}
