/**
 * Session Registry
 *
 * Tracks the active client sessions of one server by their opaque ID.
 * Unregistering a session tears it down: pending server-to-client requests are
 * rejected and its outbound channel is closed.
 */

import { randomUUID } from 'node:crypto';

import type { Logger } from '../shared/logger.js';
import { silentLogger } from '../shared/logger.js';
import type { ClientSession } from './session.js';

/**
 * Session lifecycle event callbacks
 */
export interface SessionRegistryEvents {
    /**
     * Called after a session is registered
     */
    onSessionRegistered?: (session: ClientSession) => void;

    /**
     * Called after a session is unregistered and closed
     */
    onSessionUnregistered?: (session: ClientSession) => void;
}

/**
 * Options for SessionRegistry
 */
export interface SessionRegistryOptions {
    /**
     * Maximum number of sessions.
     * When exceeded, the least recently used session is unregistered.
     * Default: unlimited
     */
    maxSessions?: number;

    /**
     * Idle timeout in milliseconds.
     * Sessions neither looked up nor touched for longer than this are unregistered.
     * Default: no timeout
     */
    sessionTimeout?: number;

    /**
     * Interval for checking idle sessions in milliseconds.
     * Default: 60000 (1 minute)
     */
    cleanupInterval?: number;

    events?: SessionRegistryEvents;

    logger?: Logger;
}

interface SessionEntry {
    session: ClientSession;
    lastAccessedAt: number;
}

/**
 * Active sessions keyed by session ID.
 *
 * Features:
 * - Optional maximum session count with LRU eviction
 * - Optional idle timeout with automatic cleanup
 * - Register/unregister event callbacks
 */
export class SessionRegistry {
    private _sessions = new Map<string, SessionEntry>();
    private _options: SessionRegistryOptions;
    private _logger: Logger;
    private _listeners: SessionRegistryEvents[] = [];
    private _cleanupTimer?: ReturnType<typeof setInterval>;

    constructor(options: SessionRegistryOptions = {}) {
        this._options = options;
        this._logger = options.logger ?? silentLogger;
        if (options.events) {
            this._listeners.push(options.events);
        }

        if (options.sessionTimeout && options.sessionTimeout > 0) {
            const interval = options.cleanupInterval ?? 60_000;
            this._cleanupTimer = setInterval(() => {
                this._cleanupExpiredSessions();
            }, interval);

            // Prevent timer from keeping process alive
            this._cleanupTimer.unref();
        }
    }

    /**
     * Adds a callback pair; returns a function that removes it.
     */
    subscribe(events: SessionRegistryEvents): () => void {
        this._listeners.push(events);
        return () => {
            this._listeners = this._listeners.filter(listener => listener !== events);
        };
    }

    /**
     * Registers a session. Rejects an ID that is already registered.
     */
    register(session: ClientSession): void {
        if (this._sessions.has(session.sessionId)) {
            throw new Error(`Session ${session.sessionId} is already registered`);
        }

        if (this._options.maxSessions && this._sessions.size >= this._options.maxSessions) {
            this._evictOldestSession();
        }

        this._sessions.set(session.sessionId, { session, lastAccessedAt: Date.now() });
        // A session closed by anyone leaves the registry with it.
        session.onClose(() => {
            this.unregister(session.sessionId);
        });

        this._logger.info('Session registered', { sessionId: session.sessionId });
        for (const listener of this._listeners) {
            listener.onSessionRegistered?.(session);
        }
    }

    /**
     * Removes and closes a session. Returns false when the ID is unknown.
     */
    unregister(sessionId: string, reason: string = 'Session unregistered'): boolean {
        const entry = this._sessions.get(sessionId);
        if (!entry) {
            return false;
        }
        this._sessions.delete(sessionId);
        entry.session.close(reason);

        this._logger.info('Session unregistered', { sessionId, reason });
        for (const listener of this._listeners) {
            listener.onSessionUnregistered?.(entry.session);
        }
        return true;
    }

    /**
     * Looks up a session and refreshes its last-access time.
     */
    get(sessionId: string): ClientSession | undefined {
        const entry = this._sessions.get(sessionId);
        if (!entry) {
            return undefined;
        }

        if (this._isExpired(entry)) {
            this.unregister(sessionId, 'Session timed out');
            return undefined;
        }

        entry.lastAccessedAt = Date.now();
        return entry.session;
    }

    /**
     * Refreshes the last-access time of a session that sees traffic without being looked up,
     * such as the single session of a stdio connection. Returns false when the ID is unknown.
     */
    touch(sessionId: string): boolean {
        const entry = this._sessions.get(sessionId);
        if (!entry) {
            return false;
        }
        entry.lastAccessedAt = Date.now();
        return true;
    }

    has(sessionId: string): boolean {
        return this.get(sessionId) !== undefined;
    }

    get size(): number {
        return this._sessions.size;
    }

    keys(): string[] {
        return [...this._sessions.keys()];
    }

    /**
     * Visits every registered session. The set may change while visiting: sessions
     * registered during the walk may be skipped, unregistered ones are not visited.
     */
    forEach(callback: (session: ClientSession) => void): void {
        for (const sessionId of this.keys()) {
            const entry = this._sessions.get(sessionId);
            if (entry) {
                callback(entry.session);
            }
        }
    }

    /**
     * Unregisters every session and stops the cleanup timer.
     */
    close(): void {
        if (this._cleanupTimer) {
            clearInterval(this._cleanupTimer);
            this._cleanupTimer = undefined;
        }
        for (const sessionId of this.keys()) {
            this.unregister(sessionId, 'Server closed');
        }
    }

    private _isExpired(entry: SessionEntry): boolean {
        if (!this._options.sessionTimeout) {
            return false;
        }
        const age = Date.now() - entry.lastAccessedAt;
        return age > this._options.sessionTimeout;
    }

    private _evictOldestSession(): void {
        let oldestId: string | undefined;
        let oldestTime = Infinity;

        for (const [id, entry] of this._sessions) {
            if (entry.lastAccessedAt < oldestTime) {
                oldestTime = entry.lastAccessedAt;
                oldestId = id;
            }
        }

        if (oldestId) {
            this.unregister(oldestId, 'Session evicted');
        }
    }

    private _cleanupExpiredSessions(): void {
        for (const [sessionId, entry] of this._sessions) {
            if (this._isExpired(entry)) {
                this.unregister(sessionId, 'Session timed out');
            }
        }
    }
}

/**
 * Session ID generator using crypto.randomUUID.
 */
export function generateSessionId(): string {
    return randomUUID();
}
