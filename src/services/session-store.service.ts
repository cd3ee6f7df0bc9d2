// src/services/session-store.service.ts

import { v4 as uuidv4 } from 'uuid';
import { InvoiceRecord } from '../models/invoice.model';
import { Session } from '../models/session.model';
import { BaseService } from './base/BaseService';
import { ServiceConfig } from './base/types';
import { InternalInvariantError, SessionExpiredError, SessionNotFoundError } from './errors';
import { InvoiceIndex } from './index/invoice-index';

export interface SessionStoreConfig extends ServiceConfig {
    timeoutMs: number;
    sweepIntervalMs: number;
    /** When true, every successful get pushes the expiry out again. */
    slidingExpiration?: boolean;
    now?: () => number;
}

// Swept ids kept so their next lookup still reports expiry.
const MAX_SWEPT_IDS = 10_000;

/**
 * Owns every session of the process. Sessions live only in memory and are
 * evicted once their expiry passes, either on access or by the periodic
 * sweep. All mutations are synchronous, so no caller ever observes a
 * half-updated session.
 */
export class SessionStore extends BaseService {
    private sessions: Map<string, Session> = new Map();
    /** Ids evicted by a sweep but not yet reported as expired, oldest first. */
    private sweptIds: Set<string> = new Set();
    private sweepTimer: NodeJS.Timeout | null = null;
    private readonly timeoutMs: number;
    private readonly sweepIntervalMs: number;
    private readonly slidingExpiration: boolean;
    private readonly now: () => number;

    constructor(config: SessionStoreConfig) {
        super(config);
        this.timeoutMs = config.timeoutMs;
        this.sweepIntervalMs = config.sweepIntervalMs;
        this.slidingExpiration = config.slidingExpiration ?? false;
        this.now = config.now ?? Date.now;
    }

    public create(records: readonly InvoiceRecord[], index: InvoiceIndex, filesProcessed: number): string {
        if (index.size !== records.length) {
            throw new InternalInvariantError(`Index holds ${index.size} records but session has ${records.length}`);
        }
        this.sweep();

        const sessionId = uuidv4();
        const createdAt = new Date(this.now());
        this.sessions.set(sessionId, {
            id: sessionId,
            createdAt,
            lastAccessedAt: createdAt,
            expiresAt: new Date(createdAt.getTime() + this.timeoutMs),
            status: 'active',
            records: Object.freeze([...records]),
            index,
            revision: 0,
            filesProcessed,
        });

        this.logger.info('Session created', { sessionId, records: records.length, activeSessions: this.sessions.size });
        return sessionId;
    }

    /**
     * Returns a snapshot of the session. Expired sessions are evicted and
     * reported once as expired; after that they are simply not found.
     */
    public get(sessionId: string): Session {
        const session = this.sessions.get(sessionId);
        if (!session) {
            if (this.sweptIds.delete(sessionId)) {
                throw new SessionExpiredError(sessionId);
            }
            throw new SessionNotFoundError(sessionId);
        }

        const now = this.now();
        if (now > session.expiresAt.getTime()) {
            session.status = 'expired';
            this.sessions.delete(sessionId);
            this.logger.info('Session expired on access', { sessionId });
            throw new SessionExpiredError(sessionId);
        }

        session.lastAccessedAt = new Date(now);
        if (this.slidingExpiration) {
            session.expiresAt = new Date(now + this.timeoutMs);
        }
        return { ...session };
    }

    /**
     * Swaps in a new record set and index if nobody else changed the session
     * since `expectedRevision` was read. Returns false on a lost race so the
     * caller can rebuild from the newer state.
     */
    public replaceContents(
        sessionId: string,
        expectedRevision: number,
        records: readonly InvoiceRecord[],
        index: InvoiceIndex,
        filesAdded: number,
    ): boolean {
        const current = this.get(sessionId);
        if (current.revision !== expectedRevision) {
            return false;
        }
        if (index.size !== records.length) {
            throw new InternalInvariantError(`Index holds ${index.size} records but session has ${records.length}`);
        }

        this.sessions.set(sessionId, {
            ...current,
            records: Object.freeze([...records]),
            index,
            revision: current.revision + 1,
            filesProcessed: current.filesProcessed + filesAdded,
        });
        this.logger.info('Session records replaced', { sessionId, records: records.length, revision: current.revision + 1 });
        return true;
    }

    public delete(sessionId: string): boolean {
        const deleted = this.sessions.delete(sessionId);
        if (deleted) {
            this.logger.info('Session deleted', { sessionId });
        }
        return deleted;
    }

    /** Evicts every expired session and returns how many were removed. */
    public sweep(): number {
        const now = this.now();
        let evicted = 0;
        for (const [sessionId, session] of this.sessions) {
            if (now > session.expiresAt.getTime()) {
                session.status = 'expired';
                this.sessions.delete(sessionId);
                this.rememberSwept(sessionId);
                evicted++;
            }
        }
        if (evicted > 0) {
            this.logger.info('Expired sessions swept', { evicted, activeSessions: this.sessions.size });
        }
        return evicted;
    }

    private rememberSwept(sessionId: string): void {
        this.sweptIds.add(sessionId);
        if (this.sweptIds.size > MAX_SWEPT_IDS) {
            const oldest = this.sweptIds.values().next();
            if (!oldest.done) this.sweptIds.delete(oldest.value);
        }
    }

    public count(): number {
        this.sweep();
        return this.sessions.size;
    }

    public start(): void {
        if (this.sweepTimer) return;
        this.sweepTimer = setInterval(() => this.sweep(), this.sweepIntervalMs);
        this.sweepTimer.unref();
        this.logger.info('Session sweeper started', { intervalMs: this.sweepIntervalMs });
    }

    public stop(): void {
        if (this.sweepTimer) {
            clearInterval(this.sweepTimer);
            this.sweepTimer = null;
            this.logger.info('Session sweeper stopped');
        }
    }

    /** Drops every session, e.g. on shutdown. */
    public clear(): void {
        const count = this.sessions.size;
        this.sessions.clear();
        this.sweptIds.clear();
        this.logger.info('All sessions cleared', { count });
    }
}
