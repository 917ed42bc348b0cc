import { logger } from '../../platform/logger.js';
import type { SessionStore } from '../../core/ports/SessionStore.js';
import {
    fromSessionRecord,
    toSessionRecord,
    type Session,
    type SessionRecord,
} from '../../features/session/domain/Session.js';

const COMPONENT = 'InMemorySessionStore';

/**
 * Process-local fallback store.
 *
 * Holds serialized records, so callers never share a reference with the store.
 * Nothing expires on its own: `sweepExpired` must be called (SessionManager.startExpirySweep).
 */
export class InMemorySessionStore implements SessionStore {
    private readonly records = new Map<string, SessionRecord>();

    async get(sessionId: string): Promise<Session | null> {
        const record = this.records.get(sessionId);
        return record ? fromSessionRecord(record) : null;
    }

    async put(session: Session, _ttlSeconds: number): Promise<void> {
        this.records.set(session.sessionId, toSessionRecord(session));
    }

    async delete(sessionId: string): Promise<void> {
        this.records.delete(sessionId);
    }

    /**
     * Expiry is measured from `last_activity`, the same point a durable backend's
     * TTL restarts from on every put.
     */
    async sweepExpired(now: Date, ttlSeconds: number): Promise<number> {
        const cutoff = now.getTime() - ttlSeconds * 1000;
        let removed = 0;
        for (const [sessionId, record] of this.records) {
            if (Date.parse(record.last_activity) < cutoff) {
                this.records.delete(sessionId);
                removed++;
            }
        }
        if (removed > 0) {
            logger.debug({
                kind: 'sys',
                component: COMPONENT,
                message: 'Expired sessions removed',
                meta: { removed, remaining: this.records.size },
            });
        }
        return removed;
    }

    has(sessionId: string): boolean {
        return this.records.has(sessionId);
    }

    get size(): number {
        return this.records.size;
    }
}
