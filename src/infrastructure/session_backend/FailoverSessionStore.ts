import { logger } from '../../platform/logger.js';
import type { SessionStore } from '../../core/ports/SessionStore.js';
import type { Session } from '../../features/session/domain/Session.js';

const COMPONENT = 'FailoverSessionStore';

/**
 * Durable primary with an in-memory secondary for the writes the primary refused.
 *
 * - put: primary first; on failure the session is kept in the secondary
 * - a successful primary put clears the secondary copy, so the secondary only
 *   ever holds sessions newer than what the primary has
 * - get: secondary copy first, then primary; a primary failure reads as not found
 *
 * Never throws for primary failures. Durability drops while the primary is down.
 */
export class FailoverSessionStore implements SessionStore {
    constructor(
        private readonly primary: SessionStore,
        private readonly secondary: SessionStore
    ) {}

    async get(sessionId: string): Promise<Session | null> {
        const pending = await this.secondary.get(sessionId);
        if (pending) {
            return pending;
        }
        try {
            return await this.primary.get(sessionId);
        } catch (error) {
            logger.warn({
                kind: 'sys',
                component: COMPONENT,
                message: 'Primary store unavailable on read',
                error,
                meta: { sessionId },
            });
            return null;
        }
    }

    async put(session: Session, ttlSeconds: number): Promise<void> {
        try {
            await this.primary.put(session, ttlSeconds);
        } catch (error) {
            logger.warn({
                kind: 'sys',
                component: COMPONENT,
                message: 'Primary store unavailable on write, keeping session in memory',
                error,
                meta: { sessionId: session.sessionId },
            });
            await this.secondary.put(session, ttlSeconds);
            return;
        }
        await this.secondary.delete(session.sessionId);
    }

    async delete(sessionId: string): Promise<void> {
        await this.secondary.delete(sessionId);
        try {
            await this.primary.delete(sessionId);
        } catch (error) {
            logger.warn({
                kind: 'sys',
                component: COMPONENT,
                message: 'Primary store unavailable on delete',
                error,
                meta: { sessionId },
            });
        }
    }

    async sweepExpired(now: Date, ttlSeconds: number): Promise<number> {
        const [primaryRemoved, secondaryRemoved] = await Promise.all([
            this.primary.sweepExpired(now, ttlSeconds),
            this.secondary.sweepExpired(now, ttlSeconds),
        ]);
        return primaryRemoved + secondaryRemoved;
    }
}
