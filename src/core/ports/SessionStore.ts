import type { Session } from '../../features/session/domain/Session.js';

/**
 * Key-addressed session persistence with expiry.
 *
 * Last write wins; a `get` after a `put` on the same instance sees the write.
 * Read-modify-write isolation is the caller's job (see SessionLock).
 */
export interface SessionStore {
    /** Resolves null for unknown or expired ids */
    get(sessionId: string): Promise<Session | null>;

    /** Writes the whole session in one operation and (re)starts its TTL */
    put(session: Session, ttlSeconds: number): Promise<void>;

    /** Idempotent */
    delete(sessionId: string): Promise<void>;

    /**
     * Remove sessions idle for longer than `ttlSeconds` as of `now`.
     * Backends whose server enforces the TTL return 0.
     */
    sweepExpired(now: Date, ttlSeconds: number): Promise<number>;
}
