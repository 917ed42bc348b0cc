import { logger } from '../../platform/logger.js';
import type { SessionStore } from '../../core/ports/SessionStore.js';
import { fromSessionRecord, toSessionRecord, type Session } from '../../features/session/domain/Session.js';
import type { UpstashRestClient } from './UpstashRestClient.js';

const COMPONENT = 'UpstashSessionStore';

/**
 * Durable session store on Upstash Redis.
 *
 * One string key per session (`<namespace>:<sessionId>`) holding the JSON record.
 * Redis expires keys itself; every put restarts the TTL with `SET ... EX`.
 */
export class UpstashSessionStore implements SessionStore {
    private readonly client: UpstashRestClient;
    private readonly namespace: string;

    constructor(params: { client: UpstashRestClient; namespace?: string }) {
        this.client = params.client;
        this.namespace = params.namespace || 'session';
        logger.info({
            kind: 'sys',
            component: COMPONENT,
            message: 'UpstashSessionStore initialized',
            meta: { baseUrl: this.client.endpoint, namespace: this.namespace },
        });
    }

    keyFor(sessionId: string): string {
        return `${this.namespace}:${sessionId}`;
    }

    /** true when Redis answers PING */
    async ping(): Promise<boolean> {
        try {
            return (await this.client.command('PING')) === 'PONG';
        } catch (error) {
            logger.warn({ kind: 'sys', component: COMPONENT, message: 'Redis ping failed', error });
            return false;
        }
    }

    async get(sessionId: string): Promise<Session | null> {
        const raw = await this.client.command('GET', this.keyFor(sessionId));
        if (raw === null || raw === '') {
            return null;
        }

        try {
            return fromSessionRecord(typeof raw === 'string' ? JSON.parse(raw) : raw);
        } catch (error) {
            // An unreadable value is as good as missing; the next put overwrites it
            logger.warn({
                kind: 'sys',
                component: COMPONENT,
                message: 'Discarding unreadable session value',
                error,
                meta: { sessionId },
            });
            return null;
        }
    }

    async put(session: Session, ttlSeconds: number): Promise<void> {
        const ttl = Math.max(1, Math.ceil(ttlSeconds));
        await this.client.command(
            'SET',
            this.keyFor(session.sessionId),
            JSON.stringify(toSessionRecord(session)),
            'EX',
            String(ttl)
        );
        logger.debug({
            kind: 'sys',
            component: COMPONENT,
            message: 'Session written',
            meta: { sessionId: session.sessionId, messages: session.messages.length, ttl },
        });
    }

    async delete(sessionId: string): Promise<void> {
        await this.client.command('DEL', this.keyFor(sessionId));
    }

    async sweepExpired(_now: Date, _ttlSeconds: number): Promise<number> {
        return 0;
    }
}
