import { logger } from '../../platform/logger.js';
import type { Config } from '../../platform/config.js';
import type { SessionLock } from '../../core/ports/SessionLock.js';
import type { SessionStore } from '../../core/ports/SessionStore.js';
import { InMemorySessionStore } from '../memory/InMemorySessionStore.js';
import { KeyedMutex } from '../memory/KeyedMutex.js';
import { UpstashRestClient, type UpstashFetch } from '../redis/UpstashRestClient.js';
import { UpstashSessionLock } from '../redis/UpstashSessionLock.js';
import { UpstashSessionStore } from '../redis/UpstashSessionStore.js';
import { FailoverSessionStore } from './FailoverSessionStore.js';

const COMPONENT = 'SessionBackend';

export type SessionBackend =
    | {
          kind: 'durable';
          store: SessionStore;
          lock: SessionLock;
          endpoint: string;
      }
    | {
          kind: 'memory';
          store: SessionStore;
          lock: SessionLock;
          reason: 'not-configured' | 'unreachable';
      };

export interface SessionBackendOptions {
    redis: Config['redis'];
    fetchImpl?: UpstashFetch;
}

function memoryBackend(reason: 'not-configured' | 'unreachable'): SessionBackend {
    return { kind: 'memory', store: new InMemorySessionStore(), lock: new KeyedMutex(), reason };
}

/**
 * Pick the session backend once, at startup.
 *
 * Upstash when configured and answering PING, otherwise the in-memory store.
 * The durable store is wrapped in a FailoverSessionStore so later outages
 * degrade to memory instead of failing requests.
 */
export async function createSessionBackend(options: SessionBackendOptions): Promise<SessionBackend> {
    const { redis } = options;

    if (!redis.restUrl || !redis.token) {
        logger.info({
            kind: 'sys',
            component: COMPONENT,
            message: 'Redis not configured, using in-memory session store',
        });
        return memoryBackend('not-configured');
    }

    const client = new UpstashRestClient({
        restUrl: redis.restUrl,
        token: redis.token,
        fetchImpl: options.fetchImpl,
    });
    const durable = new UpstashSessionStore({ client, namespace: redis.namespace });

    if (!(await durable.ping())) {
        logger.warn({
            kind: 'sys',
            component: COMPONENT,
            message: 'Redis unreachable at startup, using in-memory session store',
            meta: { endpoint: client.endpoint },
        });
        return memoryBackend('unreachable');
    }

    logger.info({
        kind: 'sys',
        component: COMPONENT,
        message: 'Using Redis session store',
        meta: { endpoint: client.endpoint, namespace: redis.namespace },
    });
    return {
        kind: 'durable',
        store: new FailoverSessionStore(durable, new InMemorySessionStore()),
        lock: new UpstashSessionLock({
            client,
            namespace: redis.namespace,
            lockTtlMs: redis.lockTtlMs,
        }),
        endpoint: client.endpoint,
    };
}
