import { nanoid } from 'nanoid';
import { logger } from '../../platform/logger.js';
import type { SessionLock } from '../../core/ports/SessionLock.js';
import { KeyedMutex } from '../memory/KeyedMutex.js';
import type { UpstashRestClient } from './UpstashRestClient.js';

const COMPONENT = 'UpstashSessionLock';

// Both act only while the lock still holds our token
const RELEASE_SCRIPT = "if redis.call('get', KEYS[1]) == ARGV[1] then return redis.call('del', KEYS[1]) else return 0 end";
const RENEW_SCRIPT =
    "if redis.call('get', KEYS[1]) == ARGV[1] then return redis.call('pexpire', KEYS[1], ARGV[2]) else return 0 end";

export interface UpstashSessionLockParams {
    client: UpstashRestClient;
    namespace?: string;
    /**
     * Lock expiry, so a crashed holder cannot block a session forever. A live
     * holder renews it every third of the TTL until its work is done.
     */
    lockTtlMs?: number;
    waitMs?: number;
    retries?: number;
    local?: KeyedMutex;
}

/**
 * Session lock shared by every process using the same Redis.
 *
 * Callers in this process queue on a KeyedMutex first, so only one of them at a
 * time competes for the Redis lock (`SET <ns>:lock:<id> <token> NX PX <ttl>`).
 * If the lock cannot be taken in time, or Redis is down, the work runs unlocked
 * and the miss is logged.
 */
export class UpstashSessionLock implements SessionLock {
    private readonly client: UpstashRestClient;
    private readonly namespace: string;
    private readonly lockTtlMs: number;
    private readonly waitMs: number;
    private readonly retries: number;
    private readonly local: KeyedMutex;

    constructor(params: UpstashSessionLockParams) {
        this.client = params.client;
        this.namespace = params.namespace || 'session';
        this.lockTtlMs = params.lockTtlMs ?? 10_000;
        this.waitMs = params.waitMs ?? 100;
        this.retries = params.retries ?? 50;
        this.local = params.local ?? new KeyedMutex();
    }

    lockKeyFor(sessionId: string): string {
        return `${this.namespace}:lock:${sessionId}`;
    }

    async runExclusive<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
        return this.local.runExclusive(sessionId, async () => {
            const key = this.lockKeyFor(sessionId);
            const token = nanoid();
            const acquired = await this.acquire(key, token);
            const stopRenewal = acquired ? this.keepAlive(key, token) : undefined;
            try {
                return await fn();
            } finally {
                stopRenewal?.();
                if (acquired) {
                    await this.release(key, token);
                }
            }
        });
    }

    private async acquire(key: string, token: string): Promise<boolean> {
        for (let attempt = 0; attempt <= this.retries; attempt++) {
            try {
                const result = await this.client.command('SET', key, token, 'NX', 'PX', String(this.lockTtlMs));
                if (result === 'OK') {
                    return true;
                }
            } catch (error) {
                logger.warn({
                    kind: 'sys',
                    component: COMPONENT,
                    message: 'Lock acquire failed, continuing unlocked',
                    error,
                    meta: { key },
                });
                return false;
            }
            if (attempt < this.retries) {
                await this.sleep(this.waitMs);
            }
        }

        logger.warn({
            kind: 'sys',
            component: COMPONENT,
            message: 'Lock wait exhausted, continuing unlocked',
            meta: { key, waitedMs: this.waitMs * this.retries },
        });
        return false;
    }

    private keepAlive(key: string, token: string): () => void {
        let stopped = false;
        const timer = setInterval(() => {
            this.client
                .command('EVAL', RENEW_SCRIPT, '1', key, token, String(this.lockTtlMs))
                .then((renewed) => {
                    // A renewal racing the release finds the lock already gone
                    if (renewed !== 1 && !stopped) {
                        logger.warn({
                            kind: 'sys',
                            component: COMPONENT,
                            message: 'Lock lost before the work finished',
                            meta: { key },
                        });
                    }
                })
                .catch((error: unknown) => {
                    logger.warn({ kind: 'sys', component: COMPONENT, message: 'Lock renewal failed', error, meta: { key } });
                });
        }, Math.max(1, Math.floor(this.lockTtlMs / 3)));
        timer.unref();
        return () => {
            stopped = true;
            clearInterval(timer);
        };
    }

    private async release(key: string, token: string): Promise<void> {
        try {
            await this.client.command('EVAL', RELEASE_SCRIPT, '1', key, token);
        } catch (error) {
            // The PX expiry frees the lock eventually
            logger.warn({ kind: 'sys', component: COMPONENT, message: 'Lock release failed', error, meta: { key } });
        }
    }

    private async sleep(ms: number): Promise<void> {
        await new Promise((resolve) => setTimeout(resolve, ms));
    }
}
