import { describe, expect, it } from 'vitest';
import { PersistenceUnavailableError } from '../../../core/errors.js';
import {
    appendMessage,
    createMessage,
    createSession,
    toSessionRecord,
    type Session,
} from '../../../features/session/domain/Session.js';
import { UpstashRestClient } from '../UpstashRestClient.js';
import { UpstashSessionStore } from '../UpstashSessionStore.js';
import { FakeUpstash } from './fakeUpstash.js';

const NOW = new Date('2026-03-02T09:00:00.000Z');

function sampleSession(sessionId = 'sess_1'): Session {
    const session = createSession({ sessionId, studentId: 'student-1', subject: 'history', now: NOW });
    return appendMessage(session, createMessage('user', 'Why did the Roman republic fall?', 9, NOW));
}

function setup(namespace?: string) {
    const upstash = new FakeUpstash();
    const client = new UpstashRestClient({
        restUrl: 'https://redis.test.local/',
        token: 'test-token',
        fetchImpl: upstash.fetch,
    });
    return { upstash, client, store: new UpstashSessionStore({ client, namespace }) };
}

describe('UpstashRestClient', () => {
    it('requires a url and token', () => {
        expect(() => new UpstashRestClient({ restUrl: '', token: 'test-token' })).toThrow(
            'UpstashRestClient requires non-empty restUrl and token'
        );
    });

    it('posts the command as a JSON array with the bearer token', async () => {
        const requests: Array<{ url: string; headers: Record<string, string>; body: string }> = [];
        const upstash = new FakeUpstash();
        const client = new UpstashRestClient({
            restUrl: 'https://redis.test.local/',
            token: 'test-token',
            fetchImpl: (url, init) => {
                requests.push({ url, headers: init.headers, body: init.body });
                return upstash.fetch(url, init);
            },
        });

        expect(await client.command('PING')).toBe('PONG');
        expect(requests).toEqual([
            {
                url: 'https://redis.test.local',
                headers: { Authorization: 'Bearer test-token', 'Content-Type': 'application/json' },
                body: '["PING"]',
            },
        ]);
    });

    it('turns a Redis error reply into PersistenceUnavailableError', async () => {
        const { client } = setup();

        await expect(client.command('FLUSHALL')).rejects.toThrow(
            new PersistenceUnavailableError("Redis FLUSHALL error: ERR unknown command 'FLUSHALL'")
        );
    });

    it('turns an HTTP failure into PersistenceUnavailableError', async () => {
        const { upstash, client } = setup();
        upstash.httpStatus = 503;

        await expect(client.command('GET', 'k')).rejects.toThrow('Redis GET 503: "upstream unavailable"');
    });
});

describe('UpstashSessionStore', () => {
    it('writes the JSON record under the namespaced key with a TTL', async () => {
        const { upstash, store } = setup();
        const session = sampleSession();

        await store.put(session, 86_400);

        expect(upstash.commands).toEqual([
            ['SET', 'session:sess_1', JSON.stringify(toSessionRecord(session)), 'EX', '86400'],
        ]);
        expect(JSON.parse(upstash.value('session:sess_1') ?? 'null')).toEqual(toSessionRecord(session));
    });

    it('rounds fractional TTLs up to at least one second', async () => {
        const { upstash, store } = setup();

        await store.put(sampleSession(), 0.2);

        expect(upstash.commands[0].slice(3)).toEqual(['EX', '1']);
    });

    it('reads back what it wrote', async () => {
        const { store } = setup();
        const session = sampleSession();

        await store.put(session, 60);

        expect(await store.get('sess_1')).toEqual(session);
    });

    it('uses the configured namespace', async () => {
        const { upstash, store } = setup('tutor');

        await store.put(sampleSession('sess_9'), 60);
        await store.delete('sess_9');

        expect(upstash.commands.map((command) => command[1])).toEqual(['tutor:sess_9', 'tutor:sess_9']);
        expect(upstash.value('tutor:sess_9')).toBeNull();
    });

    it('returns null for a missing key', async () => {
        const { store } = setup();

        expect(await store.get('missing')).toBeNull();
    });

    it('treats an unreadable value as missing', async () => {
        const { upstash, store } = setup();
        upstash.entries.set('session:broken', { value: '{"session_id":', expiresAt: null });
        upstash.entries.set('session:partial', { value: '{"session_id":"partial"}', expiresAt: null });

        expect(await store.get('broken')).toBeNull();
        expect(await store.get('partial')).toBeNull();
    });

    it('lets Redis handle expiry', async () => {
        const { upstash, store } = setup();
        await store.put(sampleSession(), 60);

        expect(await store.sweepExpired(new Date('2030-01-01T00:00:00.000Z'), 60)).toBe(0);
        expect(upstash.commandNames()).toEqual(['SET']);
    });

    it('propagates an unreachable Redis as PersistenceUnavailableError', async () => {
        const { upstash, store } = setup();
        upstash.down = true;

        await expect(store.get('sess_1')).rejects.toBeInstanceOf(PersistenceUnavailableError);
        await expect(store.put(sampleSession(), 60)).rejects.toThrow('Redis SET request failed');
        expect(await store.ping()).toBe(false);
    });

    it('answers ping when Redis is up', async () => {
        const { store } = setup();

        expect(await store.ping()).toBe(true);
    });
});
