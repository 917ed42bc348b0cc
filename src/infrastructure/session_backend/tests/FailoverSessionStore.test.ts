import { describe, expect, it } from 'vitest';
import { appendMessage, createMessage, createSession, type Session } from '../../../features/session/domain/Session.js';
import { InMemorySessionStore } from '../../memory/InMemorySessionStore.js';
import { UpstashRestClient } from '../../redis/UpstashRestClient.js';
import { UpstashSessionStore } from '../../redis/UpstashSessionStore.js';
import { FakeUpstash } from '../../redis/tests/fakeUpstash.js';
import { FailoverSessionStore } from '../FailoverSessionStore.js';

const NOW = new Date('2026-03-02T09:00:00.000Z');

function withMessages(count: number): Session {
    let session = createSession({ sessionId: 'sess_1', studentId: 'student-1', subject: 'music', now: NOW });
    for (let i = 0; i < count; i++) {
        session = appendMessage(session, createMessage('user', `note ${i}`, 2, NOW));
    }
    return session;
}

function setup() {
    const upstash = new FakeUpstash();
    const client = new UpstashRestClient({
        restUrl: 'https://redis.test.local',
        token: 'test-token',
        fetchImpl: upstash.fetch,
    });
    const secondary = new InMemorySessionStore();
    const store = new FailoverSessionStore(new UpstashSessionStore({ client }), secondary);
    return { upstash, secondary, store };
}

describe('FailoverSessionStore', () => {
    it('writes through to the primary while it is up', async () => {
        const { upstash, secondary, store } = setup();

        await store.put(withMessages(1), 60);

        expect(upstash.value('session:sess_1')).not.toBeNull();
        expect(secondary.size).toBe(0);
        expect(await store.get('sess_1')).toEqual(withMessages(1));
    });

    it('keeps writes in memory while the primary is down', async () => {
        const { upstash, secondary, store } = setup();
        await store.put(withMessages(1), 60);
        upstash.down = true;

        await store.put(withMessages(2), 60);

        expect(secondary.has('sess_1')).toBe(true);
        expect((await store.get('sess_1'))?.messages).toHaveLength(2);
    });

    it('moves back to the primary once it recovers', async () => {
        const { upstash, secondary, store } = setup();
        upstash.down = true;
        await store.put(withMessages(1), 60);
        upstash.down = false;

        await store.put(withMessages(2), 60);

        expect(secondary.size).toBe(0);
        expect((await store.get('sess_1'))?.messages).toHaveLength(2);
    });

    it('reads as not found when the primary is down and nothing is in memory', async () => {
        const { upstash, store } = setup();
        await store.put(withMessages(1), 60);
        upstash.down = true;

        expect(await store.get('sess_1')).toBeNull();
    });

    it('deletes from both stores and tolerates a primary outage', async () => {
        const { upstash, secondary, store } = setup();
        upstash.down = true;
        await store.put(withMessages(1), 60);

        await store.delete('sess_1');

        expect(secondary.size).toBe(0);
    });
});
