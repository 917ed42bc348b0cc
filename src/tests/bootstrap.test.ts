import { describe, expect, it } from 'vitest';
import defaultConfig, { type Config } from '../platform/config.js';
import { createSessionManager } from '../bootstrap.js';
import { ScriptedCompletionClient } from '../features/session/usecases/tests/fakes.js';

const config: Config = {
    ...defaultConfig,
    redis: { ...defaultConfig.redis, restUrl: '', token: '' },
    openai: { ...defaultConfig.openai, apiKey: '' },
};

describe('createSessionManager', () => {
    it('wires an in-memory manager when Redis is not configured', async () => {
        const completionClient = new ScriptedCompletionClient(async () => 'unused');
        const { manager, backend, shutdown } = await createSessionManager({ config, completionClient });

        try {
            expect(backend).toMatchObject({ kind: 'memory', reason: 'not-configured' });
            expect(manager.policy.ttlSeconds).toBe(config.session.ttlHours * 3600);

            const session = await manager.createSession('student-1', 'mathematics');
            const updated = await manager.addMessage(session.sessionId, 'user', 'What is a prime number?');

            expect(updated.messages).toHaveLength(1);
            expect(updated.totalTokens).toBeGreaterThan(0);
            expect(completionClient.calls).toHaveLength(0);
        } finally {
            shutdown();
        }
    });

    it('needs an API key when no completion client is given', async () => {
        await expect(createSessionManager({ config })).rejects.toThrow(
            'OpenAICompletionClient requires an API key (OPENAI_API_KEY)'
        );
    });
});
